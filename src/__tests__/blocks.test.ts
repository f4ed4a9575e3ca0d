import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { assembleBlocks, entityKey } from "../compiler/blocks.js";
import { DEFAULT_SANITISER_CONFIG } from "../compiler/defaults.js";
import { VocabularyError } from "../errors.js";
import type { DiagramItem, EntityBlock } from "../types.js";
import { ricVocabulary } from "../vocabulary/ric.js";

function individual(identifier: string, className: string): DiagramItem {
  return { kind: "individual", identifier, className };
}

function relation(name: string, source: string, target: string): DiagramItem {
  return { kind: "relation", name, source, target };
}

function summary(block: EntityBlock | undefined) {
  assert.ok(block);
  return {
    key: block.key,
    types: [...block.types],
    facts: Object.fromEntries([...block.facts].map(([name, fact]) => [name, { kind: fact.kind, values: [...fact.values] }])),
  };
}

describe("entity blocks", () => {
  it("merges types and facts per entity", () => {
    const blocks = assembleBlocks(
      [
        individual("Jane Doe", "Person"),
        individual("Jane Doe", "Agent"),
        individual("Oslo", "Place"),
        relation("hasBirthPlace", "Jane Doe", "Oslo"),
        relation("birthDate", "Jane Doe", "1900-01-01"),
      ],
      ricVocabulary,
    );

    assert.equal(blocks.size, 2);
    const [jane, oslo] = [...blocks.values()];
    assert.deepEqual(summary(jane), {
      key: { identifier: "JaneDoe", label: "Jane Doe" },
      types: ["Person", "Agent"],
      facts: {
        hasBirthPlace: { kind: "object", values: ["Oslo"] },
        birthDate: { kind: "datatype", values: ["1900-01-01"] },
      },
    });
    assert.deepEqual(summary(oslo), {
      key: { identifier: "Oslo", label: "Oslo" },
      types: ["Place"],
      facts: {},
    });
  });

  it("sanitises object targets but keeps literal values", () => {
    const blocks = assembleBlocks(
      [relation("hasOrHadPlaceName", "Old Town", "Old Town Square"), relation("name", "Old Town", "Old Town Square")],
      ricVocabulary,
    );
    const block = blocks.values().next().value;
    assert.deepEqual(summary(block).facts, {
      hasOrHadPlaceName: { kind: "object", values: ["OldTownSquare"] },
      name: { kind: "datatype", values: ["Old Town Square"] },
    });
  });

  it("collapses repeated facts", () => {
    const blocks = assembleBlocks(
      [relation("hasBirthPlace", "Jane Doe", "Oslo"), relation("hasBirthPlace", "Jane Doe", "Oslo")],
      ricVocabulary,
    );
    assert.deepEqual(summary(blocks.values().next().value).facts, { hasBirthPlace: { kind: "object", values: ["Oslo"] } });
  });

  it("keeps entities apart whose labels differ but sanitise alike", () => {
    const blocks = assembleBlocks([individual("Jane Doe", "Person"), individual("JaneDoe", "Person")], ricVocabulary);
    assert.equal(blocks.size, 2);
  });

  it("rejects unknown properties", () => {
    assert.throws(() => assembleBlocks([relation("bornIn", "Jane Doe", "Oslo")], ricVocabulary), (error: unknown) => {
      assert.ok(error instanceof VocabularyError);
      assert.equal(error.message, "An arrow has label rico:'bornIn', which is not an object property or datatype property in rico");
      return true;
    });
  });

  it("rejects unknown classes", () => {
    assert.throws(() => assembleBlocks([individual("Jane Doe", "Human")], ricVocabulary), {
      name: "VocabularyError",
      message: "Not a rico class: Human (declared for 'Jane Doe')",
    });
  });

  it("keys entities on the identifier and the label", () => {
    assert.deepEqual(entityKey("Jane Doe", DEFAULT_SANITISER_CONFIG), { identifier: "JaneDoe", label: "Jane Doe" });
  });
});
