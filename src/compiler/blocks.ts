import { VocabularyError } from "../errors.js";
import type { DiagramItem, EntityBlock, EntityBlocks, EntityKey, Individual, Relation, SanitiserConfig, Vocabulary } from "../types.js";
import { propertyKind } from "../vocabulary/ric.js";
import { DEFAULT_SANITISER_CONFIG } from "./defaults.js";
import { sanitiseIdentifier } from "./sanitize.js";

export function entityKey(label: string, sanitiser: SanitiserConfig): EntityKey {
  return { identifier: sanitiseIdentifier(label, sanitiser), label };
}

function keyId(key: EntityKey): string {
  return JSON.stringify([key.identifier, key.label]);
}

function blockFor(blocks: EntityBlocks, key: EntityKey): EntityBlock {
  const id = keyId(key);
  const existing = blocks.get(id);
  if (existing) {
    return existing;
  }
  const created: EntityBlock = { key, types: new Set(), facts: new Map() };
  blocks.set(id, created);
  return created;
}

function addIndividual(blocks: EntityBlocks, individual: Individual, vocabulary: Vocabulary, sanitiser: SanitiserConfig): void {
  if (!vocabulary.classes.has(individual.className)) {
    throw new VocabularyError(individual.className, `Not a ${vocabulary.prefix} class: ${individual.className} (declared for '${individual.identifier}')`);
  }
  blockFor(blocks, entityKey(individual.identifier, sanitiser)).types.add(individual.className);
}

function addRelation(blocks: EntityBlocks, relation: Relation, vocabulary: Vocabulary, sanitiser: SanitiserConfig): void {
  const kind = propertyKind(vocabulary, relation.name);
  if (!kind) {
    throw new VocabularyError(
      relation.name,
      `An arrow has label ${vocabulary.prefix}:'${relation.name}', which is not an object property or datatype property in ${vocabulary.prefix}`,
    );
  }

  const target = kind === "object" ? sanitiseIdentifier(relation.target, sanitiser) : relation.target;
  const block = blockFor(blocks, entityKey(relation.source, sanitiser));
  const fact = block.facts.get(relation.name);
  if (fact) {
    fact.values.add(target);
    return;
  }
  block.facts.set(relation.name, { kind, values: new Set([target]) });
}

/**
 * Merges individuals and relations into one block per entity, keyed on the
 * sanitised identifier together with the original label.
 */
export function assembleBlocks(
  items: Iterable<DiagramItem>,
  vocabulary: Vocabulary,
  sanitiser: SanitiserConfig = DEFAULT_SANITISER_CONFIG,
): EntityBlocks {
  const blocks: EntityBlocks = new Map();
  for (const item of items) {
    if (item.kind === "individual") {
      addIndividual(blocks, item, vocabulary, sanitiser);
      continue;
    }
    addRelation(blocks, item, vocabulary, sanitiser);
  }
  return blocks;
}
