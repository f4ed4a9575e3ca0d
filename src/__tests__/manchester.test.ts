import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { assembleBlocks } from "../compiler/blocks.js";
import { DEFAULT_SERIALISATION_CONFIG } from "../compiler/defaults.js";
import { inferLiteralType, preamble, quoteLiteral, serialise, timestamp } from "../render/manchester.js";
import type { DiagramItem, SerialisationConfig } from "../types.js";
import { ricVocabulary } from "../vocabulary/ric.js";

const GENERATED_AT = new Date(2024, 2, 5, 9, 7, 3);

function blocks(items: DiagramItem[]) {
  return assembleBlocks(items, ricVocabulary);
}

function settings(overrides: Partial<SerialisationConfig>): SerialisationConfig {
  return { ...DEFAULT_SERIALISATION_CONFIG, ...overrides };
}

const janeAndOslo: DiagramItem[] = [
  { kind: "individual", identifier: "Jane Doe", className: "Person" },
  { kind: "individual", identifier: "Oslo", className: "Place" },
  { kind: "relation", name: "hasBirthPlace", source: "Jane Doe", target: "Oslo" },
  { kind: "relation", name: "birthDate", source: "Jane Doe", target: "1900-01-01" },
  { kind: "relation", name: "history", source: "Jane Doe", target: "Born \"early\"" },
];

describe("literal types", () => {
  it("infers integers, dates and date-times", () => {
    assert.equal(inferLiteralType("1900"), '"1900"^^xsd:integer');
    assert.equal(inferLiteralType("1900-01-31"), '"1900-01-31"^^xsd:date');
    assert.equal(inferLiteralType("1900-01-31T12:30:00"), '"1900-01-31T12:30:00"^^xsd:dateTime');
    assert.equal(inferLiteralType("1900-01-31T12:30:00.5+01:00"), '"1900-01-31T12:30:00.5+01:00"^^xsd:dateTime');
  });

  it("leaves other text as a plain string", () => {
    assert.equal(inferLiteralType("-12"), '"-12"');
    assert.equal(inferLiteralType("1900-02-30"), '"1900-02-30"');
    assert.equal(inferLiteralType("1900-01-31T25:00:00"), '"1900-01-31T25:00:00"');
    assert.equal(inferLiteralType("about 1900"), '"about 1900"');
  });

  it("escapes quotes and backslashes", () => {
    assert.equal(quoteLiteral('say "hi" \\o/'), '"say \\"hi\\" \\\\o/"');
  });
});

describe("manchester serialisation", () => {
  it("renders individuals with labels, types and sorted facts", () => {
    assert.equal(
      serialise(blocks(janeAndOslo), ricVocabulary),
      [
        "Individual: JaneDoe",
        '  Annotations: rdfs:label "Jane Doe"',
        "  Types: rico:Person",
        "  Facts:",
        '    rico:birthDate "1900-01-01"^^xsd:date,',
        "    rico:hasBirthPlace Oslo,",
        '    rico:history "Born \\"early\\""',
        "",
        "Individual: Oslo",
        '  Annotations: rdfs:label "Oslo"',
        "  Types: rico:Place",
      ].join("\n"),
    );
  });

  it("honours prefix, indentation, label and inference settings", () => {
    const config = settings({ prefix: "ex", indentation: 4, includeLabel: false, inferLiteralTypes: false });
    assert.equal(
      serialise(blocks(janeAndOslo.slice(0, 4)), ricVocabulary, config),
      [
        "Individual: ex:JaneDoe",
        "    Types: rico:Person",
        "    Facts:",
        '        rico:birthDate "1900-01-01",',
        "        rico:hasBirthPlace ex:Oslo",
        "",
        "Individual: ex:Oslo",
        "    Types: rico:Place",
      ].join("\n"),
    );
  });

  it("omits the types line of untyped entities", () => {
    const output = serialise(blocks([{ kind: "relation", name: "name", source: "Oslo", target: "Christiania" }]), ricVocabulary);
    assert.equal(output, ['Individual: Oslo', '  Annotations: rdfs:label "Oslo"', "  Facts:", '    rico:name "Christiania"'].join("\n"));
  });

  it("is independent of the order of declarations", () => {
    const forward = serialise(blocks(janeAndOslo), ricVocabulary);
    const [jane, oslo, birthPlace, birthDate, history] = janeAndOslo;
    assert.ok(jane && oslo && birthPlace && birthDate && history);
    const reordered = serialise(blocks([jane, history, birthPlace, birthDate, oslo]), ricVocabulary);
    assert.equal(reordered, forward);
  });

  it("renders nothing for an empty diagram", () => {
    assert.equal(serialise(new Map(), ricVocabulary), "");
  });
});

describe("preamble", () => {
  it("formats the generation timestamp", () => {
    assert.equal(timestamp(GENERATED_AT), "2024-03-05T09-07-03");
  });

  it("generates an ontology IRI from the timestamp", () => {
    assert.equal(
      preamble(settings({ includePreamble: true }), ricVocabulary, GENERATED_AT),
      [
        "Prefix: rico: <https://www.ica.org/standards/RiC/ontology#>",
        "Prefix: : <ontology://generated-from-draw-io/2024-03-05T09-07-03#>",
        "Ontology: <ontology://generated-from-draw-io/2024-03-05T09-07-03>",
        "  Import: <https://raw.githubusercontent.com/ICA-EGAD/RiC-O/master/ontology/current-version/RiC-O_1-0.rdf>",
      ].join("\n"),
    );
  });

  it("precedes the individuals when enabled", () => {
    const config = settings({ includePreamble: true, ontologyIri: "https://example.org/people", prefix: "ex", prefixIri: "https://example.org/people/" });
    const output = serialise(blocks(janeAndOslo.slice(1, 2)), ricVocabulary, config, GENERATED_AT);
    assert.equal(
      output,
      [
        "Prefix: rico: <https://www.ica.org/standards/RiC/ontology#>",
        "Prefix: ex: <https://example.org/people/>",
        "Ontology: <https://example.org/people>",
        "  Import: <https://raw.githubusercontent.com/ICA-EGAD/RiC-O/master/ontology/current-version/RiC-O_1-0.rdf>",
        "",
        "Individual: ex:Oslo",
        '  Annotations: rdfs:label "Oslo"',
        "  Types: rico:Place",
      ].join("\n"),
    );
  });
});
