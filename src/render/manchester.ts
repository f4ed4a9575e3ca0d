import { DEFAULT_SERIALISATION_CONFIG, GENERATED_ONTOLOGY_BASE } from "../compiler/defaults.js";
import type { EntityBlock, EntityBlocks, Fact, SerialisationConfig, Vocabulary } from "../types.js";

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/u;
const DATE_TIME_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|[+-](\d{2}):(\d{2}))?$/u;

function byCodePoint(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function isValidTime(hours: number, minutes: number, seconds: number): boolean {
  return hours <= 23 && minutes <= 59 && seconds <= 59;
}

export function quoteLiteral(value: string): string {
  return `"${value.replace(/\\/gu, "\\\\").replace(/"/gu, '\\"')}"`;
}

export function inferLiteralType(literal: string): string {
  const quoted = quoteLiteral(literal);
  if (/^[0-9]+$/u.test(literal)) {
    return `${quoted}^^xsd:integer`;
  }

  const date = literal.match(DATE_RE);
  if (date && isValidDate(Number(date[1]), Number(date[2]), Number(date[3]))) {
    return `${quoted}^^xsd:date`;
  }

  const dateTime = literal.match(DATE_TIME_RE);
  if (
    dateTime &&
    isValidDate(Number(dateTime[1]), Number(dateTime[2]), Number(dateTime[3])) &&
    isValidTime(Number(dateTime[4]), Number(dateTime[5]), Number(dateTime[6])) &&
    (dateTime[7] === undefined || isValidTime(Number(dateTime[7]), Number(dateTime[8]), 0))
  ) {
    return `${quoted}^^xsd:dateTime`;
  }

  return quoted;
}

function prefixed(identifier: string, prefix: string | undefined): string {
  return prefix ? `${prefix}:${identifier}` : identifier;
}

function formatFactValue(value: string, fact: Fact, config: SerialisationConfig): string {
  if (fact.kind === "object") {
    return prefixed(value, config.prefix);
  }
  return config.inferLiteralTypes ? inferLiteralType(value) : quoteLiteral(value);
}

export function serialiseFacts(facts: Map<string, Fact>, config: SerialisationConfig, vocabulary: Vocabulary): string[] {
  const lines: string[] = [];
  const properties = [...facts.keys()].sort(byCodePoint);
  for (const property of properties) {
    const fact = facts.get(property);
    if (!fact) {
      continue;
    }
    for (const value of [...fact.values].sort(byCodePoint)) {
      lines.push(`${vocabulary.prefix}:${property} ${formatFactValue(value, fact, config)}`);
    }
  }
  return lines;
}

export function serialiseBlock(block: EntityBlock, config: SerialisationConfig, vocabulary: Vocabulary): string {
  const indent = " ".repeat(config.indentation);
  const lines = [`Individual: ${prefixed(block.key.identifier, config.prefix)}`];

  if (config.includeLabel) {
    lines.push(`${indent}Annotations: rdfs:label ${quoteLiteral(block.key.label)}`);
  }

  if (block.types.size > 0) {
    const types = [...block.types].sort(byCodePoint).map((type) => `${vocabulary.prefix}:${type}`);
    lines.push(`${indent}Types: ${types.join(", ")}`);
  }

  const facts = serialiseFacts(block.facts, config, vocabulary);
  if (facts.length > 0) {
    lines.push(`${indent}Facts:`);
    lines.push(`${indent}${indent}${facts.join(`,\n${indent}${indent}`)}`);
  }

  return lines.join("\n");
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function timestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}T${time}`;
}

export function preamble(config: SerialisationConfig, vocabulary: Vocabulary, generatedAt: Date = new Date()): string {
  const ontologyIri = config.ontologyIri || `${GENERATED_ONTOLOGY_BASE}/${timestamp(generatedAt)}`;
  const prefixIri = config.prefixIri || `${ontologyIri}#`;
  const indent = " ".repeat(config.indentation);
  return [
    `Prefix: ${vocabulary.prefix}: <${vocabulary.iri}>`,
    `Prefix: ${config.prefix ?? ""}: <${prefixIri}>`,
    `Ontology: <${ontologyIri}>`,
    `${indent}Import: <${vocabulary.importIri}>`,
  ].join("\n");
}

/**
 * Renders the blocks as Manchester syntax individuals, in insertion order,
 * optionally preceded by the ontology preamble.
 */
export function serialise(
  blocks: EntityBlocks,
  vocabulary: Vocabulary,
  config: SerialisationConfig = DEFAULT_SERIALISATION_CONFIG,
  generatedAt: Date = new Date(),
): string {
  const sections: string[] = [];
  if (config.includePreamble) {
    sections.push(preamble(config, vocabulary, generatedAt));
  }
  for (const block of blocks.values()) {
    sections.push(serialiseBlock(block, config, vocabulary));
  }
  return sections.join("\n\n").trimEnd();
}
