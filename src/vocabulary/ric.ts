import { readFileSync } from "node:fs";
import { ConfigurationError } from "../errors.js";
import type { PropertyKind, Vocabulary } from "../types.js";

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

function requireString(raw: Record<string, unknown>, key: string, origin: string): string {
  const value = raw[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new ConfigurationError(`Vocabulary ${origin} is missing the string field '${key}'`);
  }
  return value.trim();
}

function requireNames(raw: Record<string, unknown>, key: string, origin: string): Set<string> {
  const value = raw[key];
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`Vocabulary ${origin} is missing the list '${key}'`);
  }
  const names = new Set<string>();
  for (const entry of value) {
    if (typeof entry !== "string" || !entry.trim()) {
      throw new ConfigurationError(`Vocabulary ${origin} has a non-string entry in '${key}'`);
    }
    names.add(entry.trim());
  }
  return names;
}

export function parseVocabulary(raw: unknown, origin = "file"): Vocabulary {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Vocabulary ${origin} must be a JSON object`);
  }
  return {
    prefix: requireString(raw, "prefix", origin),
    iri: requireString(raw, "iri", origin),
    importIri: requireString(raw, "import", origin),
    classes: requireNames(raw, "classes", origin),
    objectProperties: requireNames(raw, "objectProperties", origin),
    datatypeProperties: requireNames(raw, "datatypeProperties", origin),
  };
}

export function loadVocabulary(filePath: string | URL): Vocabulary {
  let text: string;
  try {
    text = readFileSync(filePath, "utf8");
  } catch {
    throw new ConfigurationError(`Vocabulary not found: ${String(filePath)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Vocabulary ${String(filePath)} is not valid JSON: ${message}`);
  }
  return parseVocabulary(raw, String(filePath));
}

export const ricVocabulary: Vocabulary = loadVocabulary(new URL("../../vocabulary/ric-o.json", import.meta.url));

export function namespacePrefix(vocabulary: Vocabulary): string {
  return `${vocabulary.prefix}:`;
}

export function propertyKind(vocabulary: Vocabulary, name: string): PropertyKind | undefined {
  if (vocabulary.objectProperties.has(name)) {
    return "object";
  }
  if (vocabulary.datatypeProperties.has(name)) {
    return "datatype";
  }
  return undefined;
}
