import yaml from "js-yaml";
import { ConfigurationError } from "../errors.js";
import type { CapitalisationScheme, ConversionOptions, ConversionOverrides, SerialisationConfig } from "../types.js";
import { defaultConversionOptions } from "./defaults.js";
import { CAPITALISATION_SCHEMES, isCapitalisationScheme, parseSubstitutionRule, substitutionsFromRules } from "./sanitize.js";

type Section = Record<string, unknown>;

function isRecord(input: unknown): input is Section {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

function section(raw: Section, name: string): Section | undefined {
  const value = raw[name];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`Configuration section '${name}' must be a mapping`);
  }
  return value;
}

function asBoolean(raw: Section, key: string, where: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigurationError(`Configuration value '${where}.${key}' must be true or false`);
  }
  return value;
}

function asString(raw: Section, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigurationError(`Configuration value '${where}.${key}' must be a string`);
  }
  return value;
}

function asNumber(raw: Section, key: string, where: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigurationError(`Configuration value '${where}.${key}' must be a number`);
  }
  return value;
}

export function parseIndentation(input: number | string): number {
  const value = typeof input === "number" ? input : Number(input);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`The indentation must be a non-negative integer, got '${input}'`);
  }
  return value;
}

export function parseMaxGap(input: number | string): number {
  const value = typeof input === "number" ? input : Number(input);
  if (!Number.isFinite(value) || value < 0 || (typeof input === "string" && !input.trim())) {
    throw new ConfigurationError(`The maximum gap must be a non-negative number, got '${input}'`);
  }
  return value;
}

export function parseCapitalisation(input: string): CapitalisationScheme {
  const normalized = input.trim().toLowerCase();
  if (!isCapitalisationScheme(normalized)) {
    throw new ConfigurationError(`Unknown capitalisation scheme '${input}': expecting one of ${CAPITALISATION_SCHEMES.join(", ")}`);
  }
  return normalized;
}

function parseSerialisation(raw: Section): Partial<SerialisationConfig> {
  const where = "serialisation";
  const indentation = asNumber(raw, "indentation", where);
  return {
    inferLiteralTypes: asBoolean(raw, "inferLiteralTypes", where),
    includePreamble: asBoolean(raw, "includePreamble", where),
    includeLabel: asBoolean(raw, "includeLabel", where),
    ontologyIri: asString(raw, "ontologyIri", where),
    prefix: asString(raw, "prefix", where),
    prefixIri: asString(raw, "prefixIri", where),
    indentation: indentation === undefined ? undefined : parseIndentation(indentation),
  };
}

function parseRules(raw: Section): string[] | undefined {
  const value = raw.substitutions;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || value.some((rule) => typeof rule !== "string")) {
    throw new ConfigurationError("Configuration value 'identifiers.substitutions' must be a list of strings");
  }
  return value.map(String);
}

export function parseConfigYaml(raw: string): ConversionOverrides {
  let loaded: unknown;
  try {
    loaded = yaml.load(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not parse the configuration file: ${message}`);
  }
  if (loaded === undefined || loaded === null) {
    return {};
  }
  if (!isRecord(loaded)) {
    throw new ConfigurationError("The configuration file must contain a mapping");
  }

  const overrides: ConversionOverrides = {};

  const serialisation = section(loaded, "serialisation");
  if (serialisation) {
    overrides.serialisation = parseSerialisation(serialisation);
  }

  const resolver = section(loaded, "resolver");
  if (resolver) {
    const maxGap = asNumber(resolver, "maxGap", "resolver");
    overrides.resolver = {
      maxGap: maxGap === undefined ? undefined : parseMaxGap(maxGap),
      strict: asBoolean(resolver, "strict", "resolver"),
    };
  }

  const identifiers = section(loaded, "identifiers");
  if (identifiers) {
    const capitalisation = asString(identifiers, "capitalisation", "identifiers");
    overrides.sanitiser = {
      capitalisation: capitalisation === undefined ? undefined : parseCapitalisation(capitalisation),
      rules: parseRules(identifiers),
    };
  }

  const parse = section(loaded, "parse");
  if (parse) {
    overrides.parse = { literalStyle: asString(parse, "literalStyle", "parse") };
  }

  return overrides;
}

function mergeSerialisation(base: SerialisationConfig, patch?: Partial<SerialisationConfig>): SerialisationConfig {
  if (!patch) {
    return base;
  }
  return {
    inferLiteralTypes: patch.inferLiteralTypes ?? base.inferLiteralTypes,
    includePreamble: patch.includePreamble ?? base.includePreamble,
    includeLabel: patch.includeLabel ?? base.includeLabel,
    indentation: patch.indentation ?? base.indentation,
    ontologyIri: patch.ontologyIri ?? base.ontologyIri,
    prefix: patch.prefix ?? base.prefix,
    prefixIri: patch.prefixIri ?? base.prefixIri,
  };
}

/** Applies overrides over the defaults, later ones winning. */
export function resolveConversionOptions(...layers: ConversionOverrides[]): ConversionOptions {
  const options = defaultConversionOptions();

  for (const layer of layers) {
    options.parse = {
      literalStyle: layer.parse?.literalStyle ?? options.parse.literalStyle,
    };
    options.resolver = {
      maxGap: layer.resolver?.maxGap ?? options.resolver.maxGap,
      strict: layer.resolver?.strict ?? options.resolver.strict,
    };
    options.serialisation = mergeSerialisation(options.serialisation, layer.serialisation);

    if (layer.sanitiser?.capitalisation) {
      options.sanitiser = { ...options.sanitiser, capitalisation: layer.sanitiser.capitalisation };
    }
    if (layer.sanitiser?.rules) {
      const rules = layer.sanitiser.rules.map(parseSubstitutionRule);
      options.sanitiser = {
        ...options.sanitiser,
        substitutions: substitutionsFromRules(rules, options.sanitiser.substitutions),
      };
    }
  }

  if (!options.parse.literalStyle) {
    throw new ConfigurationError("The literal style marker must not be empty");
  }
  return options;
}
