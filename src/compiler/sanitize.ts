import { ConfigurationError, SanitisationError } from "../errors.js";
import type { BlanketSubstitution, CapitalisationScheme, SanitiserConfig, SubstitutionRules } from "../types.js";
import { METACHARACTERS } from "./defaults.js";

export const CAPITALISATION_SCHEMES: readonly CapitalisationScheme[] = ["upper-camel", "lower-camel", "flat", "none"];

const SPACE = " ";
const METACHARACTER_SET: ReadonlySet<string> = new Set(METACHARACTERS);

export type SubstitutionRule = { kind: "blanket"; mode: BlanketSubstitution } | { kind: "replace"; character: string; replacement: string };

export function isCapitalisationScheme(input: string): input is CapitalisationScheme {
  return CAPITALISATION_SCHEMES.some((scheme) => scheme === input);
}

function percentEncode(character: string): string {
  const code = character.codePointAt(0) ?? 0;
  return `%${code.toString(16).toUpperCase().padStart(2, "0")}`;
}

function blanketReplacement(character: string, blanket: BlanketSubstitution | undefined): string | undefined {
  if (blanket === "remove") {
    return "";
  }
  if (blanket === "url") {
    return percentEncode(character);
  }
  return undefined;
}

export function substitutionFor(character: string, rules: SubstitutionRules): string | undefined {
  if (Object.prototype.hasOwnProperty.call(rules.replacements, character)) {
    return rules.replacements[character];
  }
  return blanketReplacement(character, rules.blanket);
}

function upperFirst(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

function lowerFirst(word: string): string {
  return word.charAt(0).toLowerCase() + word.slice(1);
}

function recase(words: string[], scheme: CapitalisationScheme): string[] {
  switch (scheme) {
    case "upper-camel":
      return words.map(upperFirst);
    case "lower-camel":
      return words.map((word, index) => (index === 0 ? lowerFirst(word) : upperFirst(word)));
    case "flat":
      return words.map(lowerFirst);
    case "none":
      return words;
  }
}

function replaceMetacharacters(label: string, rules: SubstitutionRules): string {
  let out = "";
  for (const character of label) {
    if (!METACHARACTER_SET.has(character)) {
      out += character;
      continue;
    }
    const replacement = substitutionFor(character, rules);
    if (replacement === undefined) {
      throw new SanitisationError(
        label,
        `The label '${label}' contains the metacharacter '${character}', for which no substitution is configured`,
        `Configure one with -m '${character}=<replacement>', or use -m remove or -m url`,
      );
    }
    out += replacement;
  }
  return out;
}

function requireNonEmpty(identifier: string, label: string): string {
  if (!identifier) {
    throw new SanitisationError(
      label,
      `The label '${label}' leaves an empty identifier once its metacharacters and spaces are substituted`,
      "Give the shape a label with at least one other character, or configure a non-empty substitution",
    );
  }
  return identifier;
}

export function sanitiseIdentifier(label: string, config: SanitiserConfig): string {
  const replaced = replaceMetacharacters(label, config.substitutions);

  if (!/\s/u.test(replaced)) {
    if (config.capitalisation === "lower-camel" || config.capitalisation === "flat") {
      return requireNonEmpty(lowerFirst(replaced), label);
    }
    return requireNonEmpty(replaced, label);
  }

  const spaceSubstitute = substitutionFor(SPACE, config.substitutions);
  if (spaceSubstitute === undefined) {
    throw new SanitisationError(
      label,
      `The label '${label}' contains spaces, but no substitution for spaces is configured`,
      "Configure one with -m ' =<replacement>' (an empty replacement removes spaces)",
    );
  }

  const words = replaced.split(/\s+/u).filter(Boolean);
  return requireNonEmpty(recase(words, config.capitalisation).join(spaceSubstitute), label);
}

/** Parses `remove`, `url` or `<character>=<replacement>`. */
export function parseSubstitutionRule(text: string): SubstitutionRule {
  const trimmed = text.trim().toLowerCase();
  if (trimmed === "remove" || trimmed === "url") {
    return { kind: "blanket", mode: trimmed };
  }

  const separator = text.indexOf("=", 1);
  if (separator !== 1) {
    throw new ConfigurationError(`Could not parse the substitution rule '${text}': expecting 'remove', 'url' or '<character>=<replacement>'`);
  }
  const character = text.charAt(0);
  if (character !== SPACE && !METACHARACTER_SET.has(character)) {
    throw new ConfigurationError(
      `Could not parse the substitution rule '${text}': '${character}' is not a space or one of ${METACHARACTERS.join(" ")}`,
    );
  }
  return { kind: "replace", character, replacement: text.slice(separator + 1) };
}

export function substitutionsFromRules(rules: SubstitutionRule[], base?: SubstitutionRules): SubstitutionRules {
  let blanket = base?.blanket;
  const replacements: Record<string, string> = { ...(base?.replacements ?? {}) };
  let blanketFromRules: BlanketSubstitution | undefined;

  for (const rule of rules) {
    if (rule.kind === "replace") {
      replacements[rule.character] = rule.replacement;
      continue;
    }
    if (blanketFromRules && blanketFromRules !== rule.mode) {
      throw new ConfigurationError(`The substitution modes '${blanketFromRules}' and '${rule.mode}' cannot be combined`);
    }
    blanketFromRules = rule.mode;
    blanket = rule.mode;
  }

  return blanket ? { blanket, replacements } : { replacements };
}
