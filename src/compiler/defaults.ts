import type {
  CapitalisationScheme,
  ConversionOptions,
  ParseOptions,
  ResolverOptions,
  SanitiserConfig,
  SerialisationConfig,
} from "../types.js";

export const DEFAULT_INDENTATION = 2;
export const DEFAULT_MAX_GAP = 10;
export const DEFAULT_CAPITALISATION: CapitalisationScheme = "upper-camel";
export const DEFAULT_LITERAL_STYLE = "whiteSpace=wrap";
export const EDGE_LABEL_STYLE = "edgeLabel";
export const GENERATED_ONTOLOGY_BASE = "ontology://generated-from-draw-io";

export const METACHARACTERS = ["(", ")", "[", "]", "/", ",", ":", ".", "'", '"'] as const;

export const DEFAULT_PARSE_OPTIONS: ParseOptions = {
  literalStyle: DEFAULT_LITERAL_STYLE,
};

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  maxGap: DEFAULT_MAX_GAP,
  strict: false,
};

export const DEFAULT_SANITISER_CONFIG: SanitiserConfig = {
  capitalisation: DEFAULT_CAPITALISATION,
  substitutions: {
    replacements: { " ": "" },
  },
};

export const DEFAULT_SERIALISATION_CONFIG: SerialisationConfig = {
  inferLiteralTypes: true,
  includePreamble: false,
  indentation: DEFAULT_INDENTATION,
  includeLabel: true,
};

export function defaultConversionOptions(): ConversionOptions {
  return {
    parse: { ...DEFAULT_PARSE_OPTIONS },
    resolver: { ...DEFAULT_RESOLVER_OPTIONS },
    sanitiser: {
      capitalisation: DEFAULT_SANITISER_CONFIG.capitalisation,
      substitutions: {
        replacements: { ...DEFAULT_SANITISER_CONFIG.substitutions.replacements },
      },
    },
    serialisation: { ...DEFAULT_SERIALISATION_CONFIG },
  };
}
