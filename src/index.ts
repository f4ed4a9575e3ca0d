export { compileDrawio, convertDrawioToOwl } from "./compiler/index.js";
export type { CompiledDiagram } from "./compiler/index.js";
export { parseDiagram } from "./compiler/parse.js";
export { resolveRelations, individualsAndRelations } from "./compiler/resolve.js";
export { assembleBlocks } from "./compiler/blocks.js";
export { extractLabelText } from "./compiler/label.js";
export { sanitiseIdentifier, parseSubstitutionRule, substitutionsFromRules } from "./compiler/sanitize.js";
export { parseConfigYaml, resolveConversionOptions } from "./compiler/options.js";
export { defaultConversionOptions } from "./compiler/defaults.js";
export { serialise } from "./render/manchester.js";
export { summarizeConversion } from "./quality/report.js";
export { ricVocabulary, loadVocabulary } from "./vocabulary/ric.js";
export * from "./errors.js";
export type * from "./types.js";
