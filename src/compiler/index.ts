import { serialise } from "../render/manchester.js";
import { summarizeConversion } from "../quality/report.js";
import type { ConversionOptions, ConversionReport, EntityBlocks, ParsedDiagram, ResolvedRelation, Vocabulary } from "../types.js";
import { ricVocabulary } from "../vocabulary/ric.js";
import { assembleBlocks } from "./blocks.js";
import { defaultConversionOptions } from "./defaults.js";
import { parseDiagram } from "./parse.js";
import { resolveRelations } from "./resolve.js";

export interface CompiledDiagram {
  diagram: ParsedDiagram;
  relations: ResolvedRelation[];
  blocks: EntityBlocks;
  report: ConversionReport;
}

export function compileDrawio(
  source: string,
  options: ConversionOptions = defaultConversionOptions(),
  vocabulary: Vocabulary = ricVocabulary,
): CompiledDiagram {
  const diagram = parseDiagram(source, vocabulary, options.parse);
  const relations = resolveRelations(diagram, vocabulary, options.resolver);
  const blocks = assembleBlocks(
    [...diagram.individualCells.map(({ individual }) => individual), ...relations.map(({ relation }) => relation)],
    vocabulary,
    options.sanitiser,
  );

  return {
    diagram,
    relations,
    blocks,
    report: summarizeConversion(diagram, relations, blocks, vocabulary),
  };
}

export function convertDrawioToOwl(
  source: string,
  options: ConversionOptions = defaultConversionOptions(),
  vocabulary: Vocabulary = ricVocabulary,
  generatedAt: Date = new Date(),
): string {
  const { blocks } = compileDrawio(source, options, vocabulary);
  return serialise(blocks, vocabulary, options.serialisation, generatedAt);
}
