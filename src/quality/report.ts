import type { ConversionReport, EntityBlocks, ParsedDiagram, ResolvedRelation, Vocabulary } from "../types.js";
import { propertyKind } from "../vocabulary/ric.js";

export function summarizeConversion(
  diagram: ParsedDiagram,
  relations: ResolvedRelation[],
  blocks: EntityBlocks,
  vocabulary: Vocabulary,
): ConversionReport {
  const warnings: string[] = [];
  let proximityEndpoints = 0;

  for (const resolved of relations) {
    if (resolved.source === "proximity") {
      proximityEndpoints += 1;
    }
    if (resolved.target === "proximity") {
      proximityEndpoints += 1;
    }

    const { relation } = resolved;
    if (propertyKind(vocabulary, relation.name) === "object" && !diagram.individualIdentifiers.has(relation.target)) {
      warnings.push(
        `Arrow '${resolved.cellId}' (${vocabulary.prefix}:${relation.name}) targets '${relation.target}', which is not an individual of the diagram`,
      );
    }
  }

  return {
    individuals: diagram.individualIdentifiers.size,
    relations: relations.length,
    blocks: blocks.size,
    literalShapes: diagram.literalCells.length,
    proximityEndpoints,
    warnings,
  };
}

export function formatReport(report: ConversionReport): string {
  const lines = [
    `individuals: ${report.individuals}`,
    `relations: ${report.relations}`,
    `blocks: ${report.blocks}`,
    `literal shapes: ${report.literalShapes}`,
    `endpoints resolved by proximity: ${report.proximityEndpoints}`,
  ];
  for (const warning of report.warnings) {
    lines.push(`warning: ${warning}`);
  }
  return `${lines.join("\n")}\n`;
}
