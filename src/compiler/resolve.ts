import { ConfigurationError, ResolutionError, VocabularyError } from "../errors.js";
import type {
  Bounds,
  Cell,
  DiagramItem,
  EndpointResolution,
  EndpointSide,
  ParsedDiagram,
  Point,
  Relation,
  RelationCell,
  ResolvedRelation,
  ResolverOptions,
  Vocabulary,
} from "../types.js";
import { namespacePrefix } from "../vocabulary/ric.js";
import { DEFAULT_RESOLVER_OPTIONS } from "./defaults.js";
import { absolutePoint, closeEnough } from "./geometry.js";
import { labelOf, parentOf } from "./parse.js";

export interface Candidate {
  cell: Cell;
  bounds: Bounds;
}

interface Endpoint {
  cell: Cell;
  resolution: EndpointResolution;
}

function proximityCandidates(diagram: ParsedDiagram): Candidate[] {
  const candidates: Candidate[] = [
    ...diagram.individualCells.map(({ cell, bounds }) => ({ cell, bounds })),
    ...diagram.literalCells.map(({ cell, bounds }) => ({ cell, bounds })),
  ];
  return candidates.sort((a, b) => a.cell.index - b.cell.index);
}

export function cellCloseTo(point: Point, candidates: Candidate[], maxGap: number): Cell | undefined {
  return candidates.find((candidate) => closeEnough(point, candidate.bounds, maxGap))?.cell;
}

export function relationName(label: string, vocabulary: Vocabulary): string {
  const trimmed = label.trim();
  const prefix = namespacePrefix(vocabulary);
  if (!trimmed.startsWith(prefix)) {
    throw new VocabularyError(trimmed, `An arrow has label '${trimmed}', which does not start with ${prefix}`);
  }
  return trimmed.slice(prefix.length).trim();
}

function missingEndpoint(data: RelationCell, side: EndpointSide, strict: boolean, reason: string): ResolutionError {
  return new ResolutionError(
    { label: data.label, cellId: data.cell.id, side, strict },
    `The mxCell element with id '${data.cell.id}' and label '${data.label}' seems to be an arrow, but has no ${side}${reason}`,
  );
}

function resolveEndpoint(
  data: RelationCell,
  side: EndpointSide,
  diagram: ParsedDiagram,
  candidates: Candidate[],
  options: ResolverOptions,
): Endpoint {
  const linkedId = side === "source" ? data.cell.sourceId : data.cell.targetId;
  if (linkedId !== undefined) {
    const linked = diagram.cells.get(linkedId);
    if (!linked) {
      throw missingEndpoint(data, side, options.strict, ` (it is linked to the unknown cell '${linkedId}')`);
    }
    return { cell: linked, resolution: "linked" };
  }

  if (options.strict) {
    throw missingEndpoint(data, side, true, "");
  }

  const point = side === "source" ? data.start : data.end;
  if (!point) {
    throw missingEndpoint(data, side, false, ` (it is neither linked nor has a ${side} point)`);
  }

  const nearby = cellCloseTo(absolutePoint(point, data.cell, diagram.cells), candidates, options.maxGap);
  if (!nearby) {
    throw missingEndpoint(data, side, false, "");
  }
  return { cell: nearby, resolution: "proximity" };
}

/**
 * The identifier or literal an arrow end stands for: a type declaration
 * stands for the individual named by its enclosing group.
 */
export function endpointValue(cell: Cell, diagram: ParsedDiagram, vocabulary: Vocabulary): string | undefined {
  const label = labelOf(cell);
  if (label === undefined) {
    return undefined;
  }
  if (!label.startsWith(namespacePrefix(vocabulary))) {
    return label;
  }
  return labelOf(parentOf(cell, diagram.cells));
}

export function resolveRelation(
  data: RelationCell,
  diagram: ParsedDiagram,
  vocabulary: Vocabulary,
  options: ResolverOptions = DEFAULT_RESOLVER_OPTIONS,
  candidates: Candidate[] = proximityCandidates(diagram),
): ResolvedRelation {
  const resolveSide = (side: EndpointSide): { value: string; resolution: EndpointResolution } => {
    const endpoint = resolveEndpoint(data, side, diagram, candidates, options);
    const value = endpointValue(endpoint.cell, diagram, vocabulary);
    if (value === undefined || !value.trim()) {
      throw missingEndpoint(data, side, options.strict, ` (its ${side} cell '${endpoint.cell.id}' has no label)`);
    }
    return { value, resolution: endpoint.resolution };
  };

  const source = resolveSide("source");
  const target = resolveSide("target");

  if (!diagram.individualIdentifiers.has(source.value)) {
    throw new ResolutionError(
      { label: data.label, cellId: data.cell.id, side: "source", strict: options.strict },
      `The arrow with id '${data.cell.id}' and label '${data.label}' has source '${source.value}', which is not an individual`,
    );
  }

  const relation: Relation = {
    kind: "relation",
    name: relationName(data.label, vocabulary),
    source: source.value,
    target: target.value,
  };
  return {
    relation,
    cellId: data.cell.id,
    source: source.resolution,
    target: target.resolution,
  };
}

export function resolveRelations(
  diagram: ParsedDiagram,
  vocabulary: Vocabulary,
  options: ResolverOptions = DEFAULT_RESOLVER_OPTIONS,
): ResolvedRelation[] {
  if (!Number.isFinite(options.maxGap) || options.maxGap < 0) {
    throw new ConfigurationError(`The maximum gap must be a non-negative number, got ${options.maxGap}`);
  }
  const candidates = proximityCandidates(diagram);
  return diagram.relationCells.map((data) => resolveRelation(data, diagram, vocabulary, options, candidates));
}

export function individualsAndRelations(
  diagram: ParsedDiagram,
  vocabulary: Vocabulary,
  options: ResolverOptions = DEFAULT_RESOLVER_OPTIONS,
): DiagramItem[] {
  return [
    ...diagram.individualCells.map(({ individual }) => individual),
    ...resolveRelations(diagram, vocabulary, options).map(({ relation }) => relation),
  ];
}
