import { StructuralError, VocabularyError } from "../errors.js";
import type {
  Cell,
  Individual,
  IndividualCell,
  LiteralCell,
  ParseOptions,
  ParsedDiagram,
  RelationCell,
  Vocabulary,
  XmlElement,
} from "../types.js";
import { namespacePrefix } from "../vocabulary/ric.js";
import { DEFAULT_PARSE_OPTIONS, EDGE_LABEL_STYLE } from "./defaults.js";
import { graphModelRoot } from "./document.js";
import { absoluteBounds, edgePoint, isTopLevel } from "./geometry.js";
import { extractLabelText } from "./label.js";

const CELL_TAG = "mxCell";

function toCell(element: XmlElement, index: number): Cell {
  if (element.tag !== CELL_TAG) {
    throw new StructuralError(`Could not parse XML tree: expecting an element with tag '${CELL_TAG}', but had tag '${element.tag}'`);
  }
  const { id, parent, value, style, source, target } = element.attributes;
  if (id === undefined || id === "") {
    throw new StructuralError(`Could not parse XML tree: found an '${CELL_TAG}' element at position ${index} with no id`);
  }
  return {
    id,
    index,
    parentId: parent,
    value,
    style: style ?? "",
    sourceId: source,
    targetId: target,
    element,
  };
}

export function labelOf(cell: Cell): string | undefined {
  if (cell.value === undefined) {
    return undefined;
  }
  return extractLabelText(cell.value.trim());
}

export function parentOf(cell: Cell, cells: Map<string, Cell>): Cell {
  if (cell.parentId === undefined) {
    throw new StructuralError(
      `Could not parse XML tree: found an '${CELL_TAG}' element with the following id which has a namespaced value but no parent: ${cell.id}`,
    );
  }
  const parent = cells.get(cell.parentId);
  if (!parent) {
    throw new StructuralError(`No cell with id: ${cell.parentId}`);
  }
  return parent;
}

export function splitClassNames(label: string, prefix: string): string[] {
  return label
    .split(prefix)
    .map((part) => part.trim().replace(/[,;]+$/u, "").trim())
    .filter(Boolean);
}

function edgeLabelCarrier(cell: Cell, childrenByParent: Map<string, Cell[]>): string | undefined {
  for (const child of childrenByParent.get(cell.id) ?? []) {
    if (!child.style.includes(EDGE_LABEL_STYLE)) {
      continue;
    }
    const label = labelOf(child);
    if (label !== undefined) {
      return label;
    }
  }
  return undefined;
}

function relationCell(cell: Cell, label: string): RelationCell {
  return {
    cell,
    start: edgePoint(cell, "sourcePoint"),
    end: edgePoint(cell, "targetPoint"),
    label,
  };
}

export function parseDiagram(
  source: string,
  vocabulary: Vocabulary,
  options: ParseOptions = DEFAULT_PARSE_OPTIONS,
): ParsedDiagram {
  const container = graphModelRoot(source);
  const prefix = namespacePrefix(vocabulary);

  const ordered = container.children.map((element, index) => toCell(element, index));
  const cells = new Map<string, Cell>();
  const childrenByParent = new Map<string, Cell[]>();
  for (const cell of ordered) {
    if (!cells.has(cell.id)) {
      cells.set(cell.id, cell);
    }
    if (cell.parentId !== undefined) {
      const siblings = childrenByParent.get(cell.parentId) ?? [];
      siblings.push(cell);
      childrenByParent.set(cell.parentId, siblings);
    }
  }

  const individualCells: IndividualCell[] = [];
  const relationCells: RelationCell[] = [];
  const literalCells: LiteralCell[] = [];
  const individualIdentifiers = new Set<string>();

  for (const cell of ordered) {
    const label = labelOf(cell);
    if (label === undefined) {
      continue;
    }

    if (!label) {
      const carried = edgeLabelCarrier(cell, childrenByParent);
      if (carried !== undefined) {
        relationCells.push(relationCell(cell, carried));
      }
      continue;
    }

    if (!label.startsWith(prefix)) {
      if (cell.style.includes(options.literalStyle) && isTopLevel(cell, cells)) {
        literalCells.push({ cell, label, bounds: absoluteBounds(cell, cells) });
      }
      continue;
    }

    const parent = parentOf(cell, cells);
    const identifier = labelOf(parent);
    if (identifier === undefined) {
      // a label carrier stands for its edge when the edge has no value of its own
      relationCells.push(relationCell(cell.style.includes(EDGE_LABEL_STYLE) ? parent : cell, label));
      continue;
    }
    if (!identifier) {
      continue;
    }

    const classNames = splitClassNames(label, prefix);
    const bounds = absoluteBounds(parent, cells);
    for (const className of classNames) {
      if (!vocabulary.classes.has(className)) {
        throw new VocabularyError(className, `Not a ${vocabulary.prefix} class: ${className} (in cell '${cell.id}' of '${identifier}')`);
      }
      const individual: Individual = { kind: "individual", identifier, className };
      individualCells.push({ cell, individual, bounds });
      individualIdentifiers.add(identifier);
    }
  }

  return {
    cells,
    individualCells,
    relationCells,
    literalCells,
    individualIdentifiers,
  };
}
