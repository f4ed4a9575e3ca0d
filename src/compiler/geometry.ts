import { StructuralError } from "../errors.js";
import type { Bounds, Cell, Point, XmlElement } from "../types.js";

export type PointRole = "sourcePoint" | "targetPoint";

function coordinate(element: XmlElement, name: string, owner: string): number {
  const raw = element.attributes[name];
  // the editor omits zero coordinates
  if (raw === undefined || raw === "") {
    return 0;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new StructuralError(`Expecting a numeric '${name}' on the ${element.tag} element of cell '${owner}', got '${raw}'`);
  }
  return value;
}

function requiredDimension(element: XmlElement, name: string, owner: string): number {
  if (element.attributes[name] === undefined) {
    throw new StructuralError(
      `Expecting the mxGeometry element of the cell with the following id to have a '${name}' attribute, but it does not: ${owner}`,
    );
  }
  return coordinate(element, name, owner);
}

export function geometryOf(cell: Cell): XmlElement | undefined {
  return cell.element.children.find((child) => child.tag === "mxGeometry");
}

export function requireGeometry(cell: Cell): XmlElement {
  const geometry = geometryOf(cell);
  if (!geometry) {
    throw new StructuralError(`Expecting the cell with the following id to have an mxGeometry sub-element: ${cell.id}`);
  }
  return geometry;
}

export function relativeBounds(cell: Cell): Bounds {
  const geometry = requireGeometry(cell);
  return {
    x: coordinate(geometry, "x", cell.id),
    y: coordinate(geometry, "y", cell.id),
    width: requiredDimension(geometry, "width", cell.id),
    height: requiredDimension(geometry, "height", cell.id),
  };
}

/**
 * Reads the `sourcePoint`/`targetPoint` of an edge. A missing point is not an
 * error: edges locked to a node carry a link instead.
 */
export function edgePoint(cell: Cell, role: PointRole): Point | undefined {
  const geometry = geometryOf(cell);
  if (!geometry) {
    return undefined;
  }

  for (const element of geometry.children) {
    if (element.tag !== "mxPoint") {
      continue;
    }
    const as = element.attributes.as;
    if (as === undefined) {
      throw new StructuralError(`Expecting the mxPoint elements of cell '${cell.id}' to have an 'as' attribute, but one does not`);
    }
    if (as !== role) {
      continue;
    }
    return {
      x: coordinate(element, "x", cell.id),
      y: coordinate(element, "y", cell.id),
    };
  }
  return undefined;
}

/** A layer (child of the root cell) or the root itself: the absolute origin. */
export function isOriginCell(cell: Cell | undefined, cells: Map<string, Cell>): boolean {
  if (!cell || cell.parentId === undefined) {
    return true;
  }
  const parent = cells.get(cell.parentId);
  return !parent || parent.parentId === undefined;
}

export function isTopLevel(cell: Cell, cells: Map<string, Cell>): boolean {
  return cell.parentId === undefined || isOriginCell(cells.get(cell.parentId), cells);
}

/**
 * Absolute position of the coordinate system a cell's children are laid out
 * in. Group geometry is relative to the enclosing group, so the chain is
 * walked up to the layer.
 */
export function absoluteOrigin(cell: Cell | undefined, cells: Map<string, Cell>, visiting: Set<string> = new Set()): Point {
  if (!cell || isOriginCell(cell, cells)) {
    return { x: 0, y: 0 };
  }
  if (visiting.has(cell.id)) {
    throw new StructuralError(`Cyclic parent reference involving the cell with id: ${cell.id}`);
  }
  visiting.add(cell.id);

  const geometry = requireGeometry(cell);
  const parent = cell.parentId === undefined ? undefined : cells.get(cell.parentId);
  const base = absoluteOrigin(parent, cells, visiting);
  return {
    x: base.x + coordinate(geometry, "x", cell.id),
    y: base.y + coordinate(geometry, "y", cell.id),
  };
}

export function absoluteBounds(cell: Cell, cells: Map<string, Cell>): Bounds {
  const own = relativeBounds(cell);
  const parent = cell.parentId === undefined ? undefined : cells.get(cell.parentId);
  const base = absoluteOrigin(parent, cells, new Set([cell.id]));
  return { ...own, x: base.x + own.x, y: base.y + own.y };
}

export function absolutePoint(point: Point, edge: Cell, cells: Map<string, Cell>): Point {
  const parent = edge.parentId === undefined ? undefined : cells.get(edge.parentId);
  const base = absoluteOrigin(parent, cells, new Set([edge.id]));
  return { x: base.x + point.x, y: base.y + point.y };
}

export function closeEnough(point: Point, bounds: Bounds, maxGap: number): boolean {
  return (
    bounds.x - maxGap <= point.x &&
    point.x <= bounds.x + bounds.width + maxGap &&
    bounds.y - maxGap <= point.y &&
    point.y <= bounds.y + bounds.height + maxGap
  );
}
