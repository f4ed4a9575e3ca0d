import { deflateRawSync } from "node:zlib";
import type { Point } from "../types.js";

export interface CellSpec {
  id: string;
  parent?: string | null;
  value?: string;
  style?: string;
  source?: string;
  target?: string;
  edge?: boolean;
  geometry?: { x?: number; y?: number; width?: number; height?: number };
  sourcePoint?: Point;
  targetPoint?: Point;
}

function escapeAttribute(value: string): string {
  return value.replace(/&/gu, "&amp;").replace(/</gu, "&lt;").replace(/>/gu, "&gt;").replace(/"/gu, "&quot;");
}

function attribute(name: string, value: string | number | undefined): string {
  return value === undefined ? "" : ` ${name}="${escapeAttribute(String(value))}"`;
}

export function cellXml(cell: CellSpec): string {
  const parent = cell.parent === null ? undefined : cell.parent ?? "1";
  const head =
    `<mxCell${attribute("id", cell.id)}${attribute("value", cell.value)}${attribute("style", cell.style)}` +
    `${cell.edge ? ' edge="1"' : ' vertex="1"'}${attribute("parent", parent)}` +
    `${attribute("source", cell.source)}${attribute("target", cell.target)}`;

  const points = [
    cell.sourcePoint ? `<mxPoint x="${cell.sourcePoint.x}" y="${cell.sourcePoint.y}" as="sourcePoint"/>` : "",
    cell.targetPoint ? `<mxPoint x="${cell.targetPoint.x}" y="${cell.targetPoint.y}" as="targetPoint"/>` : "",
  ].join("");

  if (cell.edge) {
    return `${head}><mxGeometry relative="1" as="geometry">${points}</mxGeometry></mxCell>`;
  }
  if (!cell.geometry) {
    return `${head}/>`;
  }
  const { x, y, width, height } = cell.geometry;
  return `${head}><mxGeometry${attribute("x", x)}${attribute("y", y)}${attribute("width", width)}${attribute("height", height)} as="geometry"/></mxCell>`;
}

export function graphModel(cells: CellSpec[]): string {
  return `<mxGraphModel><root><mxCell id="0"/><mxCell id="1" parent="0"/>${cells.map(cellXml).join("")}</root></mxGraphModel>`;
}

export function drawio(cells: CellSpec[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>\n<mxfile host="test"><diagram id="page-1" name="Page-1">${graphModel(cells)}</diagram></mxfile>`;
}

export function compressedDrawio(cells: CellSpec[]): string {
  const payload = deflateRawSync(Buffer.from(encodeURIComponent(graphModel(cells)), "utf8")).toString("base64");
  return `<mxfile host="test"><diagram id="page-1" name="Page-1">${payload}</diagram></mxfile>`;
}

export function group(id: string, label: string, x: number, y: number, width = 120, height = 60, parent = "1"): CellSpec {
  return {
    id,
    parent,
    value: label,
    style: "rounded=0;whiteSpace=wrap;html=1;container=1;",
    geometry: { x, y, width, height },
  };
}

export function typeCell(id: string, parent: string, label: string): CellSpec {
  return {
    id,
    parent,
    value: label,
    style: "text;html=1;",
    geometry: { x: 10, y: 10, width: 100, height: 20 },
  };
}

export function literal(id: string, label: string, x: number, y: number, width = 80, height = 40): CellSpec {
  return {
    id,
    value: label,
    style: "ellipse;whiteSpace=wrap;html=1;",
    geometry: { x, y, width, height },
  };
}

export function arrow(id: string, label: string, link: Partial<Pick<CellSpec, "source" | "target" | "sourcePoint" | "targetPoint" | "parent">>): CellSpec[] {
  return [
    { id, value: "", style: "edgeStyle=orthogonalEdgeStyle;html=1;", edge: true, ...link },
    {
      id: `${id}-label`,
      parent: id,
      value: label,
      style: "edgeLabel;html=1;align=center;",
      geometry: { x: -0.1 },
    },
  ];
}

/** Jane Doe (Person) born in Oslo (Place), linked explicitly. */
export function birthPlaceDiagram(): CellSpec[] {
  return [
    group("jane", "Jane Doe", 40, 40),
    typeCell("jane-type", "jane", "rico:Person"),
    group("oslo", "Oslo", 400, 40),
    typeCell("oslo-type", "oslo", "rico:Place"),
    ...arrow("born", "rico:hasBirthPlace", { source: "jane-type", target: "oslo-type" }),
  ];
}
