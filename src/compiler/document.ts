import { inflateRawSync } from "node:zlib";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { NothingToParseError, StructuralError } from "../errors.js";
import type { XmlElement } from "../types.js";

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  preserveOrder: true,
  parseAttributeValue: false,
  parseTagValue: false,
  processEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

function toAttributes(raw: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(raw)) {
    return out;
  }
  for (const [key, value] of Object.entries(raw)) {
    out[key] = String(value);
  }
  return out;
}

function toElements(nodes: unknown): { elements: XmlElement[]; text: string } {
  const elements: XmlElement[] = [];
  let text = "";
  if (!Array.isArray(nodes)) {
    return { elements, text };
  }

  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) {
        continue;
      }
      if (key === TEXT_KEY) {
        text += String(value);
        continue;
      }
      const inner = toElements(value);
      elements.push({
        tag: key,
        attributes: toAttributes(node[ATTRIBUTES_KEY]),
        children: inner.elements,
        text: inner.text,
      });
    }
  }

  return { elements, text };
}

export function parseXmlDocument(source: string): XmlElement[] {
  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new StructuralError(`Could not parse XML (line ${line}, column ${col}): ${msg}`);
  }
  return toElements(xmlParser.parse(source)).elements;
}

/**
 * draw.io desktop stores each page as `encodeURIComponent(xml)`, raw-deflated
 * and base64-encoded, in the text of the `<diagram>` element.
 */
export function inflateDiagram(diagram: XmlElement): XmlElement | undefined {
  const payload = diagram.text.trim();
  if (!payload) {
    return undefined;
  }

  let xml: string;
  try {
    const inflated = inflateRawSync(Buffer.from(payload, "base64")).toString("utf8");
    xml = decodeURIComponent(inflated);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new StructuralError(
      `Could not decompress the content of the '${diagram.tag}' element with id '${diagram.attributes.id ?? ""}': ${message}`,
    );
  }

  const elements = parseXmlDocument(xml);
  return elements[0];
}

/**
 * Finds the element whose children are the diagram cells, three levels below
 * the document root (`mxfile > diagram > mxGraphModel > root`).
 */
export function graphModelRoot(source: string): XmlElement {
  if (!source.trim()) {
    throw new NothingToParseError();
  }

  const documentRoot: XmlElement | undefined = parseXmlDocument(source)[0];
  const diagram: XmlElement | undefined = documentRoot?.children[0];
  if (!diagram) {
    throw new NothingToParseError();
  }

  const model: XmlElement | undefined = diagram.children[0] ?? inflateDiagram(diagram);
  const container: XmlElement | undefined = model?.children[0];
  if (!container || container.children.length === 0) {
    throw new NothingToParseError();
  }
  return container;
}
