export interface Point {
  x: number;
  y: number;
}

export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface XmlElement {
  tag: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  text: string;
}

export interface Cell {
  id: string;
  index: number;
  parentId?: string;
  value?: string;
  style: string;
  sourceId?: string;
  targetId?: string;
  element: XmlElement;
}

export interface Individual {
  kind: "individual";
  identifier: string;
  className: string;
}

export interface Relation {
  kind: "relation";
  name: string;
  source: string;
  target: string;
}

export type DiagramItem = Individual | Relation;

export interface IndividualCell {
  cell: Cell;
  individual: Individual;
  bounds: Bounds;
}

export interface RelationCell {
  cell: Cell;
  start?: Point;
  end?: Point;
  label: string;
}

export interface LiteralCell {
  cell: Cell;
  label: string;
  bounds: Bounds;
}

export interface ParsedDiagram {
  cells: Map<string, Cell>;
  individualCells: IndividualCell[];
  relationCells: RelationCell[];
  literalCells: LiteralCell[];
  individualIdentifiers: Set<string>;
}

export type EndpointSide = "source" | "target";
export type EndpointResolution = "linked" | "proximity";

export interface ResolvedRelation {
  relation: Relation;
  cellId: string;
  source: EndpointResolution;
  target: EndpointResolution;
}

export type PropertyKind = "object" | "datatype";

export interface EntityKey {
  identifier: string;
  label: string;
}

export interface Fact {
  kind: PropertyKind;
  values: Set<string>;
}

export interface EntityBlock {
  key: EntityKey;
  types: Set<string>;
  facts: Map<string, Fact>;
}

export type EntityBlocks = Map<string, EntityBlock>;

export type CapitalisationScheme = "upper-camel" | "lower-camel" | "flat" | "none";
export type BlanketSubstitution = "remove" | "url";

export interface SubstitutionRules {
  blanket?: BlanketSubstitution;
  replacements: Readonly<Record<string, string>>;
}

export interface SanitiserConfig {
  capitalisation: CapitalisationScheme;
  substitutions: SubstitutionRules;
}

export interface SerialisationConfig {
  inferLiteralTypes: boolean;
  includePreamble: boolean;
  ontologyIri?: string;
  prefix?: string;
  prefixIri?: string;
  indentation: number;
  includeLabel: boolean;
}

export interface ResolverOptions {
  maxGap: number;
  strict: boolean;
}

export interface ParseOptions {
  literalStyle: string;
}

export interface ConversionOptions {
  parse: ParseOptions;
  resolver: ResolverOptions;
  sanitiser: SanitiserConfig;
  serialisation: SerialisationConfig;
}

export interface ConversionOverrides {
  parse?: Partial<ParseOptions>;
  resolver?: Partial<ResolverOptions>;
  sanitiser?: {
    capitalisation?: CapitalisationScheme;
    rules?: string[];
  };
  serialisation?: Partial<SerialisationConfig>;
}

export interface Vocabulary {
  prefix: string;
  iri: string;
  importIri: string;
  classes: ReadonlySet<string>;
  objectProperties: ReadonlySet<string>;
  datatypeProperties: ReadonlySet<string>;
}

export interface ConversionReport {
  individuals: number;
  relations: number;
  blocks: number;
  literalShapes: number;
  proximityEndpoints: number;
  warnings: string[];
}
