import type { EndpointSide } from "./types.js";

export type ErrorKind = "structural" | "vocabulary" | "resolution" | "sanitisation" | "configuration";

export class ConversionError extends Error {
  readonly kind: ErrorKind;
  readonly suggestion?: string;

  constructor(kind: ErrorKind, message: string, suggestion?: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.suggestion = suggestion;
  }
}

export class StructuralError extends ConversionError {
  constructor(message: string) {
    super("structural", message);
  }
}

export class NothingToParseError extends StructuralError {
  constructor() {
    super("The draw.io graph passed in appears to be empty");
  }
}

export class VocabularyError extends ConversionError {
  readonly token: string;

  constructor(token: string, message: string) {
    super("vocabulary", message);
    this.token = token;
  }
}

export interface ResolutionErrorDetails {
  label: string;
  cellId: string;
  side: EndpointSide;
  strict: boolean;
}

function resolutionSuggestion(strict: boolean): string {
  if (strict) {
    return (
      "Try to lock the arrow to an individual node in the original graph, or edit the underlying XML " +
      "to indicate the endpoint. Alternatively run without strict mode, optionally tuning --max-gap."
    );
  }
  return (
    "Consider raising --max-gap to widen the recognised gap between a node and an arrow end, " +
    "lock the arrow to an individual node in the original graph, or edit the underlying XML " +
    "to indicate the endpoint."
  );
}

export class ResolutionError extends ConversionError {
  readonly details: ResolutionErrorDetails;

  constructor(details: ResolutionErrorDetails, message: string) {
    super("resolution", message, resolutionSuggestion(details.strict));
    this.details = details;
  }
}

export class SanitisationError extends ConversionError {
  readonly label: string;

  constructor(label: string, message: string, suggestion: string) {
    super("sanitisation", message, suggestion);
    this.label = label;
  }
}

export class ConfigurationError extends ConversionError {
  constructor(message: string) {
    super("configuration", message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof ConversionError) {
    return error.suggestion ? `${error.message}. ${error.suggestion}` : error.message;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `An unexpected error occurred: ${message}`;
}
