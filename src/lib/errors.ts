export type ExtractionErrorKind =
  | "ScriptNotFound"
  | "PayloadExtractionFailed"
  | "PayloadParseFailed"
  | "SignatureNotFound"
  | "RequiredFieldMissing"
  | "StructureTooDeep";

/**
 * Raised when a list page cannot be turned into list data.
 * `kind` tells "no payload" apart from "broken JSON" and "payload shape changed".
 */
export class ListExtractionError extends Error {
  readonly kind: ExtractionErrorKind;

  constructor(kind: ExtractionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ListExtractionError";
    this.kind = kind;
  }
}

export function isListExtractionError(err: unknown): err is ListExtractionError {
  return err instanceof ListExtractionError;
}
