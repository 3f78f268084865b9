/**
 * Error taxonomy raised while loading a plWordNet export. Every class exposes
 * a stable `code` and a structured `details` payload so callers (the CLI, a
 * service wrapping the loader, tests) can react without parsing messages.
 *
 * Dangling identifiers never raise: the view layer resolves them to `null` or
 * drops them.
 */
export const WORDNET_ERROR_CODES = {
  IO: "E-WN-IO",
  MALFORMED_XML: "E-WN-XML",
  INVALID_ATTRIBUTE: "E-WN-ATTRIBUTE",
  MISSING_ROOT: "E-WN-ROOT",
  UNEXPECTED_ELEMENT: "E-WN-ELEMENT",
  TRUNCATED: "E-WN-TRUNCATED",
} as const;

/** Union of every code emitted by {@link WordNetError} subclasses. */
export type WordNetErrorCode = (typeof WORDNET_ERROR_CODES)[keyof typeof WORDNET_ERROR_CODES];

/** Base class shared by all fatal load errors. */
export class WordNetError extends Error {
  public readonly code: WordNetErrorCode;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: WordNetErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options: { cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "WordNetError";
    this.code = code;
    this.details = details;
  }
}

/** The byte source could not be opened or read. */
export class WordNetIoError extends WordNetError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(WORDNET_ERROR_CODES.IO, `cannot read '${path}': ${reason}`, { path }, { cause });
    this.name = "WordNetIoError";
  }
}

/** Position reported by the tokenizer when it rejects the input. */
export interface XmlPosition {
  readonly line: number;
  readonly column: number;
  /** Offset in UTF-16 code units (not bytes) from the start of the decoded document. */
  readonly characterOffset: number;
}

/** The tokenizer rejected the document syntax. */
export class MalformedXmlError extends WordNetError {
  constructor(
    readonly reason: string,
    readonly position: XmlPosition,
  ) {
    super(
      WORDNET_ERROR_CODES.MALFORMED_XML,
      `malformed XML at line ${position.line}, column ${position.column}: ${reason}`,
      { reason, ...position },
    );
    this.name = "MalformedXmlError";
  }
}

/** A numeric attribute (or synset member id) is present but cannot be parsed. */
export class InvalidAttributeValueError extends WordNetError {
  constructor(
    readonly tag: string,
    readonly field: string,
    readonly rawValue: string,
  ) {
    super(
      WORDNET_ERROR_CODES.INVALID_ATTRIBUTE,
      `invalid value '${rawValue}' for '${field}' on <${tag}>`,
      { tag, field, rawValue },
    );
    this.name = "InvalidAttributeValueError";
  }
}

/** The root container never opened, or content appeared before it. */
export class MissingRootError extends WordNetError {
  constructor(
    readonly rootTag: string,
    readonly offendingTag: string | null = null,
  ) {
    super(
      WORDNET_ERROR_CODES.MISSING_ROOT,
      offendingTag === null
        ? `document ended without a <${rootTag}> root`
        : `<${offendingTag}> appeared before the <${rootTag}> root`,
      { rootTag, offendingTag },
    );
    this.name = "MissingRootError";
  }
}

/** Element encountered where no transition accepts it. */
export class UnexpectedElementError extends WordNetError {
  constructor(
    readonly tag: string,
    readonly context: string,
  ) {
    super(WORDNET_ERROR_CODES.UNEXPECTED_ELEMENT, `unexpected element <${tag}> (context: ${context})`, {
      tag,
      context,
    });
    this.name = "UnexpectedElementError";
  }
}

/**
 * The event sequence stopped before its end-of-input event, or ended while a
 * synset or relation type was still open.
 */
export class TruncatedDocumentError extends WordNetError {
  constructor(readonly context: string) {
    super(WORDNET_ERROR_CODES.TRUNCATED, `document ended prematurely (context: ${context})`, { context });
    this.name = "TruncatedDocumentError";
  }
}
