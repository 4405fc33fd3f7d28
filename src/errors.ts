// Error codes and the CborError hierarchy

import type { Header } from "./header.js";
import { Major, InfoFormat, LogicalType, majorName, formatName } from "./types.js";

export const ERR_NOT_WELL_FORMED        = "ERR_NOT_WELL_FORMED";
export const ERR_STRUCTURE              = "ERR_STRUCTURE";
export const ERR_DEPTH                  = "ERR_DEPTH";
export const ERR_INCORRECT_MAJOR        = "ERR_INCORRECT_MAJOR";
export const ERR_INCORRECT_LOGICAL_TYPE = "ERR_INCORRECT_LOGICAL_TYPE";
export const ERR_INCORRECT_FORMAT       = "ERR_INCORRECT_FORMAT";
export const ERR_NO_SUCH_ELEMENT        = "ERR_NO_SUCH_ELEMENT";
export const ERR_ARGUMENT               = "ERR_ARGUMENT";
export const ERR_OVERFLOW               = "ERR_OVERFLOW";

/**
 * Broad grouping of failures for callers that only need to tell bad input
 * apart from bad calls and from numbers that do not fit.
 */
export type ErrorCategory = "malformed" | "misuse" | "overflow";

export class CborError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  constructor(code: string, category: ErrorCategory, msg?: string) {
    super(msg || code);
    this.code = code;
    this.category = category;
    this.name = "CborError";
  }
}

/** Input is not well-formed CBOR: reserved bits, truncation, bad UTF-8. */
export class CborNotWellFormedError extends CborError {
  constructor(msg?: string) {
    super(ERR_NOT_WELL_FORMED, "malformed", msg);
    this.name = "CborNotWellFormedError";
  }
}

/** Well-formed events in an impossible order, such as a stray break. */
export class CborStructureError extends CborError {
  constructor(msg?: string) {
    super(ERR_STRUCTURE, "malformed", msg);
    this.name = "CborStructureError";
  }
}

export class CborDepthError extends CborError {
  readonly maxDepth: number;
  constructor(maxDepth: number) {
    super(ERR_DEPTH, "malformed", `nesting exceeds maximum depth of ${maxDepth}`);
    this.maxDepth = maxDepth;
    this.name = "CborDepthError";
  }
}

/**
 * The caller asked for an interpretation the event does not support. Raised
 * before a parser moves, so the same event can be read another way.
 */
export abstract class CborTypeMismatchError<T> extends CborError {
  readonly header: Header;
  readonly expected: readonly T[];
  protected constructor(
    code: string,
    header: Header,
    expected: readonly T[],
    what: string,
    name: (value: T) => string,
    actual: T,
  ) {
    const wanted = expected.length === 1
      ? name(expected[0])
      : `one of ${expected.map(name).join(", ")}`;
    super(code, "misuse", `expected ${what} ${wanted} but found ${name(actual)} (${header})`);
    this.header = header;
    this.expected = expected;
  }
}

export class CborIncorrectMajorTypeError extends CborTypeMismatchError<Major> {
  constructor(header: Header, ...expected: Major[]) {
    super(ERR_INCORRECT_MAJOR, header, expected, "major type", majorName, header.major);
    this.name = "CborIncorrectMajorTypeError";
  }
}

export class CborIncorrectLogicalTypeError extends CborTypeMismatchError<LogicalType> {
  constructor(header: Header, ...expected: LogicalType[]) {
    super(ERR_INCORRECT_LOGICAL_TYPE, header, expected, "logical type", String, header.logicalType);
    this.name = "CborIncorrectLogicalTypeError";
  }
}

export class CborIncorrectAdditionalInfoFormatError extends CborTypeMismatchError<InfoFormat> {
  constructor(header: Header, ...expected: InfoFormat[]) {
    super(ERR_INCORRECT_FORMAT, header, expected, "additional info format", formatName, header.format);
    this.name = "CborIncorrectAdditionalInfoFormatError";
  }
}

export class CborNoSuchElementError extends CborError {
  constructor(msg?: string) {
    super(ERR_NO_SUCH_ELEMENT, "misuse", msg ?? "no more events");
    this.name = "CborNoSuchElementError";
  }
}

/** A factory or writer was handed a value it cannot encode. */
export class CborArgumentError extends CborError {
  constructor(msg?: string) {
    super(ERR_ARGUMENT, "misuse", msg);
    this.name = "CborArgumentError";
  }
}

/** A numeric interpretation does not fit the requested width. */
export class CborOverflowError extends CborError {
  constructor(msg?: string) {
    super(ERR_OVERFLOW, "overflow", msg);
    this.name = "CborOverflowError";
  }
}
