export { Major, InfoFormat, LogicalType, ARGUMENT_BYTES, majorName, formatName } from "./types.js";
export { MAX_UINT64, INDEFINITE_COUNT, DEFAULT_MAX_DEPTH } from "./constants.js";

export {
  CborError,
  CborNotWellFormedError,
  CborStructureError,
  CborDepthError,
  CborTypeMismatchError,
  CborIncorrectMajorTypeError,
  CborIncorrectLogicalTypeError,
  CborIncorrectAdditionalInfoFormatError,
  CborNoSuchElementError,
  CborArgumentError,
  CborOverflowError,
  ERR_NOT_WELL_FORMED,
  ERR_STRUCTURE,
  ERR_DEPTH,
  ERR_INCORRECT_MAJOR,
  ERR_INCORRECT_LOGICAL_TYPE,
  ERR_INCORRECT_FORMAT,
  ERR_NO_SUCH_ELEMENT,
  ERR_ARGUMENT,
  ERR_OVERFLOW,
} from "./errors.js";
export type { ErrorCategory } from "./errors.js";

export { EMPTY_BYTES, concatBytes, toHex, fromHex, utf8Encode, utf8Decode, compareBytes, bytesEqual } from "./bytes.js";
export { ByteReader, ByteWriter } from "./io.js";
export type { ByteSource, ByteSink } from "./io.js";

export { Header, canonicalFormat, decodeHeader, readArgument, encodeHeader, writeArgument } from "./header.js";
export { DataEvent, decodeEvent } from "./event.js";
export { OptionalEventView } from "./optional.js";

export { CborParser, ByteEventSource, ArrayEventSource } from "./parser.js";
export type { EventSource, ParserOptions } from "./parser.js";

export { CborGenerator, EncodingSink, EventCollector } from "./generator.js";
export type { EventSink } from "./generator.js";

export { DiagnosticRenderer, DiagnosticSink, renderDiagnostic, escapeText, halfToNumber } from "./diagnostic.js";
export type { DiagnosticOptions } from "./diagnostic.js";

export { loadConfig, defineConfig, resolveConfig, DEFAULT_CONFIG, CONFIG_FILES } from "./config.js";
export type { CborscopeConfig, ResolvedConfig } from "./config.js";

export { Logger, logger } from "./logger.js";
export type { LogFormat, LogMeta, LoggerOptions } from "./logger.js";
