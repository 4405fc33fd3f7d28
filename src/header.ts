// Header codec: the leading byte of a data item and its argument

import { MAX_UINT64 } from "./constants.js";
import {
  CborArgumentError,
  CborIncorrectAdditionalInfoFormatError,
  CborIncorrectLogicalTypeError,
  CborIncorrectMajorTypeError,
  CborNotWellFormedError,
} from "./errors.js";
import type { ByteSink, ByteSource } from "./io.js";
import { ARGUMENT_BYTES, InfoFormat, LogicalType, Major, formatName, majorName } from "./types.js";

/** Format bits for a low-five-bit value, or undefined for the reserved 28, 29 and 30. */
function formatOf(lowBits: number): InfoFormat | undefined {
  if (lowBits < 24) return InfoFormat.Immediate;
  switch (lowBits) {
    case 24: return InfoFormat.Byte;
    case 25: return InfoFormat.Short;
    case 26: return InfoFormat.Int;
    case 27: return InfoFormat.Long;
    case 31: return InfoFormat.Indefinite;
    default: return undefined;
  }
}

function indefiniteAllowed(major: Major): boolean {
  return major !== Major.UnsignedInteger && major !== Major.NegativeInteger && major !== Major.Tag;
}

function classify(byte: number, major: Major, format: InfoFormat): LogicalType {
  switch (byte) {
    case 0xf4:
    case 0xf5: return LogicalType.Boolean;
    case 0xf6: return LogicalType.Null;
    case 0xf7: return LogicalType.Undefined;
    case 0xff: return LogicalType.Break;
  }
  const indefinite = format === InfoFormat.Indefinite;
  switch (major) {
    case Major.UnsignedInteger:
    case Major.NegativeInteger:
      return LogicalType.Integral;
    case Major.ByteString:
      return indefinite ? LogicalType.StartBinaryChunks : LogicalType.BinaryChunk;
    case Major.TextString:
      return indefinite ? LogicalType.StartTextChunks : LogicalType.TextChunk;
    case Major.Array:
      return indefinite ? LogicalType.StartIndefiniteArray : LogicalType.StartArray;
    case Major.Map:
      return indefinite ? LogicalType.StartIndefiniteMap : LogicalType.StartMap;
    case Major.Tag:
      return LogicalType.Tag;
    case Major.Etc:
      switch (format) {
        case InfoFormat.Short: return LogicalType.HalfFloat;
        case InfoFormat.Int: return LogicalType.Float;
        case InfoFormat.Long: return LogicalType.Double;
        default: return LogicalType.OtherSimple;
      }
  }
}

/**
 * Canonical (smallest) format for an unsigned 64-bit argument. Negative
 * values are two's-complement patterns above 2^63 - 1 and always need eight
 * bytes.
 */
export function canonicalFormat(value: bigint): InfoFormat {
  if (value < 0n) return InfoFormat.Long;
  if (value < 24n) return InfoFormat.Immediate;
  if (value < 0x100n) return InfoFormat.Byte;
  if (value < 0x10000n) return InfoFormat.Short;
  if (value < 0x1_0000_0000n) return InfoFormat.Int;
  return InfoFormat.Long;
}

/**
 * A well-formed CBOR header byte. Only the 229 well-formed bytes have an
 * instance, and each is shared, so headers compare by identity.
 */
export class Header {
  readonly byte: number;
  readonly major: Major;
  readonly format: InfoFormat;
  readonly logicalType: LogicalType;

  private constructor(byte: number, major: Major, format: InfoFormat) {
    this.byte = byte;
    this.major = major;
    this.format = format;
    this.logicalType = classify(byte, major, format);
    Object.freeze(this);
  }

  private static readonly TABLE: readonly (Header | undefined)[] = Header.buildTable();

  private static buildTable(): (Header | undefined)[] {
    const table: (Header | undefined)[] = new Array(256);
    for (let i = 0; i < 256; i++) {
      const major: Major = i >> 5;
      const format = formatOf(i & 0x1f);
      // reserved format without defined semantics
      if (format === undefined) continue;
      if (format === InfoFormat.Indefinite && !indefiniteAllowed(major)) continue;
      table[i] = new Header(i, major, format);
    }
    return table;
  }

  static readonly FALSE: Header = Header.of(0xf4);
  static readonly TRUE: Header = Header.of(0xf5);
  static readonly NULL: Header = Header.of(0xf6);
  static readonly UNDEFINED: Header = Header.of(0xf7);
  static readonly BREAK: Header = Header.of(0xff);

  /** The header for a byte, or undefined if the byte is not well-formed. */
  static lookup(byte: number): Header | undefined {
    return Header.TABLE[byte & 0xff];
  }

  static of(byte: number): Header {
    const header = Header.lookup(byte);
    if (!header) {
      throw new CborNotWellFormedError(`reserved header byte 0x${(byte & 0xff).toString(16).padStart(2, "0")}`);
    }
    return header;
  }

  /** Number of well-formed header bytes. */
  static get wellFormedCount(): number {
    return Header.TABLE.filter((h) => h !== undefined).length;
  }

  static immediate(major: Major, value: number): Header {
    if (!Number.isInteger(value) || value < 0 || value >= 24) {
      throw new CborArgumentError("immediate value must be from 0 through 23");
    }
    return Header.of((major << 5) | value);
  }

  static fromMajorAndFormat(major: Major, format: InfoFormat): Header {
    if (format === InfoFormat.Immediate) {
      throw new CborArgumentError("additional info format cannot be immediate; use Header.immediate");
    }
    if (format === InfoFormat.Indefinite && !indefiniteAllowed(major)) {
      throw new CborArgumentError(`major type ${majorName(major)} does not support the indefinite format`);
    }
    return Header.of((major << 5) | format);
  }

  /** Indefinite-length start marker for byte/text strings, arrays and maps. */
  static indefinite(major: Major): Header {
    switch (major) {
      case Major.ByteString:
      case Major.TextString:
      case Major.Array:
      case Major.Map:
        return Header.of((major << 5) | InfoFormat.Indefinite);
      default:
        throw new CborArgumentError(`major type ${majorName(major)} is not a container`);
    }
  }

  /**
   * Header holding an unsigned 64-bit argument in the fewest bytes. For
   * major 7 the argument is a simple value: 0 to 23 or 32 to 255.
   */
  static forCanonicalValue(major: Major, value: bigint | number): Header {
    const v = BigInt(value);
    if (v > MAX_UINT64) throw new CborArgumentError("value exceeds 64 bits");
    const format = canonicalFormat(v);
    if (major === Major.Etc) {
      if (format !== InfoFormat.Immediate && format !== InfoFormat.Byte) {
        throw new CborArgumentError("value is too large to represent a simple value");
      }
      if (v >= 24n && v < 32n) {
        throw new CborArgumentError("simple values 24 through 31 are reserved");
      }
    }
    if (format === InfoFormat.Immediate) return Header.immediate(major, Number(v));
    return Header.fromMajorAndFormat(major, format);
  }

  /** Low five bits, which is the value itself for immediate headers. */
  get additionalInfo(): number {
    return this.byte & 0x1f;
  }

  /** Argument bytes that follow this header. */
  get argumentLength(): number {
    return ARGUMENT_BYTES[this.format];
  }

  /** Indefinite-length container starts and the break signal. */
  get isIndefinite(): boolean {
    return this.format === InfoFormat.Indefinite;
  }

  get isStartOfIndefiniteContainer(): boolean {
    return this.isIndefinite && this.major !== Major.Etc;
  }

  /** Definite byte and text chunks, whose argument is a payload length. */
  get isFollowedByBinaryData(): boolean {
    return (this.major === Major.ByteString || this.major === Major.TextString) && !this.isIndefinite;
  }

  /** Arrays, maps, tags and chunked strings: headers with child events. */
  get isContainer(): boolean {
    switch (this.major) {
      case Major.Array:
      case Major.Map:
      case Major.Tag:
        return true;
      case Major.ByteString:
      case Major.TextString:
        return this.isIndefinite;
      default:
        return false;
    }
  }

  get isSimpleValue(): boolean {
    switch (this.logicalType) {
      case LogicalType.Boolean:
      case LogicalType.Null:
      case LogicalType.Undefined:
      case LogicalType.OtherSimple:
        return true;
      default:
        return false;
    }
  }

  assertMajor(...expected: Major[]): void {
    if (!expected.includes(this.major)) throw new CborIncorrectMajorTypeError(this, ...expected);
  }

  assertLogicalType(...expected: LogicalType[]): void {
    if (!expected.includes(this.logicalType)) throw new CborIncorrectLogicalTypeError(this, ...expected);
  }

  assertFormat(...expected: InfoFormat[]): void {
    if (!expected.includes(this.format)) throw new CborIncorrectAdditionalInfoFormatError(this, ...expected);
  }

  compareTo(other: Header): number {
    return this.byte - other.byte;
  }

  toString(): string {
    return `0x${this.byte.toString(16).padStart(2, "0")} ${majorName(this.major)}/${formatName(this.format)}`;
  }
}

// --- Decode ---

/**
 * Read one header byte. Undefined means the input ended cleanly on an item
 * boundary.
 */
export function decodeHeader(source: ByteSource): Header | undefined {
  const b = source.read();
  if (b === undefined) return undefined;
  return Header.of(b);
}

/** Read the 0, 1, 2, 4 or 8 big-endian argument bytes that follow a header. */
export function readArgument(header: Header, source: ByteSource): bigint {
  switch (header.format) {
    case InfoFormat.Immediate:
      return BigInt(header.additionalInfo);
    case InfoFormat.Indefinite:
      return 0n;
  }
  const n = header.argumentLength;
  const b = source.readBytes(n);
  if (b.length < n) {
    throw new CborNotWellFormedError("end of input in the middle of a header argument");
  }
  const v = new DataView(b.buffer, b.byteOffset, b.byteLength);
  switch (n) {
    case 1: return BigInt(v.getUint8(0));
    case 2: return BigInt(v.getUint16(0));
    case 4: return BigInt(v.getUint32(0));
    default: return v.getBigUint64(0);
  }
}

// --- Encode ---

export function encodeHeader(header: Header, sink: ByteSink): void {
  sink.write(header.byte);
}

/** Write the argument bytes for `raw`, truncated to the width the header declares. */
export function writeArgument(header: Header, raw: bigint, sink: ByteSink): void {
  const n = header.argumentLength;
  if (n === 0) return;
  const b = new Uint8Array(n);
  const v = new DataView(b.buffer);
  switch (n) {
    case 1: v.setUint8(0, Number(raw & 0xffn)); break;
    case 2: v.setUint16(0, Number(raw & 0xffffn)); break;
    case 4: v.setUint32(0, Number(raw & 0xffff_ffffn)); break;
    default: v.setBigUint64(0, BigInt.asUintN(64, raw));
  }
  sink.writeBytes(b);
}
