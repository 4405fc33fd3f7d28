// Data events: one header, its argument and any string payload

import { INDEFINITE_COUNT, MAX_UINT64 } from "./constants.js";
import { EMPTY_BYTES, compareBytes, toHex, utf8Decode, utf8Encode } from "./bytes.js";
import {
  CborArgumentError,
  CborIncorrectAdditionalInfoFormatError,
  CborIncorrectLogicalTypeError,
  CborIncorrectMajorTypeError,
  CborNotWellFormedError,
  CborOverflowError,
} from "./errors.js";
import { Header, decodeHeader, encodeHeader, readArgument, writeArgument } from "./header.js";
import { ByteWriter, type ByteSink, type ByteSource } from "./io.js";
import { OptionalEventView } from "./optional.js";
import { InfoFormat, LogicalType, Major, formatName, majorName } from "./types.js";

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/** Largest raw value each argument width can hold. */
const FORMAT_LIMIT: Readonly<Record<InfoFormat, bigint>> = {
  [InfoFormat.Immediate]: 23n,
  [InfoFormat.Byte]: 0xffn,
  [InfoFormat.Short]: 0xffffn,
  [InfoFormat.Int]: 0xffff_ffffn,
  [InfoFormat.Long]: MAX_UINT64,
  [InfoFormat.Indefinite]: 0n,
};

function toUnsigned(value: bigint | number, what: string): bigint {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new CborArgumentError(`${what} must be a safe integer`);
  }
  const v = BigInt(value);
  if (v < 0n || v > MAX_UINT64) throw new CborArgumentError(`${what} must fit in an unsigned 64-bit integer`);
  return v;
}

function toCount(value: number, what: string): bigint {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new CborArgumentError(`${what} must be a non-negative safe integer`);
  }
  return BigInt(value);
}

/**
 * One CBOR header together with its unsigned 64-bit argument and, for
 * definite byte and text strings, the payload bytes. Nested children are
 * separate events.
 *
 * Events are immutable. Every single-byte event with no payload (small
 * integers, tags and simple values, break, empty strings and containers,
 * indefinite-length starts) exists once and is returned by identity from
 * the factories and the decoder.
 */
export class DataEvent {
  readonly header: Header;
  /** Raw argument: integer magnitude, length, count, tag, simple value or float bits. */
  readonly raw: bigint;
  private readonly payload: Uint8Array | undefined;

  private constructor(header: Header, raw: bigint, payload: Uint8Array | undefined) {
    this.header = header;
    this.raw = raw;
    this.payload = payload;
    Object.freeze(this);
  }

  // --- Singletons ---

  private static readonly IMMEDIATES: readonly (DataEvent | undefined)[] = DataEvent.buildImmediates();

  private static buildImmediates(): (DataEvent | undefined)[] {
    const table: (DataEvent | undefined)[] = new Array(256);
    for (let major = Major.UnsignedInteger; major <= Major.Etc; major++) {
      const hb = major << 5;
      if (major === Major.ByteString || major === Major.TextString) {
        table[hb] = new DataEvent(Header.of(hb), 0n, EMPTY_BYTES);
      } else {
        for (let i = 0; i < 24; i++) {
          table[hb | i] = new DataEvent(Header.of(hb | i), BigInt(i), undefined);
        }
      }
      const indefinite = Header.lookup(hb | InfoFormat.Indefinite);
      if (indefinite) table[indefinite.byte] = new DataEvent(indefinite, 0n, undefined);
    }
    return table;
  }

  private static singleton(byte: number): DataEvent {
    const event = DataEvent.IMMEDIATES[byte];
    if (!event) throw new CborArgumentError(`no single-byte event for 0x${byte.toString(16)}`);
    return event;
  }

  private static readonly FALSE = DataEvent.singleton(0xf4);
  private static readonly TRUE = DataEvent.singleton(0xf5);
  private static readonly NULL = DataEvent.singleton(0xf6);
  private static readonly UNDEFINED = DataEvent.singleton(0xf7);
  private static readonly BREAK = DataEvent.singleton(0xff);

  private static readonly HALF = Header.fromMajorAndFormat(Major.Etc, InfoFormat.Short);
  private static readonly INF = new DataEvent(DataEvent.HALF, 0x7c00n, undefined);
  private static readonly NEG_INF = new DataEvent(DataEvent.HALF, 0xfc00n, undefined);
  private static readonly NAN = new DataEvent(DataEvent.HALF, 0x7e00n, undefined);

  /**
   * Build an event from its parts. Returns the shared instance when one
   * exists; the payload is copied otherwise.
   */
  static create(header: Header, raw: bigint, payload?: Uint8Array): DataEvent {
    return DataEvent.make(header, raw, payload ? payload.slice() : undefined);
  }

  private static make(header: Header, raw: bigint, payload: Uint8Array | undefined): DataEvent {
    if (raw < 0n || raw > FORMAT_LIMIT[header.format]) {
      throw new CborArgumentError(`raw value ${raw} does not fit format ${formatName(header.format)}`);
    }
    if (header.format === InfoFormat.Immediate && raw !== BigInt(header.additionalInfo)) {
      throw new CborArgumentError(`raw value ${raw} does not match immediate header ${header}`);
    }
    if (header.isFollowedByBinaryData) {
      if (!payload) throw new CborArgumentError("byte and text chunks require a payload");
      if (BigInt(payload.length) !== raw) throw new CborArgumentError("payload length does not match raw value");
    } else if (payload) {
      throw new CborArgumentError(`header ${header} does not carry a payload`);
    }
    if (header.major === Major.Etc && header.format === InfoFormat.Byte && raw < 32n) {
      throw new CborArgumentError("simple values below 32 must use the immediate form");
    }
    const shared = DataEvent.IMMEDIATES[header.byte];
    if (shared) return shared;
    return new DataEvent(header, raw, payload);
  }

  private static canonical(major: Major, value: bigint): DataEvent {
    return DataEvent.make(Header.forCanonicalValue(major, value), value, undefined);
  }

  // --- Factories ---

  static ofBoolean(v: boolean): DataEvent { return v ? DataEvent.TRUE : DataEvent.FALSE; }
  static ofNull(): DataEvent { return DataEvent.NULL; }
  static ofUndefined(): DataEvent { return DataEvent.UNDEFINED; }
  static ofBreak(): DataEvent { return DataEvent.BREAK; }
  static emptyBytes(): DataEvent { return DataEvent.singleton(0x40); }
  static emptyText(): DataEvent { return DataEvent.singleton(0x60); }
  static emptyArray(): DataEvent { return DataEvent.singleton(0x80); }
  static emptyMap(): DataEvent { return DataEvent.singleton(0xa0); }
  static startIndefiniteBytes(): DataEvent { return DataEvent.singleton(0x5f); }
  static startIndefiniteText(): DataEvent { return DataEvent.singleton(0x7f); }
  static startIndefiniteArray(): DataEvent { return DataEvent.singleton(0x9f); }
  static startIndefiniteMap(): DataEvent { return DataEvent.singleton(0xbf); }

  /** Simple value 0 to 23 or 32 to 255; 24 through 31 are reserved. */
  static ofSimpleValue(value: number): DataEvent {
    if (!Number.isInteger(value) || value < 0 || value > 255) {
      throw new CborArgumentError("simple value must be from 0 through 255");
    }
    return DataEvent.canonical(Major.Etc, BigInt(value));
  }

  static ofUnsignedLong(value: bigint | number): DataEvent {
    return DataEvent.canonical(Major.UnsignedInteger, toUnsigned(value, "value"));
  }

  /** Negative integer with value -(raw + 1). */
  static ofNegativeUnsignedLong(raw: bigint | number): DataEvent {
    return DataEvent.canonical(Major.NegativeInteger, toUnsigned(raw, "raw value"));
  }

  /** Signed 64-bit integer. */
  static ofLong(value: bigint): DataEvent {
    if (value < INT64_MIN || value > INT64_MAX) {
      throw new CborArgumentError("value must fit in a signed 64-bit integer");
    }
    return DataEvent.ofBigInteger(value);
  }

  static ofInteger(value: number): DataEvent {
    if (!Number.isSafeInteger(value)) throw new CborArgumentError("value must be a safe integer");
    return DataEvent.ofBigInteger(BigInt(value));
  }

  /** Any integer from -2^64 to 2^64 - 1, the range of majors 0 and 1. */
  static ofBigInteger(value: bigint): DataEvent {
    if (value >= 0n) return DataEvent.ofUnsignedLong(value);
    return DataEvent.ofNegativeUnsignedLong(-1n - value);
  }

  static ofTag(tag: bigint | number): DataEvent {
    return DataEvent.canonical(Major.Tag, toUnsigned(tag, "tag"));
  }

  static startArray(count: number): DataEvent {
    return DataEvent.canonical(Major.Array, toCount(count, "array count"));
  }

  static startMap(pairs: number): DataEvent {
    return DataEvent.canonical(Major.Map, toCount(pairs, "map pair count"));
  }

  static ofBytes(bytes: Uint8Array): DataEvent {
    return DataEvent.chunk(Major.ByteString, bytes.slice());
  }

  static ofText(text: string | Uint8Array): DataEvent {
    return DataEvent.chunk(Major.TextString, typeof text === "string" ? utf8Encode(text) : text.slice());
  }

  private static chunk(major: Major, bytes: Uint8Array): DataEvent {
    const length = BigInt(bytes.length);
    return DataEvent.make(Header.forCanonicalValue(major, length), length, bytes);
  }

  /** binary16 value given as its 16-bit pattern. */
  static ofHalfFloat(bits: number): DataEvent {
    if (!Number.isInteger(bits) || bits < 0 || bits > 0xffff) {
      throw new CborArgumentError("half float bits must be an unsigned 16-bit integer");
    }
    return DataEvent.make(DataEvent.HALF, BigInt(bits), undefined);
  }

  /** binary32 value; `value` is stored at single precision. */
  static ofFloat(value: number): DataEvent {
    const v = new DataView(new ArrayBuffer(4));
    v.setFloat32(0, value);
    return DataEvent.make(Header.fromMajorAndFormat(Major.Etc, InfoFormat.Int), BigInt(v.getUint32(0)), undefined);
  }

  static ofDouble(value: number): DataEvent {
    const v = new DataView(new ArrayBuffer(8));
    v.setFloat64(0, value);
    return DataEvent.make(Header.fromMajorAndFormat(Major.Etc, InfoFormat.Long), v.getBigUint64(0), undefined);
  }

  static ofInfinity(): DataEvent { return DataEvent.INF; }
  static ofNegativeInfinity(): DataEvent { return DataEvent.NEG_INF; }
  static ofNaN(): DataEvent { return DataEvent.NAN; }

  // --- Classification ---

  get major(): Major { return this.header.major; }
  get logicalType(): LogicalType { return this.header.logicalType; }

  isNull(): boolean { return this.header === Header.NULL; }
  isUndefined(): boolean { return this.header === Header.UNDEFINED; }
  isBreak(): boolean { return this.header === Header.BREAK; }
  isIndefiniteStart(): boolean { return this.header.isStartOfIndefiniteContainer; }

  // --- Accessors ---

  private signedValue(): bigint {
    switch (this.header.major) {
      case Major.UnsignedInteger:
      case Major.Tag:
        return this.raw;
      case Major.NegativeInteger:
        return -1n - this.raw;
      case Major.Etc:
        this.header.assertFormat(InfoFormat.Immediate, InfoFormat.Byte);
        return this.raw;
      default:
        throw new CborIncorrectMajorTypeError(
          this.header, Major.UnsignedInteger, Major.NegativeInteger, Major.Tag, Major.Etc);
    }
  }

  /** Integer, tag or simple value as a signed 32-bit number. */
  asSignedInt(): number {
    const v = this.signedValue();
    if (v < INT32_MIN || v > INT32_MAX) throw new CborOverflowError(`${v} does not fit in a signed 32-bit integer`);
    return Number(v);
  }

  /** Integer, tag or simple value as a signed 64-bit bigint. */
  asLong(): bigint {
    const v = this.signedValue();
    if (v < INT64_MIN || v > INT64_MAX) throw new CborOverflowError(`${v} does not fit in a signed 64-bit integer`);
    return v;
  }

  asBigInteger(): bigint {
    return this.signedValue();
  }

  asUnsignedLong(): bigint {
    this.header.assertMajor(Major.UnsignedInteger);
    return this.raw;
  }

  /**
   * Length of a string chunk, element count of an array, pair count of a
   * map, 1 for a tag, or INDEFINITE_COUNT for indefinite-length starts.
   */
  asCount(): number {
    switch (this.header.major) {
      case Major.ByteString:
      case Major.TextString:
      case Major.Array:
      case Major.Map:
        if (this.header.isIndefinite) return INDEFINITE_COUNT;
        if (this.raw > MAX_SAFE) throw new CborOverflowError(`count ${this.raw} exceeds the safe integer range`);
        return Number(this.raw);
      case Major.Tag:
        return 1;
      default:
        throw new CborIncorrectMajorTypeError(
          this.header, Major.ByteString, Major.TextString, Major.Array, Major.Map, Major.Tag);
    }
  }

  /** The binary16 bit pattern. */
  asHalfFloat(): number {
    this.header.assertMajor(Major.Etc);
    this.header.assertFormat(InfoFormat.Short);
    return Number(this.raw);
  }

  asFloat(): number {
    this.header.assertMajor(Major.Etc);
    this.header.assertFormat(InfoFormat.Int);
    const v = new DataView(new ArrayBuffer(4));
    v.setUint32(0, Number(this.raw));
    return v.getFloat32(0);
  }

  asDouble(): number {
    this.header.assertMajor(Major.Etc);
    this.header.assertFormat(InfoFormat.Long);
    const v = new DataView(new ArrayBuffer(8));
    v.setBigUint64(0, this.raw);
    return v.getFloat64(0);
  }

  asBoolean(): boolean {
    if (this.header === Header.TRUE) return true;
    if (this.header === Header.FALSE) return false;
    throw new CborIncorrectLogicalTypeError(this.header, LogicalType.Boolean);
  }

  asSimpleValue(): number {
    if (!this.header.isSimpleValue) {
      throw new CborIncorrectLogicalTypeError(
        this.header, LogicalType.Boolean, LogicalType.Null, LogicalType.Undefined, LogicalType.OtherSimple);
    }
    return Number(this.raw);
  }

  /** Payload of a definite byte or text chunk; undefined for every other event. */
  bytes(): Uint8Array | undefined {
    return this.payload?.slice();
  }

  asText(): string {
    this.header.assertMajor(Major.TextString);
    if (!this.payload) {
      throw new CborIncorrectAdditionalInfoFormatError(
        this.header, InfoFormat.Immediate, InfoFormat.Byte, InfoFormat.Short, InfoFormat.Int, InfoFormat.Long);
    }
    return utf8Decode(this.payload);
  }

  optional(): OptionalEventView {
    return new OptionalEventView(this);
  }

  // --- Encoding ---

  write(sink: ByteSink): void {
    encodeHeader(this.header, sink);
    writeArgument(this.header, this.raw, sink);
    if (this.payload && this.payload.length > 0) sink.writeBytes(this.payload);
  }

  encode(): Uint8Array {
    const w = new ByteWriter(1 + this.header.argumentLength + (this.payload?.length ?? 0));
    this.write(w);
    return w.finish();
  }

  // --- Comparison ---

  equals(other: DataEvent): boolean {
    return this.compareTo(other) === 0;
  }

  /** Total order: header byte, then unsigned raw value, then payload bytes. */
  compareTo(other: DataEvent): number {
    if (this === other) return 0;
    const c = this.header.compareTo(other.header);
    if (c !== 0) return c;
    if (this.raw !== other.raw) return this.raw < other.raw ? -1 : 1;
    return compareBytes(this.payload ?? EMPTY_BYTES, other.payload ?? EMPTY_BYTES);
  }

  toString(): string {
    return `[DataEvent ${toHex(this.encode())} ${majorName(this.header.major)}:${formatName(this.header.format)} ${this.describe()}]`;
  }

  private describe(): string {
    switch (this.header.logicalType) {
      case LogicalType.Integral:
      case LogicalType.OtherSimple:
        return String(this.asBigInteger());
      case LogicalType.Tag: return `tag#${this.raw}`;
      case LogicalType.Boolean: return this.asBoolean() ? "TRUE" : "FALSE";
      case LogicalType.Null: return "NULL";
      case LogicalType.Undefined: return "UNDEFINED";
      case LogicalType.Break: return "BREAK";
      case LogicalType.HalfFloat: return `binary16(${this.raw.toString(16).padStart(4, "0")})`;
      case LogicalType.Float: return `float ${this.asFloat()}`;
      case LogicalType.Double: return `double ${this.asDouble()}`;
      default:
        return this.header.isIndefinite ? "..." : `count ${this.raw}`;
    }
  }
}

/**
 * Decode the next event. Undefined means the input ended on an item
 * boundary; ending anywhere else is not well-formed.
 */
export function decodeEvent(source: ByteSource): DataEvent | undefined {
  const header = decodeHeader(source);
  if (!header) return undefined;
  const raw = readArgument(header, source);
  if (header.major === Major.Etc && header.format === InfoFormat.Byte && raw < 32n) {
    throw new CborNotWellFormedError(`simple value ${raw} must not use the one-byte form`);
  }
  if (!header.isFollowedByBinaryData) return DataEvent.create(header, raw);
  if (raw > MAX_SAFE) throw new CborNotWellFormedError(`string length ${raw} exceeds available input`);
  const n = Number(raw);
  const payload = source.readBytes(n);
  if (payload.length < n) throw new CborNotWellFormedError("end of input in the middle of a string payload");
  return DataEvent.create(header, raw, payload);
}
