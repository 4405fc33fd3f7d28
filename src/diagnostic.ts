// Diagnostic notation (RFC 7049 section 6) rendered from a flat event stream

import { toHex } from "./bytes.js";
import { DEFAULT_MAX_DEPTH } from "./constants.js";
import { CborDepthError, CborNotWellFormedError, CborStructureError } from "./errors.js";
import type { DataEvent } from "./event.js";
import type { EventSink } from "./generator.js";
import { CborParser } from "./parser.js";
import { LogicalType, Major, majorName } from "./types.js";

export interface DiagnosticOptions {
  /** Nesting ceiling; deeper input fails with CborDepthError. */
  maxDepth?: number;
}

// --- Literals ---

export function escapeText(text: string): string {
  let s = "\"";
  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    switch (ch) {
      case 0x08: s += "\\b"; break;
      case 0x0c: s += "\\f"; break;
      case 0x0a: s += "\\n"; break;
      case 0x0d: s += "\\r"; break;
      case 0x09: s += "\\t"; break;
      case 0x22: s += "\\\""; break;
      default:
        s += ch < 0x20 ? `\\u${ch.toString(16).padStart(4, "0")}` : text[i];
    }
  }
  return s + "\"";
}

/** binary16 bit pattern to its value, for display. */
export function halfToNumber(bits: number): number {
  const sign = bits & 0x8000 ? -1 : 1;
  const exp = (bits >> 10) & 0x1f;
  const mant = bits & 0x3ff;
  if (exp === 0) return sign * mant * 2 ** -24;
  if (exp === 0x1f) return mant === 0 ? sign * Infinity : NaN;
  return sign * (1024 + mant) * 2 ** (exp - 25);
}

function numberText(v: number): string {
  if (Number.isNaN(v)) return "NaN";
  if (v === Infinity) return "Infinity";
  if (v === -Infinity) return "-Infinity";
  if (Object.is(v, -0)) return "-0.0";
  const s = String(v);
  return /[.e]/.test(s) ? s : `${s}.0`;
}

/** Shortest decimal that reads back as the same binary32 value. */
function float32Text(v: number): string {
  if (!Number.isFinite(v)) return numberText(v);
  for (let p = 1; p <= 9; p++) {
    const candidate = Number(v.toPrecision(p));
    if (Math.fround(candidate) === v) return numberText(candidate);
  }
  return numberText(v);
}

// --- Renderer ---

/**
 * Rebuilds nesting from a parser's flat events. Each process() call
 * consumes exactly one data item, children included, and returns its text.
 */
export class DiagnosticRenderer {
  private readonly maxDepth: number;

  constructor(private readonly parser: CborParser, options: DiagnosticOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  hasNext(): boolean {
    return this.parser.hasNext();
  }

  process(): string {
    return this.item(0);
  }

  /** Every remaining item, as a CBOR sequence separated by ", ". */
  processAll(): string {
    const items: string[] = [];
    while (this.parser.hasNext()) items.push(this.item(0));
    return items.join(", ");
  }

  private item(depth: number): string {
    if (depth > this.maxDepth) throw new CborDepthError(this.maxDepth);
    if (!this.parser.hasNext()) throw new CborNotWellFormedError("end of input where a data item was expected");
    const event = this.parser.next();
    switch (event.logicalType) {
      case LogicalType.Integral:
        return event.major === Major.UnsignedInteger ? event.raw.toString() : `-${event.raw + 1n}`;
      case LogicalType.Boolean:
        return event.asBoolean() ? "true" : "false";
      case LogicalType.Null:
        return "null";
      case LogicalType.Undefined:
        return "undefined";
      case LogicalType.OtherSimple:
        return `simple(${event.raw})`;
      case LogicalType.HalfFloat:
        return numberText(halfToNumber(event.asHalfFloat()));
      case LogicalType.Float:
        return float32Text(event.asFloat());
      case LogicalType.Double:
        return numberText(event.asDouble());
      case LogicalType.Tag:
        return `${event.raw}(${this.item(depth + 1)})`;
      case LogicalType.StartArray:
        return this.array(event.asCount(), depth);
      case LogicalType.StartIndefiniteArray:
        return this.indefiniteArray(depth);
      case LogicalType.StartMap:
        return this.map(event.asCount(), depth);
      case LogicalType.StartIndefiniteMap:
        return this.indefiniteMap(depth);
      case LogicalType.BinaryChunk:
      case LogicalType.TextChunk:
        return this.chunk(event);
      case LogicalType.StartBinaryChunks:
      case LogicalType.StartTextChunks:
        return this.chunks(event.major);
      case LogicalType.Break:
        throw new CborStructureError("break outside an indefinite-length container");
    }
  }

  private array(count: number, depth: number): string {
    const items: string[] = [];
    for (let i = 0; i < count; i++) items.push(this.item(depth + 1));
    return `[${items.join(", ")}]`;
  }

  private map(pairs: number, depth: number): string {
    const entries: string[] = [];
    for (let i = 0; i < pairs; i++) entries.push(this.entry(depth));
    return `{${entries.join(", ")}}`;
  }

  private entry(depth: number): string {
    const key = this.item(depth + 1);
    return `${key}: ${this.item(depth + 1)}`;
  }

  private indefiniteArray(depth: number): string {
    const items: string[] = [];
    while (!this.atBreak()) items.push(this.item(depth + 1));
    return `[_ ${items.join(", ")}]`;
  }

  private indefiniteMap(depth: number): string {
    const entries: string[] = [];
    while (!this.atBreak()) entries.push(this.entry(depth));
    return `{_ ${entries.join(", ")}}`;
  }

  /** Consumes the break when one is next. */
  private atBreak(): boolean {
    if (!this.parser.hasNext()) {
      throw new CborNotWellFormedError("end of input inside an indefinite-length container");
    }
    if (!this.parser.peek().isBreak()) return false;
    this.parser.next();
    return true;
  }

  private chunk(event: DataEvent): string {
    if (event.major === Major.TextString) return escapeText(event.asText());
    return `h'${toHex(event.bytes() ?? new Uint8Array(0))}'`;
  }

  private chunks(major: Major): string {
    const parts: string[] = [];
    for (;;) {
      if (!this.parser.hasNext()) {
        throw new CborNotWellFormedError(`end of input inside an indefinite-length ${majorName(major)}`);
      }
      const event = this.parser.next();
      if (event.isBreak()) break;
      if (event.major !== major || event.isIndefiniteStart()) {
        throw new CborStructureError(`unexpected ${event.logicalType} inside an indefinite-length ${majorName(major)}`);
      }
      parts.push(this.chunk(event));
    }
    return `(_ ${parts.join(", ")})`;
  }
}

/** Render every top-level item in `bytes`, separated by ", ". */
export function renderDiagnostic(bytes: Uint8Array, options: DiagnosticOptions = {}): string {
  return new DiagnosticRenderer(CborParser.fromBytes(bytes), options).processAll();
}

/**
 * Generator target that renders what it receives. Events are held until
 * finish(), since nesting is only known once a container is complete.
 */
export class DiagnosticSink implements EventSink {
  private events: DataEvent[] = [];

  constructor(private readonly options: DiagnosticOptions = {}) {}

  next(event: DataEvent): void {
    this.events.push(event);
  }

  finish(): string {
    const events = this.events;
    this.events = [];
    return new DiagnosticRenderer(CborParser.fromEvents(events), this.options).processAll();
  }
}
