// Cursor parser: pull-based event sequence with one event of lookahead

import { concatBytes, utf8Decode } from "./bytes.js";
import { DEFAULT_MAX_DEPTH } from "./constants.js";
import {
  CborArgumentError,
  CborDepthError,
  CborNoSuchElementError,
  CborNotWellFormedError,
  CborStructureError,
} from "./errors.js";
import { DataEvent, decodeEvent } from "./event.js";
import { ByteReader, type ByteSource } from "./io.js";
import { LogicalType, Major, majorName } from "./types.js";

/** Anything that yields events one at a time; undefined marks the end. */
export interface EventSource {
  nextEvent(): DataEvent | undefined;
}

export class ByteEventSource implements EventSource {
  constructor(private readonly source: ByteSource) {}

  nextEvent(): DataEvent | undefined {
    return decodeEvent(this.source);
  }
}

export class ArrayEventSource implements EventSource {
  private index = 0;

  constructor(private readonly events: readonly DataEvent[]) {}

  nextEvent(): DataEvent | undefined {
    if (this.index >= this.events.length) return undefined;
    return this.events[this.index++];
  }
}

export interface ParserOptions {
  /** Nesting ceiling for skipItem. */
  maxDepth?: number;
}

type ChunkMajor = Major.ByteString | Major.TextString;

/**
 * Pull parser over an event source. Typed readers check the staged event
 * before consuming it: on a type mismatch or overflow the cursor stays put
 * and another reader can be tried against the same event.
 */
export class CborParser implements Iterable<DataEvent> {
  private staged: DataEvent | undefined;
  private ended = false;
  readonly maxDepth: number;

  constructor(private readonly source: EventSource, options: ParserOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  static fromBytes(bytes: Uint8Array, options?: ParserOptions): CborParser {
    return new CborParser(new ByteEventSource(new ByteReader(bytes)), options);
  }

  static fromEvents(events: readonly DataEvent[], options?: ParserOptions): CborParser {
    return new CborParser(new ArrayEventSource(events), options);
  }

  hasNext(): boolean {
    if (this.staged) return true;
    if (this.ended) return false;
    const event = this.source.nextEvent();
    if (!event) {
      this.ended = true;
      return false;
    }
    this.staged = event;
    return true;
  }

  /** The next event, without consuming it. */
  peek(): DataEvent {
    if (!this.hasNext() || !this.staged) throw new CborNoSuchElementError();
    return this.staged;
  }

  next(): DataEvent {
    const event = this.peek();
    this.staged = undefined;
    return event;
  }

  /** The next event, or undefined at the end of input. */
  read(): DataEvent | undefined {
    return this.hasNext() ? this.next() : undefined;
  }

  *[Symbol.iterator](): Iterator<DataEvent> {
    while (this.hasNext()) yield this.next();
  }

  private take<T>(extract: (event: DataEvent) => T): T {
    const value = extract(this.peek());
    this.staged = undefined;
    return value;
  }

  // --- Typed readers ---

  readBoolean(): boolean {
    return this.take((e) => e.asBoolean());
  }

  readNull(): void {
    this.take((e) => e.header.assertLogicalType(LogicalType.Null));
  }

  readUndefined(): void {
    this.take((e) => e.header.assertLogicalType(LogicalType.Undefined));
  }

  readSimpleValue(): number {
    return this.take((e) => e.asSimpleValue());
  }

  /** Integer as a signed 32-bit number. */
  readInteger(): number {
    return this.take((e) => {
      e.header.assertMajor(Major.UnsignedInteger, Major.NegativeInteger);
      return e.asSignedInt();
    });
  }

  /** Integer as a signed 64-bit bigint. */
  readLong(): bigint {
    return this.take((e) => {
      e.header.assertMajor(Major.UnsignedInteger, Major.NegativeInteger);
      return e.asLong();
    });
  }

  readBigInteger(): bigint {
    return this.take((e) => {
      e.header.assertMajor(Major.UnsignedInteger, Major.NegativeInteger);
      return e.asBigInteger();
    });
  }

  readUnsignedLong(): bigint {
    return this.take((e) => e.asUnsignedLong());
  }

  /** binary16 bit pattern. */
  readHalfFloat(): number {
    return this.take((e) => e.asHalfFloat());
  }

  readFloat(): number {
    return this.take((e) => e.asFloat());
  }

  readDouble(): number {
    return this.take((e) => e.asDouble());
  }

  readTag(): bigint {
    return this.take((e) => {
      e.header.assertMajor(Major.Tag);
      return e.raw;
    });
  }

  /** Start of a definite array; returns the element count. */
  readStartArray(): number {
    return this.take((e) => {
      e.header.assertLogicalType(LogicalType.StartArray);
      return e.asCount();
    });
  }

  readStartIndefiniteArray(): void {
    this.take((e) => e.header.assertLogicalType(LogicalType.StartIndefiniteArray));
  }

  /** Start of a definite map; returns the pair count. */
  readStartMap(): number {
    return this.take((e) => {
      e.header.assertLogicalType(LogicalType.StartMap);
      return e.asCount();
    });
  }

  readStartIndefiniteMap(): void {
    this.take((e) => e.header.assertLogicalType(LogicalType.StartIndefiniteMap));
  }

  readBreak(): void {
    this.take((e) => e.header.assertLogicalType(LogicalType.Break));
  }

  // --- Chunked strings ---

  /**
   * Fold a byte or text string into an accumulator, chunk by chunk. A
   * definite string is one chunk; an indefinite one is every chunk up to the
   * break, which is consumed.
   */
  collectChunks<A>(major: ChunkMajor, seed: A, accumulate: (acc: A, chunk: Uint8Array) => A): A {
    if (major !== Major.ByteString && major !== Major.TextString) {
      throw new CborArgumentError(`major type ${majorName(major)} does not carry chunks`);
    }
    const first = this.peek();
    first.header.assertMajor(major);
    const single = first.bytes();
    if (single) {
      const result = accumulate(seed, single);
      this.staged = undefined;
      return result;
    }
    this.next();
    let acc = seed;
    for (;;) {
      if (!this.hasNext()) {
        throw new CborNotWellFormedError(`end of input inside an indefinite-length ${majorName(major)}`);
      }
      const event = this.next();
      if (event.isBreak()) return acc;
      const chunk = event.major === major ? event.bytes() : undefined;
      if (!chunk) {
        throw new CborNotWellFormedError(`unexpected ${event.logicalType} inside an indefinite-length ${majorName(major)}`);
      }
      acc = accumulate(acc, chunk);
    }
  }

  /** Hand each chunk to `consumer`; returns the number of chunks. */
  consumeChunks(major: ChunkMajor, consumer: (chunk: Uint8Array) => void): number {
    return this.collectChunks(major, 0, (count, chunk) => {
      consumer(chunk);
      return count + 1;
    });
  }

  readBytes(): Uint8Array {
    const chunks = this.collectChunks<Uint8Array[]>(Major.ByteString, [], (acc, chunk) => {
      acc.push(chunk);
      return acc;
    });
    return concatBytes(...chunks);
  }

  readText(): string {
    const chunks = this.collectChunks<Uint8Array[]>(Major.TextString, [], (acc, chunk) => {
      acc.push(chunk);
      return acc;
    });
    return utf8Decode(concatBytes(...chunks));
  }

  // --- Skipping ---

  /** Consume one complete data item, children included. */
  skipItem(): void {
    this.skip(0);
  }

  private skip(depth: number): void {
    if (depth > this.maxDepth) throw new CborDepthError(this.maxDepth);
    if (!this.hasNext()) throw new CborNotWellFormedError("end of input where a data item was expected");
    const event = this.next();
    switch (event.logicalType) {
      case LogicalType.Break:
        throw new CborStructureError("break outside an indefinite-length container");
      case LogicalType.Tag:
        this.skip(depth + 1);
        return;
      case LogicalType.StartArray:
        for (let i = event.asCount(); i > 0; i--) this.skip(depth + 1);
        return;
      case LogicalType.StartMap:
        for (let i = event.asCount() * 2; i > 0; i--) this.skip(depth + 1);
        return;
      case LogicalType.StartIndefiniteArray:
      case LogicalType.StartIndefiniteMap:
        while (!this.atBreak()) this.skip(depth + 1);
        this.next();
        return;
      case LogicalType.StartBinaryChunks:
      case LogicalType.StartTextChunks:
        while (!this.atBreak()) {
          const chunk = this.next();
          if (chunk.major !== event.major || chunk.isIndefiniteStart()) {
            throw new CborNotWellFormedError(`unexpected ${chunk.logicalType} inside an indefinite-length ${majorName(event.major)}`);
          }
        }
        this.next();
        return;
      default:
        return;
    }
  }

  private atBreak(): boolean {
    if (!this.hasNext()) throw new CborNotWellFormedError("end of input inside an indefinite-length container");
    return this.peek().isBreak();
  }
}
