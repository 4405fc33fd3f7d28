// Push generator: canonical event writers forwarding to a sink

import { DataEvent } from "./event.js";
import { ByteWriter, type ByteSink } from "./io.js";

/** Receiver of events, in order. */
export interface EventSink {
  next(event: DataEvent): void;
}

/** Encodes every event it receives to a byte sink. */
export class EncodingSink implements EventSink {
  constructor(private readonly target: ByteSink) {}

  next(event: DataEvent): void {
    event.write(this.target);
  }
}

/** Keeps every event it receives. */
export class EventCollector implements EventSink {
  readonly events: DataEvent[] = [];

  next(event: DataEvent): void {
    this.events.push(event);
  }
}

/**
 * Convenience writers over an event sink. The generator checks nothing about
 * nesting: unmatched breaks or wrong declared counts are written as given.
 */
export class CborGenerator implements EventSink {
  constructor(private readonly sink: EventSink) {}

  /** Encode whatever `build` writes and return the bytes. */
  static toBytes(build: (generator: CborGenerator) => void): Uint8Array {
    const writer = new ByteWriter();
    build(new CborGenerator(new EncodingSink(writer)));
    return writer.finish();
  }

  next(event: DataEvent): this {
    this.sink.next(event);
    return this;
  }

  writeBoolean(v: boolean): this { return this.next(DataEvent.ofBoolean(v)); }
  writeNull(): this { return this.next(DataEvent.ofNull()); }
  writeUndefined(): this { return this.next(DataEvent.ofUndefined()); }
  writeSimpleValue(v: number): this { return this.next(DataEvent.ofSimpleValue(v)); }

  writeInteger(v: number): this { return this.next(DataEvent.ofInteger(v)); }
  writeLong(v: bigint): this { return this.next(DataEvent.ofLong(v)); }
  writeBigInteger(v: bigint): this { return this.next(DataEvent.ofBigInteger(v)); }
  writeUnsignedLong(v: bigint | number): this { return this.next(DataEvent.ofUnsignedLong(v)); }
  /** Writes the negative integer -(raw + 1). */
  writeNegativeUnsignedLong(raw: bigint | number): this { return this.next(DataEvent.ofNegativeUnsignedLong(raw)); }

  /** One definite byte string, or an indefinite one with a chunk per element. */
  writeBytes(bytes: Uint8Array | Iterable<Uint8Array>): this {
    if (bytes instanceof Uint8Array) return this.next(DataEvent.ofBytes(bytes));
    this.next(DataEvent.startIndefiniteBytes());
    for (const chunk of bytes) this.next(DataEvent.ofBytes(chunk));
    return this.next(DataEvent.ofBreak());
  }

  writeText(text: string): this { return this.next(DataEvent.ofText(text)); }

  /** Indefinite text string with a chunk per element. */
  writeTextStream(chunks: Iterable<string>): this {
    this.next(DataEvent.startIndefiniteText());
    for (const chunk of chunks) this.next(DataEvent.ofText(chunk));
    return this.next(DataEvent.ofBreak());
  }

  /** binary16 given as its bit pattern. */
  writeHalfFloat(bits: number): this { return this.next(DataEvent.ofHalfFloat(bits)); }
  writeFloat(v: number): this { return this.next(DataEvent.ofFloat(v)); }
  writeDouble(v: number): this { return this.next(DataEvent.ofDouble(v)); }

  writeTag(tag: bigint | number): this { return this.next(DataEvent.ofTag(tag)); }
  writeStartArray(count: number): this { return this.next(DataEvent.startArray(count)); }
  writeStartIndefiniteArray(): this { return this.next(DataEvent.startIndefiniteArray()); }
  writeStartMap(pairs: number): this { return this.next(DataEvent.startMap(pairs)); }
  writeStartIndefiniteMap(): this { return this.next(DataEvent.startIndefiniteMap()); }
  writeBreak(): this { return this.next(DataEvent.ofBreak()); }
}
