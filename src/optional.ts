import type { DataEvent } from "./event.js";

/**
 * View of an event for fields that may be null: every accessor returns
 * undefined when the event is CBOR `null` and delegates otherwise, so type
 * mismatches and overflow still throw.
 */
export class OptionalEventView {
  constructor(readonly event: DataEvent) {}

  private unlessNull<T>(read: (event: DataEvent) => T): T | undefined {
    return this.event.isNull() ? undefined : read(this.event);
  }

  isNull(): boolean { return this.event.isNull(); }
  isUndefined(): boolean { return this.event.isUndefined(); }
  isBreak(): boolean { return this.event.isBreak(); }
  isIndefiniteStart(): boolean { return this.event.isIndefiniteStart(); }

  asSignedInt(): number | undefined { return this.unlessNull((e) => e.asSignedInt()); }
  asLong(): bigint | undefined { return this.unlessNull((e) => e.asLong()); }
  asBigInteger(): bigint | undefined { return this.unlessNull((e) => e.asBigInteger()); }
  asUnsignedLong(): bigint | undefined { return this.unlessNull((e) => e.asUnsignedLong()); }
  asCount(): number | undefined { return this.unlessNull((e) => e.asCount()); }
  asHalfFloat(): number | undefined { return this.unlessNull((e) => e.asHalfFloat()); }
  asFloat(): number | undefined { return this.unlessNull((e) => e.asFloat()); }
  asDouble(): number | undefined { return this.unlessNull((e) => e.asDouble()); }
  asBoolean(): boolean | undefined { return this.unlessNull((e) => e.asBoolean()); }
  asSimpleValue(): number | undefined { return this.unlessNull((e) => e.asSimpleValue()); }
  asText(): string | undefined { return this.unlessNull((e) => e.asText()); }
  bytes(): Uint8Array | undefined { return this.unlessNull((e) => e.bytes()); }
}
