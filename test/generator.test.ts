import { describe, expect, test } from "vitest";
import { toHex } from "../src/bytes.js";
import { DiagnosticSink } from "../src/diagnostic.js";
import { CborArgumentError } from "../src/errors.js";
import { DataEvent } from "../src/event.js";
import { CborGenerator, EventCollector } from "../src/generator.js";

function hexOf(build: (g: CborGenerator) => void): string {
  return toHex(CborGenerator.toBytes(build));
}

describe("CborGenerator", () => {
  test("nested definite arrays", () => {
    const hex = hexOf((g) => {
      g.writeStartArray(3).writeInteger(1);
      g.writeStartArray(2).writeInteger(2).writeInteger(3);
      g.writeStartArray(2).writeInteger(4).writeInteger(5);
    });
    expect(hex).toBe("8301820203820405");
  });

  test("indefinite map", () => {
    const hex = hexOf((g) => {
      g.writeStartIndefiniteMap();
      g.writeText("Fun").writeBoolean(true);
      g.writeText("Amt").writeInteger(-2);
      g.writeBreak();
    });
    expect(hex).toBe("bf6346756ef563416d7421ff");
  });

  test("chunked strings", () => {
    expect(hexOf((g) => g.writeBytes([new Uint8Array([1, 2]), new Uint8Array([3, 4, 5])])))
      .toBe("5f42010243030405ff");
    expect(hexOf((g) => g.writeTextStream(["strea", "ming"]))).toBe("7f657374726561646d696e67ff");
    expect(hexOf((g) => g.writeBytes(new Uint8Array([0xde, 0xad])))).toBe("42dead");
  });

  test("integers", () => {
    expect(hexOf((g) => g.writeLong(-(2n ** 63n)))).toBe("3b7fffffffffffffff");
    expect(hexOf((g) => g.writeBigInteger(-(2n ** 64n)))).toBe("3bffffffffffffffff");
    expect(hexOf((g) => g.writeUnsignedLong(2n ** 64n - 1n))).toBe("1bffffffffffffffff");
    expect(hexOf((g) => g.writeNegativeUnsignedLong(99))).toBe("3863");
    expect(() => hexOf((g) => g.writeInteger(1.5))).toThrow(CborArgumentError);
  });

  test("tags and simple values", () => {
    expect(hexOf((g) => g.writeTag(1).writeUnsignedLong(1363896240))).toBe("c11a514b67b0");
    expect(hexOf((g) => g.writeNull().writeUndefined().writeBoolean(false))).toBe("f6f7f4");
    expect(hexOf((g) => g.writeSimpleValue(255))).toBe("f8ff");
  });

  test("floats", () => {
    expect(hexOf((g) => g.writeFloat(100000))).toBe("fa47c35000");
    expect(hexOf((g) => g.writeDouble(-4.1))).toBe("fbc010666666666666");
    expect(hexOf((g) => g.writeHalfFloat(0x7c00))).toBe("f97c00");
  });

  test("does not check nesting", () => {
    expect(hexOf((g) => g.writeBreak())).toBe("ff");
    expect(hexOf((g) => g.writeStartArray(2).writeInteger(1))).toBe("8201");
  });
});

describe("sinks", () => {
  test("collector keeps the events", () => {
    const collector = new EventCollector();
    new CborGenerator(collector).writeStartArray(1).writeText("a");
    expect(collector.events).toHaveLength(2);
    expect(collector.events[0]).toBe(DataEvent.startArray(1));
    expect(collector.events[1].asText()).toBe("a");
  });

  test("diagnostic sink renders on finish", () => {
    const sink = new DiagnosticSink();
    new CborGenerator(sink).writeStartArray(2).writeInteger(1).writeText("a");
    expect(sink.finish()).toBe("[1, \"a\"]");
    expect(sink.finish()).toBe("");
  });
});
