import { describe, expect, test } from "vitest";
import { fromHex } from "../src/bytes.js";
import { DiagnosticRenderer, escapeText, halfToNumber, renderDiagnostic } from "../src/diagnostic.js";
import { CborDepthError, CborNotWellFormedError, CborStructureError } from "../src/errors.js";
import { CborParser } from "../src/parser.js";

function diag(hex: string, maxDepth?: number): string {
  return renderDiagnostic(fromHex(hex), { maxDepth });
}

describe("renderDiagnostic", () => {
  test("integers", () => {
    expect(diag("00")).toBe("0");
    expect(diag("20")).toBe("-1");
    expect(diag("3903e7")).toBe("-1000");
    expect(diag("1bffffffffffffffff")).toBe("18446744073709551615");
    expect(diag("3bffffffffffffffff")).toBe("-18446744073709551616");
  });

  test("simple values", () => {
    expect(diag("f4")).toBe("false");
    expect(diag("f5")).toBe("true");
    expect(diag("f6")).toBe("null");
    expect(diag("f7")).toBe("undefined");
    expect(diag("f0")).toBe("simple(16)");
    expect(diag("f8ff")).toBe("simple(255)");
  });

  test("half floats", () => {
    expect(diag("f90000")).toBe("0.0");
    expect(diag("f98000")).toBe("-0.0");
    expect(diag("f93c00")).toBe("1.0");
    expect(diag("f93e00")).toBe("1.5");
    expect(diag("f97bff")).toBe("65504.0");
    expect(diag("f90001")).toBe("5.960464477539063e-8");
    expect(diag("f97c00")).toBe("Infinity");
    expect(diag("f9fc00")).toBe("-Infinity");
    expect(diag("f97e00")).toBe("NaN");
  });

  test("single and double floats", () => {
    expect(diag("fa47c35000")).toBe("100000.0");
    expect(diag("fa3dcccccd")).toBe("0.1");
    expect(diag("fa7f7fffff")).toBe("3.4028235e+38");
    expect(diag("fb3ff199999999999a")).toBe("1.1");
    expect(diag("fbc010666666666666")).toBe("-4.1");
    expect(diag("fb7e37e43c8800759c")).toBe("1e+300");
  });

  test("strings", () => {
    expect(diag("40")).toBe("h''");
    expect(diag("4401020304")).toBe("h'01020304'");
    expect(diag("60")).toBe("\"\"");
    expect(diag("6449455446")).toBe("\"IETF\"");
    expect(diag("62c3bc")).toBe("\"ü\"");
  });

  test("chunked strings", () => {
    expect(diag("5f42010243030405ff")).toBe("(_ h'0102', h'030405')");
    expect(diag("7f657374726561646d696e67ff")).toBe("(_ \"strea\", \"ming\")");
    expect(diag("5fff")).toBe("(_ )");
  });

  test("definite containers", () => {
    expect(diag("80")).toBe("[]");
    expect(diag("820102")).toBe("[1, 2]");
    expect(diag("8301820203820405")).toBe("[1, [2, 3], [4, 5]]");
    expect(diag("a0")).toBe("{}");
    expect(diag("a201020304")).toBe("{1: 2, 3: 4}");
    expect(diag("a26161016162820203")).toBe("{\"a\": 1, \"b\": [2, 3]}");
  });

  test("indefinite containers", () => {
    expect(diag("9fff")).toBe("[_ ]");
    expect(diag("9f018202039f0405ffff")).toBe("[_ 1, [2, 3], [_ 4, 5]]");
    expect(diag("bf6346756ef563416d7421ff")).toBe("{_ \"Fun\": true, \"Amt\": -2}");
  });

  test("tags", () => {
    expect(diag("c11a514b67b0")).toBe("1(1363896240)");
    expect(diag("d82063616263")).toBe("32(\"abc\")");
  });

  test("sequences are comma separated", () => {
    expect(diag("0102")).toBe("1, 2");
    expect(diag("")).toBe("");
  });
});

describe("malformed input", () => {
  test("stray break", () => {
    expect(() => diag("ff")).toThrow(CborStructureError);
    expect(() => diag("a1 01 ff")).toThrow(CborStructureError);
  });

  test("missing children", () => {
    expect(() => diag("8201")).toThrow(CborNotWellFormedError);
    expect(() => diag("9f01")).toThrow(CborNotWellFormedError);
    expect(() => diag("c1")).toThrow(CborNotWellFormedError);
  });

  test("chunked strings", () => {
    expect(() => diag("5f01ff")).toThrow(CborStructureError);
    expect(() => diag("5f6161ff")).toThrow(CborStructureError);
    expect(() => diag("5f4101")).toThrow(CborNotWellFormedError);
  });

  test("invalid utf8", () => {
    expect(() => diag("61ff")).toThrow(CborNotWellFormedError);
  });

  test("depth limit", () => {
    expect(() => diag("818101", 1)).toThrow(CborDepthError);
    expect(diag("818101", 2)).toBe("[[1]]");
  });
});

describe("DiagnosticRenderer", () => {
  test("processes one item per call", () => {
    const renderer = new DiagnosticRenderer(CborParser.fromBytes(fromHex("8101 02")));
    expect(renderer.process()).toBe("[1]");
    expect(renderer.hasNext()).toBe(true);
    expect(renderer.process()).toBe("2");
    expect(renderer.hasNext()).toBe(false);
  });
});

describe("literals", () => {
  test("escapeText", () => {
    expect(escapeText("plain")).toBe("\"plain\"");
    expect(escapeText("a\"b\n\u0001")).toBe("\"a\\\"b\\n\\u0001\"");
    expect(escapeText("\b\f\r\t")).toBe("\"\\b\\f\\r\\t\"");
  });

  test("halfToNumber", () => {
    expect(halfToNumber(0x3c00)).toBe(1);
    expect(halfToNumber(0xc400)).toBe(-4);
    expect(halfToNumber(0x0400)).toBe(2 ** -14);
    expect(Number.isNaN(halfToNumber(0x7e00))).toBe(true);
  });
});
