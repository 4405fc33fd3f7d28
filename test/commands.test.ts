import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, afterEach, describe, expect, test, vi } from "vitest";
import { HELP, UsageError, parseArgs, run } from "../src/commands.js";
import { Logger, logger } from "../src/logger.js";

const dir = mkdtempSync(join(tmpdir(), "cborscope-cli-"));
writeFileSync(join(dir, "item.cbor"), Uint8Array.from([0x83, 0x01, 0x02, 0x03]));

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

afterEach(() => {
  vi.restoreAllMocks();
});

async function runCli(argv: string[]): Promise<{ code: number; lines: string[] }> {
  const lines: string[] = [];
  const code = await run(argv, {
    cwd: dir,
    logger: new Logger({ format: "text" }),
    out: (line) => lines.push(line),
  });
  return { code, lines };
}

describe("parseArgs", () => {
  test("command, input and options", () => {
    expect(parseArgs(["diag", "82", "0102", "--max-depth", "4", "--verbose"])).toEqual({
      help: false,
      command: "diag",
      input: "820102",
      maxDepth: 4,
      verbose: true,
    });
  });

  test("rejects bad options", () => {
    expect(() => parseArgs(["diag", "--max-depth", "x"])).toThrow(UsageError);
    expect(() => parseArgs(["diag", "--file"])).toThrow(UsageError);
    expect(() => parseArgs(["diag", "--color"])).toThrow("unknown option: --color");
  });
});

describe("run", () => {
  test("diag renders hex input", async () => {
    expect(await runCli(["diag", "bf6346756ef563416d7421ff"])).toEqual({
      code: 0,
      lines: ["{_ \"Fun\": true, \"Amt\": -2}"],
    });
  });

  test("diag reads a file", async () => {
    expect(await runCli(["diag", "--file", "item.cbor"])).toEqual({ code: 0, lines: ["[1, 2, 3]"] });
  });

  test("events prints one line per event", async () => {
    expect(await runCli(["events", "8101"])).toEqual({
      code: 0,
      lines: [
        "[DataEvent 81 Array:Immediate count 1]",
        "[DataEvent 01 UnsignedInteger:Immediate 1]",
      ],
    });
  });

  test("events ignores the depth limit", async () => {
    expect(await runCli(["events", "818101", "--max-depth", "0"])).toEqual({
      code: 0,
      lines: [
        "[DataEvent 81 Array:Immediate count 1]",
        "[DataEvent 81 Array:Immediate count 1]",
        "[DataEvent 01 UnsignedInteger:Immediate 1]",
      ],
    });
  });

  test("logs through the shared logger by default", async () => {
    const error = vi.spyOn(logger, "error").mockImplementation(() => {});
    const lines: string[] = [];
    expect(await run(["encode"], { cwd: dir, out: (line) => lines.push(line) })).toBe(1);
    expect(error).toHaveBeenCalledWith("unknown command: encode");
    expect(lines).toEqual([HELP]);
  });

  test("codec errors are logged with their code", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const result = await runCli(["diag", "ff"]);
    expect(result).toEqual({ code: 1, lines: [] });
    expect(error).toHaveBeenCalledWith(
      "ERROR break outside an indefinite-length container {\"code\":\"ERR_STRUCTURE\",\"category\":\"malformed\"}",
    );
  });

  test("max depth flag", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    expect((await runCli(["diag", "8101", "--max-depth", "0"])).code).toBe(1);
    expect(error).toHaveBeenCalledWith(
      "ERROR nesting exceeds maximum depth of 0 {\"code\":\"ERR_DEPTH\",\"category\":\"malformed\"}",
    );
  });

  test("verbose logs debug lines", async () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    await runCli(["diag", "00", "--verbose"]);
    expect(info).toHaveBeenCalledWith("DEBUG rendering {\"bytes\":1}");
  });

  test("help", async () => {
    expect(await runCli([])).toEqual({ code: 0, lines: [HELP] });
    expect(await runCli(["diag", "-h"])).toEqual({ code: 0, lines: [HELP] });
  });

  test("usage errors print help", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(await runCli(["encode"])).toEqual({ code: 1, lines: [HELP] });
    expect(error).toHaveBeenCalledWith("ERROR unknown command: encode");
    expect(await runCli(["diag"])).toEqual({ code: 1, lines: [HELP] });
  });
});
