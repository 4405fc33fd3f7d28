import { afterEach, describe, expect, test, vi } from "vitest";
import { Logger } from "../src/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Logger", () => {
  test("text format", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    new Logger({ format: "text" }).info("rendered", { bytes: 3 });
    expect(info).toHaveBeenCalledWith("INFO rendered {\"bytes\":3}");
  });

  test("text format without meta", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    new Logger({ format: "text" }).warn("careful");
    expect(warn).toHaveBeenCalledWith("WARN careful");
  });

  test("debug needs verbose", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    new Logger({ format: "text" }).debug("hidden");
    expect(info).not.toHaveBeenCalled();
    new Logger({ format: "text", verbose: true }).debug("shown");
    expect(info).toHaveBeenCalledWith("DEBUG shown");
  });

  test("json format", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    new Logger({ format: "json" }).error("bad input", { code: "ERR_STRUCTURE", offset: 5n });
    expect(error).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(error.mock.calls[0][0]));
    expect(line).toMatchObject({ level: "ERROR", message: "bad input", code: "ERR_STRUCTURE", offset: "5" });
  });

  test("format comes from the environment", () => {
    vi.stubEnv("CBORSCOPE_LOG_FORMAT", "json");
    expect(new Logger().format).toBe("json");
    vi.stubEnv("CBORSCOPE_LOG_FORMAT", "");
    expect(new Logger().format).toBe("text");
    vi.unstubAllEnvs();
  });

  test("withVerbose keeps the format", () => {
    const log = new Logger({ format: "json" }).withVerbose(true);
    expect(log.format).toBe("json");
    expect(log.verbose).toBe(true);
    expect(log.withVerbose(true)).toBe(log);
  });
});
