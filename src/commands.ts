import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { fromHex } from "./bytes.js";
import { loadConfig, type ResolvedConfig } from "./config.js";
import { renderDiagnostic } from "./diagnostic.js";
import { CborError } from "./errors.js";
import { Logger, logger } from "./logger.js";
import { CborParser } from "./parser.js";

export const HELP = `Usage: cborscope <command> [options]

Commands:
  diag <hex>                        Render hex-encoded CBOR as diagnostic notation
  diag --file <path>                Render a binary CBOR file
  events <hex>                      Print one line per decoded event

Options:
  --max-depth <n>                   Maximum nesting depth (default 256)
  --verbose                         Log debug output
  -h, --help                        Show this help`;

export interface CliArgs {
  command?: string;
  input?: string;
  file?: string;
  maxDepth?: number;
  verbose?: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = { help: false };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-h" || arg === "--help") {
      parsed.help = true;
    } else if (arg === "--verbose") {
      parsed.verbose = true;
    } else if (arg === "--file") {
      const file = args[++i];
      if (file === undefined) throw new UsageError("--file requires a path");
      parsed.file = file;
    } else if (arg === "--max-depth") {
      const value = args[++i];
      const n = value === undefined ? NaN : Number(value);
      if (!Number.isSafeInteger(n) || n < 0) throw new UsageError("--max-depth requires a non-negative integer");
      parsed.maxDepth = n;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  parsed.command = positional[0];
  parsed.input = positional.slice(1).join("");
  return parsed;
}

/** Lines written to stdout; logs go through the logger. */
export type Output = (line: string) => void;

function readInput(args: CliArgs, cwd: string): Uint8Array {
  if (args.file !== undefined) return new Uint8Array(readFileSync(resolve(cwd, args.file)));
  if (!args.input) throw new UsageError("no input: pass hex digits or --file <path>");
  return fromHex(args.input);
}

function runDiag(bytes: Uint8Array, config: ResolvedConfig, out: Output): void {
  out(renderDiagnostic(bytes, { maxDepth: config.maxDepth }));
}

function runEvents(bytes: Uint8Array, out: Output): void {
  for (const event of CborParser.fromBytes(bytes)) out(event.toString());
}

/**
 * Run one command line. Returns the process exit code: 0 on success, 1 on
 * any error, which is logged.
 */
export async function run(
  argv: readonly string[],
  options: { cwd?: string; logger?: Logger; out?: Output } = {},
): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const out = options.out ?? ((line: string) => console.log(line));
  let log = options.logger ?? logger;

  try {
    const args = parseArgs(argv);
    if (!args.command || args.help) {
      out(HELP);
      return 0;
    }

    const file = await loadConfig(cwd);
    const config: ResolvedConfig = {
      maxDepth: args.maxDepth ?? file.maxDepth,
      verbose: args.verbose ?? file.verbose,
    };
    log = log.withVerbose(config.verbose);
    log.debug("resolved configuration", { ...config });

    switch (args.command) {
      case "diag": {
        const bytes = readInput(args, cwd);
        log.debug("rendering", { bytes: bytes.length });
        runDiag(bytes, config, out);
        return 0;
      }
      case "events": {
        const bytes = readInput(args, cwd);
        log.debug("decoding", { bytes: bytes.length });
        runEvents(bytes, out);
        return 0;
      }
      default:
        throw new UsageError(`unknown command: ${args.command}`);
    }
  } catch (err) {
    if (err instanceof CborError) {
      log.error(err.message, { code: err.code, category: err.category });
    } else if (err instanceof UsageError) {
      log.error(err.message);
      out(HELP);
    } else {
      log.error(err instanceof Error ? err.message : String(err));
    }
    return 1;
  }
}
