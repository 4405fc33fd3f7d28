import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { DEFAULT_MAX_DEPTH } from "./constants.js";
import { CborArgumentError } from "./errors.js";

export interface CborscopeConfig {
  /** Nesting ceiling for rendering and skipping. */
  maxDepth?: number;
  /** Log debug lines. */
  verbose?: boolean;
}

export type ResolvedConfig = Required<CborscopeConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  maxDepth: DEFAULT_MAX_DEPTH,
  verbose: false,
};

export const CONFIG_FILES = [
  "cborscope.config.js",
  "cborscope.config.mjs",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readMaxDepth(value: unknown, source: string): number {
  if (value === undefined) return DEFAULT_CONFIG.maxDepth;
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw new CborArgumentError(`${source}: maxDepth must be a non-negative integer`);
  }
  return value;
}

function readVerbose(value: unknown, source: string): boolean {
  if (value === undefined) return DEFAULT_CONFIG.verbose;
  if (typeof value !== "boolean") throw new CborArgumentError(`${source}: verbose must be a boolean`);
  return value;
}

/** Check an untrusted config object and fill in defaults. */
export function resolveConfig(value: unknown, source = "config"): ResolvedConfig {
  if (value === undefined) return { ...DEFAULT_CONFIG };
  if (!isRecord(value)) throw new CborArgumentError(`${source}: default export must be an object`);
  return {
    maxDepth: readMaxDepth(value.maxDepth, source),
    verbose: readVerbose(value.verbose, source),
  };
}

/** Load the first config file found in `cwd`, or the defaults when there is none. */
export async function loadConfig(cwd?: string): Promise<ResolvedConfig> {
  const dir = cwd ?? process.cwd();

  for (const name of CONFIG_FILES) {
    const file = resolve(dir, name);
    if (existsSync(file)) {
      const mod: unknown = await import(pathToFileURL(file).href);
      return resolveConfig(isRecord(mod) ? mod.default : undefined, name);
    }
  }

  return { ...DEFAULT_CONFIG };
}

export function defineConfig(config: CborscopeConfig): CborscopeConfig {
  return config;
}
