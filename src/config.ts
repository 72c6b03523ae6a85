import type { Dialect } from "./ast.js";
import { DEFAULT_MAX_DEPTH } from "./machine.js";
import { err, ok, type Result } from "./result.js";

export type PlatesConfig = {
  files: string[];
  /** Seed for `PUSH *`; unseeded when absent. */
  seed?: number;
  maxDepth: number;
  dialect: Dialect;
  debug: boolean;
  help: boolean;
};

export type Env = Record<string, string | undefined>;

export const USAGE = `Usage: plates [options] <file...>

Options:
  --seed <n>                 seed the random byte source used by PUSH *   (PLATES_SEED)
  --max-depth <n>            maximum call depth, default ${DEFAULT_MAX_DEPTH}   (PLATES_MAX_DEPTH)
  --dialect <params|stack>   calling convention, default params   (PLATES_DIALECT)
  --debug                    print the stack after every instruction   (PLATES_DEBUG=1)
  --help                     show this message`;

const VALUE_FLAGS = new Set(["--seed", "--max-depth", "--dialect"]);

function parseSeed(raw: string, from: string): Result<number, string> {
  if (!/^\d+$/.test(raw) || Number(raw) > 0xffffffff) {
    return err(`${from}: expected an integer between 0 and 4294967295, got '${raw}'`);
  }
  return ok(Number(raw));
}

function parseMaxDepth(raw: string, from: string): Result<number, string> {
  if (!/^\d+$/.test(raw) || Number(raw) < 1 || !Number.isSafeInteger(Number(raw))) {
    return err(`${from}: expected a positive integer, got '${raw}'`);
  }
  return ok(Number(raw));
}

function parseDialect(raw: string, from: string): Result<Dialect, string> {
  if (raw !== "params" && raw !== "stack") {
    return err(`${from}: expected 'params' or 'stack', got '${raw}'`);
  }
  return ok(raw);
}

function applyValue(
  config: PlatesConfig,
  key: string,
  raw: string,
  from: string
): Result<PlatesConfig, string> {
  switch (key) {
    case "--seed": {
      const seed = parseSeed(raw, from);
      return seed.ok ? ok({ ...config, seed: seed.value }) : seed;
    }
    case "--max-depth": {
      const maxDepth = parseMaxDepth(raw, from);
      return maxDepth.ok ? ok({ ...config, maxDepth: maxDepth.value }) : maxDepth;
    }
    default: {
      const dialect = parseDialect(raw, from);
      return dialect.ok ? ok({ ...config, dialect: dialect.value }) : dialect;
    }
  }
}

const ENV_KEYS: [string, string][] = [
  ["PLATES_SEED", "--seed"],
  ["PLATES_MAX_DEPTH", "--max-depth"],
  ["PLATES_DIALECT", "--dialect"],
];

/**
 * Defaults, then `PLATES_*` environment variables, then command-line flags.
 */
export function resolveConfig(
  argv: readonly string[],
  env: Env = {}
): Result<PlatesConfig, string> {
  let config: PlatesConfig = {
    files: [],
    maxDepth: DEFAULT_MAX_DEPTH,
    dialect: "params",
    debug: env.PLATES_DEBUG === "1" || env.PLATES_DEBUG === "true",
    help: false,
  };

  for (const [name, flag] of ENV_KEYS) {
    const raw = env[name];
    if (raw === undefined || raw === "") continue;
    const next = applyValue(config, flag, raw, name);
    if (!next.ok) return next;
    config = next.value;
  }

  const files: string[] = [];
  let onlyFiles = false;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (onlyFiles || !arg.startsWith("--")) {
      files.push(arg);
      continue;
    }
    if (arg === "--") {
      onlyFiles = true;
      continue;
    }
    if (arg === "--debug") {
      config = { ...config, debug: true };
      continue;
    }
    if (arg === "--help") {
      config = { ...config, help: true };
      continue;
    }

    const eq = arg.indexOf("=");
    const key = eq >= 0 ? arg.slice(0, eq) : arg;
    if (!VALUE_FLAGS.has(key)) return err(`unknown option '${arg}'`);
    let raw: string;
    if (eq >= 0) {
      raw = arg.slice(eq + 1);
    } else {
      const value = argv[i + 1];
      if (value === undefined) return err(`option '${key}' requires a value`);
      raw = value;
      i++;
    }
    const next = applyValue(config, key, raw, key);
    if (!next.ok) return next;
    config = next.value;
  }

  return ok({ ...config, files });
}
