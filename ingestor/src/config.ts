import * as path from "node:path";
import { ConfigSchema, configFromEnv, type Config } from "@quantlake/shared";
import { ConfigurationError } from "./errors.js";

type Env = Record<string, string | undefined>;
type RawObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Nested objects merge key by key; anything else in `over` replaces `base`. */
function deepMerge(base: RawObject, over: RawObject): RawObject {
  const out: RawObject = { ...base };
  for (const [key, value] of Object.entries(over)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return out;
}

/**
 * Defaults, then environment overrides, then explicit overrides (CLI flags).
 * `dataRoot` comes back absolute; a file catalog path is resolved against
 * the working directory.
 */
export function loadConfig(env: Env = process.env, overrides: RawObject = {}): Config {
  const result = ConfigSchema.safeParse(deepMerge(configFromEnv(env), overrides));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const config = result.data;
  return {
    ...config,
    dataRoot: path.resolve(config.dataRoot),
    catalog: {
      ...config.catalog,
      path: config.catalog.path === ":memory:" ? config.catalog.path : path.resolve(config.catalog.path),
    },
  };
}
