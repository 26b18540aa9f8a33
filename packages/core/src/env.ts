/**
 * @tracewright/core - Environment Variables
 * Typed reads of process environment variables.
 * An empty variable counts as unset everywhere except {@link getEnv}.
 */

/**
 * Raw value of an environment variable
 */
export function getEnv(key: string, defaultValue?: string): string | undefined {
  return process.env[key] ?? defaultValue;
}

function readSet(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? undefined : value;
}

function readParsed(key: string, parse: (raw: string) => number): number | undefined {
  const raw = readSet(key);
  if (raw === undefined) return undefined;
  const parsed = parse(raw);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Integer value; unparseable input reads as unset
 */
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  return readParsed(key, (raw) => Number.parseInt(raw, 10)) ?? defaultValue;
}

export function getEnvFloat(key: string, defaultValue?: number): number | undefined {
  return readParsed(key, Number.parseFloat) ?? defaultValue;
}

/**
 * Comma-separated list, trimmed, without empty items
 */
export function getEnvArray(key: string): string[] | undefined {
  const raw = readSet(key);
  if (raw === undefined) return undefined;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

/**
 * Look up several variables at once, skipping the ones that are unset or empty.
 * Keys keep the order they were requested in.
 */
export function pickEnv(keys: readonly string[]): Array<[key: string, value: string]> {
  const found: Array<[string, string]> = [];
  for (const key of keys) {
    const value = readSet(key);
    if (value !== undefined) {
      found.push([key, value]);
    }
  }
  return found;
}

/**
 * `NODE_ENV` is `development` or unset
 */
export function isDevelopment(): boolean {
  const env = readSet("NODE_ENV");
  return env === undefined || env === "development";
}
