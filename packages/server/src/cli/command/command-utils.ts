/**
 * level : 0 | 1 | 2
 * 0 === default output
 * 1 === --verbose or -v (config sources, fallbacks)
 * 2 === -vv (adds debug logs)
 */
export function extractVerbosity(args: string[]) {
  let level = 0;
  const rest: string[] = [];

  for (const arg of args) {
    if (arg === "--verbose" || arg === "-v") {
      level += 1;
      continue;
    }

    if (/^-v{2,}$/.test(arg)) {
      level += arg.length - 1; // -vv
      continue;
    }

    rest.push(arg);
  }

  return { level, rest };
}

export function parsePositiveNumberFromCommand(name: string, v: string | undefined, fallback: number) {
  const n = v === undefined ? fallback : Number(v);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive number`);
  }
  return n;
}

export function parsePortFromCommand(name: string, v: string | undefined): number | undefined {
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isInteger(n) || n < 0 || n > 65535) {
    throw new Error(`${name} must be an integer between 0 and 65535`);
  }
  return n;
}

/**
 * --material cotton=0.6 --material polyester=0.4
 * A single bare id (--material cotton) means a share of 1.0.
 */
export function parseMaterialFlags(values: string[] | undefined): Record<string, number> {
  if (!values || values.length === 0) {
    throw new Error("--material is required (e.g. --material cotton=0.6 --material polyester=0.4)");
  }

  if (values.length === 1 && !values[0].includes("=")) {
    return { [values[0].trim()]: 1 };
  }

  const composition: Record<string, number> = {};
  for (const value of values) {
    const separator = value.lastIndexOf("=");
    if (separator <= 0) {
      throw new Error(`--material: expected <id>=<share>, got "${value}"`);
    }
    const id = value.slice(0, separator).trim();
    const share = Number(value.slice(separator + 1));
    if (!Number.isFinite(share)) {
      throw new Error(`--material: share for "${id}" is not a number`);
    }
    composition[id] = share;
  }
  return composition;
}
