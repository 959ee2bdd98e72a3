import { isRecord } from './utils.js';

const PREFIX = 'SKILLROOT_';
const SEPARATOR = '__';

/**
 * Coerce a string value to a number, boolean, or leave as string.
 */
function coerce(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

/**
 * Apply environment variable overrides to a raw config object.
 *
 * Variables must be prefixed with `SKILLROOT_`. Nesting is expressed
 * with double-underscore (`__`) and keys are lowercased. Values are
 * coerced to numbers/booleans where possible.
 *
 * Example: `SKILLROOT_SKILLS__OVERRIDE=/opt/skills`
 *   → `config.skills.override = '/opt/skills'`
 *
 * `loadConfig` applies this between parsing and validation.
 *
 * @param config The config object to mutate in-place.
 * @param env    Optional env map (defaults to `process.env`).
 * @returns The mutated config (same reference).
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: Record<string, string | undefined> = process.env,
): Record<string, unknown> {
  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || rawValue === undefined) continue;

    const path = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split(SEPARATOR);

    if (path.some((segment) => segment === '')) continue;

    setNested(config, path, coerce(rawValue));
  }

  return config;
}

function setNested(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current: Record<string, unknown> = obj;
  const last = path.length - 1;

  for (const [i, segment] of path.entries()) {
    if (i === last) {
      current[segment] = value;
      return;
    }

    const next = current[segment];
    if (isRecord(next)) {
      current = next;
    } else {
      // Create intermediate object
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
}
