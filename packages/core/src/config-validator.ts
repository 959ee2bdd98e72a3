import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import type { LoggingConfig, SkillrootConfig } from './config.js';
import type { SkillsConfig } from './skills.js';
import { applyEnvOverrides } from './config-env-overlay.js';
import { isLogLevel } from './logger.js';
import { isRecord, isStringArray } from './utils.js';

/** All valid top-level keys. */
const VALID_TOP_LEVEL_KEYS = new Set<string>(['skills', 'logging']);

const VALID_SKILLS_KEYS = new Set<string>(['override', 'enabled', 'disabled']);

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: SkillrootConfig;
}

function validateSkillsSection(
  section: Record<string, unknown>,
  errors: ConfigValidationError[],
): SkillsConfig {
  const skills: SkillsConfig = { enabled: [], disabled: [] };

  for (const key of Object.keys(section)) {
    if (!VALID_SKILLS_KEYS.has(key)) {
      errors.push({ path: `skills.${key}`, message: `Unknown key: "${key}"` });
    }
  }

  const override = section['override'];
  if (typeof override === 'string') {
    skills.override = override;
  } else if (override !== undefined) {
    errors.push({ path: 'skills.override', message: 'Must be a string' });
  }

  for (const list of ['enabled', 'disabled'] as const) {
    const value = section[list];
    if (isStringArray(value)) {
      skills[list] = value;
    } else if (value !== undefined) {
      errors.push({ path: `skills.${list}`, message: 'Must be an array of strings' });
    }
  }

  return skills;
}

function validateLoggingSection(
  section: Record<string, unknown>,
  errors: ConfigValidationError[],
): LoggingConfig {
  const level = section['level'];
  if (level === undefined) return { level: 'info' };
  if (isLogLevel(level)) return { level };

  errors.push({
    path: 'logging.level',
    message: `Invalid log level: ${JSON.stringify(level)}`,
  });
  return { level: 'info' };
}

/**
 * Validate an already-parsed config value.
 * Rejects unknown top-level keys (strict mode) and fills list defaults.
 */
export function validateConfigObject(parsed: unknown): ConfigValidationResult {
  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  const errors: ConfigValidationError[] = [];

  // Check for unknown top-level keys (strict mode)
  for (const key of Object.keys(parsed)) {
    if (!VALID_TOP_LEVEL_KEYS.has(key)) {
      errors.push({ path: key, message: `Unknown top-level key: "${key}"` });
    }
  }

  let skills: SkillsConfig = { enabled: [], disabled: [] };
  const skillsSection = parsed['skills'];
  if (skillsSection === undefined) {
    errors.push({ path: 'skills', message: 'Missing required section: "skills"' });
  } else if (!isRecord(skillsSection)) {
    errors.push({ path: 'skills', message: 'Section "skills" must be an object' });
  } else {
    skills = validateSkillsSection(skillsSection, errors);
  }

  const config: SkillrootConfig = { skills };
  const loggingSection = parsed['logging'];
  if (isRecord(loggingSection)) {
    config.logging = validateLoggingSection(loggingSection, errors);
  } else if (loggingSection !== undefined) {
    errors.push({ path: 'logging', message: 'Section "logging" must be an object' });
  }

  return {
    valid: errors.length === 0,
    errors,
    config: errors.length === 0 ? config : undefined,
  };
}

/** Thrown when a config file fails validation. */
export class InvalidConfigError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly errors: ConfigValidationError[],
  ) {
    const details = errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message));
    super(`Invalid config ${filePath}: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
  }
}

function parseJson5(json5String: string): { parsed: unknown } | { error: ConfigValidationResult } {
  try {
    return { parsed: JSON5.parse(json5String) };
  } catch (err) {
    return {
      error: {
        valid: false,
        errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
      },
    };
  }
}

/**
 * Parse and validate a JSON5 config string.
 */
export function validateConfig(json5String: string): ConfigValidationResult {
  const result = parseJson5(json5String);
  if ('error' in result) return result.error;
  return validateConfigObject(result.parsed);
}

/**
 * Load a JSON5 config file from disk, apply `SKILLROOT_*` environment
 * overrides, then validate the result.
 */
export function loadConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): ConfigValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
    };
  }

  const result = parseJson5(content);
  if ('error' in result) return result.error;
  const { parsed } = result;
  return validateConfigObject(isRecord(parsed) ? applyEnvOverrides(parsed, env) : parsed);
}

/**
 * Like `loadConfig`, but returns the validated config.
 *
 * @throws InvalidConfigError when the file is unreadable or invalid.
 */
export function loadConfigOrThrow(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): SkillrootConfig {
  const result = loadConfig(filePath, env);
  if (!result.config) {
    throw new InvalidConfigError(filePath, result.errors);
  }
  return result.config;
}
