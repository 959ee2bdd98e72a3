import { createConsoleLogger, loadConfigOrThrow, nullLogger } from '@skillroot/core';
import type { Skill } from '@skillroot/core';
import { discoverSkillsFromRoots } from './skill-discovery.js';
import { resolveSkillsRoots } from './skill-roots.js';
import type { ConfiguredCatalogOptions, SkillCatalogOptions } from './types.js';

/**
 * Filter skills by enabled/disabled config lists.
 * Disabled takes precedence. Empty enabled list means all are enabled.
 */
export function filterSkillsByConfig(
  skills: Skill[],
  enabled: readonly string[],
  disabled: readonly string[],
): Skill[] {
  return skills.filter((skill) => {
    if (disabled.includes(skill.name)) return false;
    if (enabled.length === 0) return true;
    return enabled.includes(skill.name);
  });
}

/**
 * Resolve the roots for a project, discover their skills and apply
 * the enabled/disabled lists.
 *
 * @throws SkillsRootNotFoundError when the configured override is missing.
 */
export async function loadSkillCatalog(options: SkillCatalogOptions): Promise<Skill[]> {
  const logger = options.logger ?? nullLogger;
  const config = options.config ?? {};

  const roots = await resolveSkillsRoots(options.projectDir, config.override, {
    home: options.home,
    builtinDir: options.builtinDir,
  });
  logger.debug(`Skills roots: ${roots.join(', ')}`);

  const skills = await discoverSkillsFromRoots(roots, { logger });
  return filterSkillsByConfig(skills, config.enabled ?? [], config.disabled ?? []);
}

/**
 * Load the catalog described by a JSON5 config file, after `SKILLROOT_*`
 * environment overrides. Without an explicit logger, messages go to the
 * console at the configured `logging.level`.
 *
 * @throws InvalidConfigError when the config file is unreadable or invalid.
 */
export async function loadSkillCatalogFromConfig(options: ConfiguredCatalogOptions): Promise<Skill[]> {
  const { configPath, env, ...rest } = options;
  const config = loadConfigOrThrow(configPath, env);
  const logger = options.logger
    ?? createConsoleLogger({ level: config.logging?.level ?? 'info', prefix: 'skills' });

  return loadSkillCatalog({ ...rest, config: config.skills, logger });
}

export function normalizeSkillName(name: string): string {
  return name.trim().toLowerCase();
}

/** Case-insensitive lookup table. Later skills win on normalized collisions. */
export function indexSkillsByName(skills: readonly Skill[]): Map<string, Skill> {
  const index = new Map<string, Skill>();
  for (const skill of skills) {
    index.set(normalizeSkillName(skill.name), skill);
  }
  return index;
}

export function findSkill(index: ReadonlyMap<string, Skill>, name: string): Skill | undefined {
  return index.get(normalizeSkillName(name));
}

/** Formats skills as an `<available-skills>` prompt section. */
export function formatSkillsSummary(skills: readonly Skill[]): string {
  if (skills.length === 0) return '';
  const lines = skills.map((s) => {
    const tag = s.type === 'flow' ? ' [flow]' : '';
    return `- ${s.name}${tag}: ${s.description} (path: ${s.dir})`;
  });
  return `<available-skills>\n${lines.join('\n')}\n</available-skills>`;
}
