import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { nullLogger } from '@skillroot/core';
import type { Logger, Skill } from '@skillroot/core';
import { SkillLoadError } from './errors.js';
import { loadSkill } from './skill-loader.js';
import type { DiscoveryOptions, DiscoveryReport, RootScan, SkillLoadFailure } from './types.js';

function errorCode(err: unknown): string {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return String(err);
}

function isMissingRootError(err: unknown): boolean {
  const code = errorCode(err);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/** Sorted immediate subdirectories of `root`, or null when it cannot be listed. */
async function listSubdirectories(root: string, logger: Logger): Promise<string[] | null> {
  let entries: string[];
  try {
    entries = await readdir(root);
  } catch (err) {
    if (isMissingRootError(err)) {
      logger.debug(`Skills root not found: ${root}`);
    } else {
      logger.warn(`Cannot read skills root ${root} (${errorCode(err)})`);
    }
    return null;
  }

  const dirs: string[] = [];
  for (const entry of entries.sort()) {
    const dir = join(root, entry);
    try {
      if ((await stat(dir)).isDirectory()) dirs.push(dir);
    } catch (err) {
      logger.warn(`Skipping ${dir}: stat failed (${errorCode(err)})`);
    }
  }
  return dirs;
}

function toFailure(dir: string, err: unknown): SkillLoadFailure {
  return { dir, error: err instanceof SkillLoadError ? err : new SkillLoadError(dir, err) };
}

/**
 * Scan a single root for skill subdirectories containing SKILL.md files.
 * Subdirectories load one at a time in sorted order, so at most one
 * SKILL.md per root is open at once.
 */
export async function scanSkillRoot(
  root: string,
  options: DiscoveryOptions = {},
): Promise<RootScan> {
  const logger = options.logger ?? nullLogger;
  const skills: Skill[] = [];
  const failures: SkillLoadFailure[] = [];

  const dirs = await listSubdirectories(root, logger);
  if (dirs === null) {
    return { root, skills, failures };
  }

  for (const dir of dirs) {
    try {
      const skill = await loadSkill(dir, { logger });
      if (skill) skills.push(skill);
    } catch (err) {
      failures.push(toFailure(dir, err));
    }
  }

  logger.debug(`Found ${skills.length} skill(s) in ${root}`);
  return { root, skills, failures };
}

/**
 * Merge multiple skill sources. Later sources override earlier ones by name.
 * A name keeps the position where it was first seen.
 */
export function mergeSkillSources(...sources: Skill[][]): Skill[] {
  const map = new Map<string, Skill>();
  for (const source of sources) {
    for (const skill of source) {
      map.set(skill.name, skill);
    }
  }
  return [...map.values()];
}

/**
 * Scan roots concurrently, then fold them in root order so that later
 * roots win. Load failures are collected instead of thrown.
 */
export async function scanSkillRoots(
  roots: readonly string[],
  options: DiscoveryOptions = {},
): Promise<DiscoveryReport> {
  const scans = await Promise.all(roots.map((root) => scanSkillRoot(root, options)));

  return {
    skills: mergeSkillSources(...scans.map((scan) => scan.skills)),
    failures: scans.flatMap((scan) => scan.failures),
  };
}

/**
 * Discover skills from several roots, lowest precedence first.
 * Skills that fail to load are logged and left out.
 */
export async function discoverSkillsFromRoots(
  roots: readonly string[],
  options: DiscoveryOptions = {},
): Promise<Skill[]> {
  const logger = options.logger ?? nullLogger;
  const report = await scanSkillRoots(roots, options);

  for (const failure of report.failures) {
    logger.warn(failure.error.message);
  }
  return report.skills;
}

/** Discover skills from a single root. */
export async function discoverSkills(
  root: string,
  options: DiscoveryOptions = {},
): Promise<Skill[]> {
  return discoverSkillsFromRoots([root], options);
}
