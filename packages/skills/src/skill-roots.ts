import { stat } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { SkillsRootNotFoundError } from './errors.js';
import { createEnvHomeDirProvider } from './home-dir.js';
import type { HomeDirProvider } from './home-dir.js';

const PROJECT_SKILLS_SUBPATH = ['.agents', 'skills'] as const;

/** Home-relative user skills locations, highest priority first. */
const USER_SKILLS_SUBPATHS: ReadonlyArray<readonly string[]> = [
  ['.agents', 'skills'],
  ['.claude', 'skills'],
  ['.codex', 'skills'],
  ['.config', 'agents', 'skills'],
];

export interface ResolveSkillsRootsOptions {
  home?: HomeDirProvider;
  builtinDir?: string;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/** Skills shipped with this package (`<package>/builtin`). */
export function getBuiltinSkillsDir(): string {
  const here = dirname(fileURLToPath(import.meta.url)); // <package>/src
  return resolve(here, '..', 'builtin');
}

export function getProjectSkillsDir(projectDir: string): string {
  return join(resolve(projectDir), ...PROJECT_SKILLS_SUBPATH);
}

/** User skills directories to probe, in priority order. Empty without a home dir. */
export function getUserSkillsCandidates(home: HomeDirProvider = createEnvHomeDirProvider()): string[] {
  const homeDir = home.homeDir();
  if (!homeDir) return [];
  return USER_SKILLS_SUBPATHS.map((subpath) => join(homeDir, ...subpath));
}

/** First user skills candidate that exists as a directory. */
export async function findUserSkillsDir(
  home: HomeDirProvider = createEnvHomeDirProvider(),
): Promise<string | undefined> {
  for (const candidate of getUserSkillsCandidates(home)) {
    if (await isDirectory(candidate)) return candidate;
  }
  return undefined;
}

/**
 * Ordered skills roots, lowest precedence first.
 *
 * The built-in directory always comes first. A non-empty override directory
 * replaces the user and project tiers and must exist. Without one, the
 * first existing user directory is followed by the project's
 * `.agents/skills`, which is listed even if it does not exist yet.
 *
 * @throws SkillsRootNotFoundError when `overrideDir` is not a directory.
 */
export async function resolveSkillsRoots(
  projectDir: string,
  overrideDir?: string,
  options: ResolveSkillsRootsOptions = {},
): Promise<string[]> {
  const roots = [options.builtinDir ?? getBuiltinSkillsDir()];

  // An empty override means none, rather than the current directory.
  if (overrideDir !== undefined && overrideDir.trim() !== '') {
    const override = resolve(overrideDir);
    if (!(await isDirectory(override))) {
      throw new SkillsRootNotFoundError(override);
    }
    roots.push(override);
    return roots;
  }

  const userDir = await findUserSkillsDir(options.home);
  if (userDir) roots.push(userDir);

  roots.push(getProjectSkillsDir(projectDir));
  return roots;
}
