import { readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { nullLogger } from '@skillroot/core';
import type { Logger, Skill } from '@skillroot/core';
import { SkillLoadError } from './errors.js';
import { parseFlowBlock } from './flow-parser.js';
import { parseSkillMarkdown } from './skill-parser.js';

export const SKILL_FILENAME = 'SKILL.md';
export const DEFAULT_DESCRIPTION = 'No description provided.';

const FLOW_TYPE = 'flow';

export interface SkillLoaderOptions {
  logger?: Logger;
}

function isMissingFileError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

/**
 * Build a skill record from the text of its SKILL.md file.
 * Flow skills whose flowchart is missing or broken become standard skills.
 */
export function buildSkill(content: string, dir: string, logger: Logger = nullLogger): Skill {
  const parsed = parseSkillMarkdown(content);
  const name = parsed.name ?? basename(dir);
  const description = parsed.description ?? DEFAULT_DESCRIPTION;

  if (parsed.type?.toLowerCase() === FLOW_TYPE) {
    const result = parseFlowBlock(parsed.body, logger);
    if (result.status === 'parsed') {
      return { name, description, type: 'flow', dir, flow: result.flow };
    }
    const reason = result.status === 'absent' ? 'no flowchart block found' : result.reason;
    logger.warn(`Skill "${name}" declares type flow but ${reason}; loading as standard`);
  }

  return { name, description, type: 'standard', dir };
}

/**
 * Load the skill defined in `dir`.
 * Returns null when the directory has no SKILL.md.
 *
 * @throws SkillLoadError when SKILL.md exists but cannot be read.
 */
export async function loadSkill(dir: string, options: SkillLoaderOptions = {}): Promise<Skill | null> {
  const logger = options.logger ?? nullLogger;
  const skillPath = join(dir, SKILL_FILENAME);

  let content: string;
  try {
    content = await readFile(skillPath, 'utf-8');
  } catch (err) {
    if (isMissingFileError(err)) return null;
    throw new SkillLoadError(dir, err);
  }

  return buildSkill(content, dir, logger);
}
