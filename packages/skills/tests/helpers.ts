import { vi } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '@skillroot/core';

export function makeLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Creates `<root>/<dirName>/SKILL.md` and returns the skill directory. */
export async function writeSkill(root: string, dirName: string, content: string): Promise<string> {
  const skillDir = join(root, dirName);
  await mkdir(skillDir, { recursive: true });
  await writeFile(join(skillDir, 'SKILL.md'), content);
  return skillDir;
}

export const FLOW_SKILL = [
  '---',
  'name: flowy',
  'description: Flow skill',
  'type: flow',
  '---',
  '```mermaid',
  'flowchart TD',
  'BEGIN([BEGIN]) --> A[Hello]',
  'A --> END([END])',
  '```',
  '',
].join('\n');
