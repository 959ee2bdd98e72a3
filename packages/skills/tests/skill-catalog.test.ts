import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { InvalidConfigError } from '@skillroot/core';
import type { Skill } from '@skillroot/core';
import { staticHomeDirProvider } from '../src/home-dir.js';
import {
  filterSkillsByConfig,
  findSkill,
  formatSkillsSummary,
  indexSkillsByName,
  loadSkillCatalog,
  loadSkillCatalogFromConfig,
} from '../src/skill-catalog.js';
import { parseMermaidFlowchart } from '../src/flow-parser.js';
import { SkillsRootNotFoundError } from '../src/errors.js';
import { makeLogger, writeSkill } from './helpers.js';

const commit: Skill = { name: 'commit', description: 'Commit helper', type: 'standard', dir: '/skills/commit' };
const review: Skill = { name: 'Review', description: 'Review helper', type: 'standard', dir: '/skills/review' };
const release: Skill = {
  name: 'release',
  description: 'Release flow',
  type: 'flow',
  dir: '/skills/release',
  flow: parseMermaidFlowchart('BEGIN --> END'),
};

describe('filterSkillsByConfig', () => {
  it('keeps everything with empty lists', () => {
    expect(filterSkillsByConfig([commit, review], [], [])).toEqual([commit, review]);
  });

  it('respects the disabled list', () => {
    expect(filterSkillsByConfig([commit, review], [], ['commit'])).toEqual([review]);
  });

  it('respects the enabled list', () => {
    expect(filterSkillsByConfig([commit, review], ['commit'], [])).toEqual([commit]);
  });

  it('lets disabled take precedence over enabled', () => {
    expect(filterSkillsByConfig([commit, review], ['commit'], ['commit'])).toEqual([]);
  });
});

describe('indexSkillsByName', () => {
  it('looks skills up case-insensitively', () => {
    const index = indexSkillsByName([commit, review]);
    expect(findSkill(index, 'review')).toBe(review);
    expect(findSkill(index, '  COMMIT ')).toBe(commit);
    expect(findSkill(index, 'deploy')).toBeUndefined();
  });
});

describe('formatSkillsSummary', () => {
  it('formats an available-skills section', () => {
    expect(formatSkillsSummary([commit, release])).toBe([
      '<available-skills>',
      '- commit: Commit helper (path: /skills/commit)',
      '- release [flow]: Release flow (path: /skills/release)',
      '</available-skills>',
    ].join('\n'));
  });

  it('returns an empty string for no skills', () => {
    expect(formatSkillsSummary([])).toBe('');
  });
});

describe('loadSkillCatalog', () => {
  let tempDir: string;
  let builtinDir: string;
  let homeDir: string;
  let projectDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'skill-catalog-'));
    builtinDir = join(tempDir, 'builtin');
    homeDir = join(tempDir, 'home');
    projectDir = join(tempDir, 'project');
    await mkdir(builtinDir);
    await mkdir(homeDir);

    await writeSkill(builtinDir, 'commit', '---\nname: commit\ndescription: builtin\n---\n');
    await writeSkill(builtinDir, 'lint', '---\nname: lint\ndescription: builtin\n---\n');
    await writeSkill(join(homeDir, '.agents', 'skills'), 'commit', '---\nname: commit\ndescription: user\n---\n');
    await writeSkill(join(projectDir, '.agents', 'skills'), 'commit', '---\nname: commit\ndescription: project\n---\n');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('layers builtin, user and project skills', async () => {
    const skills = await loadSkillCatalog({
      projectDir,
      builtinDir,
      home: staticHomeDirProvider(homeDir),
      logger: makeLogger(),
    });

    expect(skills.map((s) => [s.name, s.description])).toEqual([
      ['commit', 'project'],
      ['lint', 'builtin'],
    ]);
  });

  it('applies the enabled and disabled lists', async () => {
    const skills = await loadSkillCatalog({
      projectDir,
      builtinDir,
      home: staticHomeDirProvider(homeDir),
      config: { disabled: ['lint'] },
    });

    expect(skills.map((s) => s.name)).toEqual(['commit']);
  });

  it('uses the override instead of user and project tiers', async () => {
    const overrideDir = join(tempDir, 'override');
    await writeSkill(overrideDir, 'deploy', '---\nname: deploy\n---\n');

    const skills = await loadSkillCatalog({
      projectDir,
      builtinDir,
      home: staticHomeDirProvider(homeDir),
      config: { override: overrideDir },
    });

    expect(skills.map((s) => [s.name, s.description])).toEqual([
      ['commit', 'builtin'],
      ['lint', 'builtin'],
      ['deploy', 'No description provided.'],
    ]);
  });

  it('fails when the override is missing', async () => {
    await expect(
      loadSkillCatalog({
        projectDir,
        builtinDir,
        config: { override: join(tempDir, 'missing') },
      }),
    ).rejects.toThrow(SkillsRootNotFoundError);
  });
});

describe('loadSkillCatalogFromConfig', () => {
  let tempDir: string;
  let builtinDir: string;
  let overrideDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'skill-catalog-config-'));
    builtinDir = join(tempDir, 'builtin');
    overrideDir = join(tempDir, 'override');
    configPath = join(tempDir, 'skillroot.json5');

    await writeSkill(builtinDir, 'commit', '---\nname: commit\ndescription: builtin\n---\n');
    await writeSkill(builtinDir, 'lint', '---\nname: lint\ndescription: builtin\n---\n');
    await writeSkill(overrideDir, 'deploy', '---\nname: deploy\n---\n');
    await writeFile(configPath, '{ skills: { disabled: ["lint"] } }');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('passes an override from the environment to root resolution', async () => {
    const logger = makeLogger();
    const skills = await loadSkillCatalogFromConfig({
      projectDir: join(tempDir, 'project'),
      builtinDir,
      configPath,
      env: { SKILLROOT_SKILLS__OVERRIDE: overrideDir },
      logger,
    });

    expect(skills.map((s) => [s.name, s.description])).toEqual([
      ['commit', 'builtin'],
      ['deploy', 'No description provided.'],
    ]);
    expect(logger.debug).toHaveBeenCalledWith(`Skills roots: ${builtinDir}, ${overrideDir}`);
  });

  it('logs to the console at the configured level', async () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    await loadSkillCatalogFromConfig({
      projectDir: join(tempDir, 'project'),
      builtinDir,
      configPath,
      env: { SKILLROOT_SKILLS__OVERRIDE: overrideDir, SKILLROOT_LOGGING__LEVEL: 'debug' },
    });

    expect(debug).toHaveBeenCalledWith(`[DEBUG] [skills] Skills roots: ${builtinDir}, ${overrideDir}`);
  });

  it('keeps debug output off at the default level', async () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    await loadSkillCatalogFromConfig({
      projectDir: join(tempDir, 'project'),
      builtinDir,
      configPath,
      env: { SKILLROOT_SKILLS__OVERRIDE: overrideDir },
    });

    expect(debug).not.toHaveBeenCalled();
  });

  it('rejects an invalid config file', async () => {
    await writeFile(configPath, '{ skills: { override: 42 } }');

    await expect(
      loadSkillCatalogFromConfig({ projectDir: tempDir, builtinDir, configPath, env: {} }),
    ).rejects.toThrow(InvalidConfigError);
  });
});
