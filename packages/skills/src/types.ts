import type { Logger, Skill, SkillsConfig } from '@skillroot/core';
import type { SkillLoadError } from './errors.js';
import type { HomeDirProvider } from './home-dir.js';

/** Options shared by the discovery operations. */
export interface DiscoveryOptions {
  logger?: Logger;
}

/** A skill directory whose SKILL.md could not be read. */
export interface SkillLoadFailure {
  dir: string;
  error: SkillLoadError;
}

/** Result of scanning one root. */
export interface RootScan {
  root: string;
  skills: Skill[];
  failures: SkillLoadFailure[];
}

/** Merged result of scanning several roots. */
export interface DiscoveryReport {
  skills: Skill[];
  failures: SkillLoadFailure[];
}

/** Options for loading the configured skill catalog of a project. */
export interface SkillCatalogOptions {
  projectDir: string;
  config?: Partial<SkillsConfig>;
  home?: HomeDirProvider;
  builtinDir?: string;
  logger?: Logger;
}

/** Options for loading a project's skill catalog from a config file. */
export interface ConfiguredCatalogOptions extends Omit<SkillCatalogOptions, 'config'> {
  configPath: string;
  env?: Record<string, string | undefined>;
}
