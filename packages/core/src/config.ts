import type { LogLevel } from './logger.js';
import type { SkillsConfig } from './skills.js';

/** Top-level configuration schema for Skillroot. */
export interface SkillrootConfig {
  skills: SkillsConfig;
  logging?: LoggingConfig;
}

export interface LoggingConfig {
  level: LogLevel;
}
