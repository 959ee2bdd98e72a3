// Skill records
export type {
  SkillType,
  Skill,
  StandardSkill,
  FlowSkill,
  FlowDefinition,
  FlowGraph,
  FlowNode,
  FlowNodeKind,
  FlowNodeShape,
  FlowEdge,
  SkillsConfig,
} from './skills.js';

// Logging
export { createConsoleLogger, nullLogger, isLogLevel } from './logger.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './logger.js';

// Configuration
export type { SkillrootConfig, LoggingConfig } from './config.js';

// Configuration validator
export {
  validateConfig,
  validateConfigObject,
  loadConfig,
  loadConfigOrThrow,
  InvalidConfigError,
} from './config-validator.js';
export type {
  ConfigValidationError,
  ConfigValidationResult,
} from './config-validator.js';

// Environment overlay
export { applyEnvOverrides } from './config-env-overlay.js';

// Utilities
export { isRecord, isStringArray } from './utils.js';
