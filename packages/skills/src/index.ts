// Error classes
export {
  SkillLoadError,
  SkillsRootNotFoundError,
  FlowParseError,
} from './errors.js';

// Internal types
export type {
  DiscoveryOptions,
  DiscoveryReport,
  RootScan,
  SkillLoadFailure,
  SkillCatalogOptions,
  ConfiguredCatalogOptions,
} from './types.js';

// Metadata parser
export { parseSkillMarkdown, extractFrontmatter } from './skill-parser.js';
export type { ParsedSkillMarkdown } from './skill-parser.js';

// Flow block parser
export {
  parseFlowBlock,
  parseMermaidFlowchart,
  findFencedBlock,
  FLOW_BLOCK_LANGUAGE,
} from './flow-parser.js';
export type { FlowBlockResult } from './flow-parser.js';

// Skill loader
export {
  loadSkill,
  buildSkill,
  SKILL_FILENAME,
  DEFAULT_DESCRIPTION,
} from './skill-loader.js';
export type { SkillLoaderOptions } from './skill-loader.js';

// Home directory
export { createEnvHomeDirProvider, staticHomeDirProvider } from './home-dir.js';
export type { HomeDirProvider } from './home-dir.js';

// Root resolution
export {
  resolveSkillsRoots,
  findUserSkillsDir,
  getUserSkillsCandidates,
  getBuiltinSkillsDir,
  getProjectSkillsDir,
} from './skill-roots.js';
export type { ResolveSkillsRootsOptions } from './skill-roots.js';

// Skill discovery
export {
  discoverSkills,
  discoverSkillsFromRoots,
  scanSkillRoot,
  scanSkillRoots,
  mergeSkillSources,
} from './skill-discovery.js';

// Catalog helpers
export {
  loadSkillCatalog,
  loadSkillCatalogFromConfig,
  filterSkillsByConfig,
  indexSkillsByName,
  findSkill,
  normalizeSkillName,
  formatSkillsSummary,
} from './skill-catalog.js';
