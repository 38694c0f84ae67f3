/**
 * skillport library entry point.
 */

export * from './errors.js';
export {
  ASSISTANT_IDS,
  type AssistantId,
  type AssistantCapability,
  type ArtifactRecord,
  type CommandArtifact,
  type Installation,
  type InstallationKey,
  type LayoutKind,
  type Module,
  type ModuleCommand,
  type ModuleOrigin,
  type Scope,
  type Skill,
  type SkillArtifact,
  type SkillResource,
  type SourceKind,
} from './types/index.js';
export { ConfigSchema, loadConfig, homeDir, resolvePaths, type Config, type SkillportPaths } from './config/index.js';
export { ModuleStore, MODULE_MANIFEST, ORIGIN_FILE } from './modules/store.js';
export { loadSkill, parseSkillMarkdown, SKILL_FILE } from './modules/skill-loader.js';
export { loadCommand, COMMANDS_DIR } from './modules/command-loader.js';
export * from './adapters/index.js';
export * from './registry/index.js';
export * from './market/index.js';
export * from './fetch/index.js';
export * from './resolver/index.js';
export * from './installer/index.js';
export { createAppContext, type AppContext, type AppContextOptions } from './cli/context.js';
