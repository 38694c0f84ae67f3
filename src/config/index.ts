export { ConfigSchema, type Config } from './schema.js';
export { loadConfig } from './loader.js';
export { homeDir, resolvePaths, type SkillportPaths } from './paths.js';
