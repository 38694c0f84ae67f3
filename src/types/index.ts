/**
 * Shared type definitions for skillport.
 * Validation happens where data enters (store, registry, config); these
 * shapes are trusted everywhere downstream.
 */

// === Assistants ===

/** Every assistant skillport can install into. */
export const ASSISTANT_IDS = ['claude-code', 'cursor', 'gemini-cli'] as const;

/** Identifier of a supported assistant. */
export type AssistantId = (typeof ASSISTANT_IDS)[number];

/** Where an installation applies. */
export type Scope = 'user' | 'project';

/**
 * How an assistant stores skills on disk.
 * - isolated: one directory per skill, copied as-is
 * - converted: one file per skill with translated frontmatter
 * - managed-section: one shared file, one marker-delimited block per skill
 */
export type LayoutKind = 'isolated' | 'converted' | 'managed-section';

/** Static description of an assistant's layout and supported scopes. */
export interface AssistantCapability {
  id: AssistantId;
  displayName: string;
  layout: LayoutKind;
  scopes: readonly Scope[];
}

// === Modules and skills ===

/** Kind of location a module can be fetched from. */
export type SourceKind = 'git' | 'tar' | 'folder';

/** Where a module came from, kept so it can be re-fetched on update. */
export interface ModuleOrigin {
  kind: SourceKind;
  locator: string;
  /** Subdirectory inside the fetched tree that holds the module. */
  subpath?: string;
  /** Marketplace the module was resolved through, if any. */
  marketplace?: string;
}

/** A module registered in the module store. */
export interface Module {
  name: string;
  version: string;
  description?: string;
  /** Skill directory names, in manifest order. */
  skills: string[];
  /** Command names, each backed by `commands/<name>.md`. */
  commands: string[];
  origin: ModuleOrigin;
  /** Absolute path of the module inside the store. */
  directory: string;
}

/** An auxiliary file shipped next to a skill's SKILL.md. */
export interface SkillResource {
  /** Path relative to the skill directory, using forward slashes. */
  relativePath: string;
  content: Buffer;
}

/** A skill loaded from the store, immutable for one installer invocation. */
export interface Skill {
  readonly name: string;
  readonly description: string;
  /** Markdown after the frontmatter. */
  readonly body: string;
  /** SKILL.md exactly as fetched. */
  readonly raw: string;
  /** Frontmatter fields other than name and description. */
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly resources: readonly SkillResource[];
}

/** A slash command loaded from `commands/<name>.md`. */
export interface ModuleCommand {
  readonly name: string;
  /** Frontmatter description, empty when absent. */
  readonly description: string;
  /** Markdown after the frontmatter. */
  readonly body: string;
  /** The command file exactly as fetched. */
  readonly raw: string;
  /** Frontmatter fields other than description. */
  readonly metadata: Readonly<Record<string, unknown>>;
}

// === Installations ===

/** One artifact produced for a skill. */
export interface SkillArtifact {
  skill: string;
  path: string;
  /** Managed-section key when the artifact is a block inside a shared file. */
  section?: string;
}

/** One command file. Commands never live in a managed section. */
export interface CommandArtifact {
  command: string;
  path: string;
}

export type ArtifactRecord = SkillArtifact | CommandArtifact;

/** Identity of an installation. */
export interface InstallationKey {
  module: string;
  assistant: AssistantId;
  scope: Scope;
  /** Absolute project path for project scope, null for user scope. */
  projectPath: string | null;
}

/** A successful install of one module into one assistant. */
export interface Installation extends InstallationKey {
  /** Module version at install time. */
  version: string;
  skills: string[];
  commands: string[];
  artifacts: ArtifactRecord[];
  /**
   * Directories the installation created, outermost first. Only these are
   * removed again when they become empty.
   */
  createdDirs: string[];
  installedAt: string;
}
