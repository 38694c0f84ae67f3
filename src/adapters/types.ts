/**
 * Contracts shared by all format adapters.
 *
 * Adapters are pure: they describe what should exist on disk and leave the
 * writing to the artifact writer, which can roll a whole assistant back.
 */

import type { AssistantId, Scope, Skill } from '../types/index.js';

/** Everything an adapter needs to know about where it is installing. */
export interface AdapterContext {
  assistant: AssistantId;
  scope: Scope;
  /** Absolute project path; required for project scope. */
  projectPath: string | null;
  module: string;
  /** Home directory used for user-scope paths. */
  userHome: string;
}

/** A file inside a directory artifact. */
export interface ArtifactFile {
  relativePath: string;
  content: string | Buffer;
}

/** Replace a whole directory with the given files. */
export interface DirectoryOperation {
  kind: 'directory';
  skill: string;
  path: string;
  files: ArtifactFile[];
}

/** Which skill or command an artifact belongs to. */
export type ArtifactOwner = { skill: string } | { command: string };

/** Replace a single file. */
export type FileOperation = {
  kind: 'file';
  path: string;
  content: string;
} & ArtifactOwner;

/** Upsert one marker-delimited block inside a shared file. */
export interface SectionOperation {
  kind: 'section';
  skill: string;
  path: string;
  key: string;
  content: string;
}

export type ArtifactOperation = DirectoryOperation | FileOperation | SectionOperation;

/**
 * One adapter per layout kind. Undoing an install needs no adapter: the
 * registry records every artifact path and section key.
 */
export interface FormatAdapter {
  /** Artifacts a skill produces for this assistant. */
  adapt(skill: Skill, context: AdapterContext): ArtifactOperation[];
}

/** The `module.skill` key that names every skill artifact. */
export function artifactKey(moduleName: string, skillName: string): string {
  return `${moduleName}.${skillName}`;
}
