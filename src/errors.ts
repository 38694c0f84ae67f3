/**
 * skillport error type hierarchy.
 * All custom errors extend SkillportError so the CLI can print them uniformly.
 */

/** Base error for all skillport errors */
export class SkillportError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly userFacing: boolean = false,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'SkillportError';
  }
}

/** Thrown when a module is in neither the store nor any enabled marketplace */
export class ModuleNotFoundError extends SkillportError {
  constructor(public readonly moduleName: string) {
    super(`Module "${moduleName}" not found in the module store or any enabled marketplace`, 'MODULE_NOT_FOUND', true, false);
    this.name = 'ModuleNotFoundError';
  }
}

/** A marketplace entry that could satisfy a module name. */
export interface ModuleCandidateSummary {
  name: string;
  version: string;
  marketplace: string;
}

/** Thrown when several marketplaces offer the same module name and no choice was made */
export class AmbiguousModuleError extends SkillportError {
  constructor(
    public readonly moduleName: string,
    public readonly candidates: readonly ModuleCandidateSummary[],
  ) {
    const sources = candidates
      .map((candidate) => `${candidate.marketplace} (v${candidate.version})`)
      .join(', ');
    super(
      `Module "${moduleName}" is offered by several marketplaces: ${sources}. Choose one with --market <name>.`,
      'AMBIGUOUS_MODULE',
      true,
      false,
    );
    this.name = 'AmbiguousModuleError';
  }
}

/** Thrown when a manifest, skill, request, or managed file is malformed */
export class ValidationError extends SkillportError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', true, false);
    this.name = 'ValidationError';
  }
}

/** Thrown when an adapter cannot translate a skill's frontmatter */
export class ConversionError extends SkillportError {
  constructor(
    message: string,
    public readonly skillKey: string,
  ) {
    super(`Cannot convert ${skillKey}: ${message}`, 'CONVERSION_ERROR', true, false);
    this.name = 'ConversionError';
  }
}

/** Thrown when writing or deleting an artifact fails */
export class ArtifactIOError extends SkillportError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message, 'IO_ERROR', true, false);
    this.name = 'ArtifactIOError';
  }
}

/** Thrown when a source fetch or catalog download fails */
export class FetchError extends SkillportError {
  constructor(message: string) {
    super(message, 'FETCH_ERROR', true, true);
    this.name = 'FetchError';
  }
}

/** Thrown when a bounded network step runs out of time */
export class TimeoutError extends SkillportError {
  constructor(
    operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', true, true);
    this.name = 'TimeoutError';
  }
}

/** Thrown when a persisted document (registry, store metadata) cannot be read or written */
export class PersistenceError extends SkillportError {
  constructor(message: string) {
    super(message, 'PERSISTENCE_ERROR', false, true);
    this.name = 'PersistenceError';
  }
}

/** Thrown when artifacts were written but the registry could not record them */
export class RegistryWriteError extends SkillportError {
  constructor(
    moduleName: string,
    assistant: string,
    cause: string,
  ) {
    super(
      `Artifacts for "${moduleName}" were written to ${assistant} and left in place, but the installation registry could not be updated (${cause}). Re-run the install to record them.`,
      'REGISTRY_WRITE_FAILED',
      true,
      true,
    );
    this.name = 'RegistryWriteError';
  }
}

/** Thrown when config validation fails */
export class ConfigError extends SkillportError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', true, false);
    this.name = 'ConfigError';
  }
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
