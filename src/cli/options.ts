/**
 * Parsing of command-line option values into typed requests.
 */

import type { AssistantId, Scope } from '../types/index.js';
import { ASSISTANT_IDS } from '../types/index.js';
import { ValidationError } from '../errors.js';
import { isAssistantId } from '../adapters/capabilities.js';

/** Parse a comma-separated assistant list, e.g. "claude-code,cursor". */
export function parseAssistants(value: string): AssistantId[] {
  const ids = value.split(',').map((part) => part.trim()).filter((part) => part.length > 0);
  if (ids.length === 0) {
    throw new ValidationError('At least one assistant is required');
  }
  return ids.map((id) => {
    if (!isAssistantId(id)) {
      throw new ValidationError(`Unknown assistant "${id}". Supported: ${ASSISTANT_IDS.join(', ')}`);
    }
    return id;
  });
}

/** Parse a single assistant id. */
export function parseAssistant(value: string): AssistantId {
  const [id, ...rest] = parseAssistants(value);
  if (rest.length > 0) {
    throw new ValidationError('Only one assistant may be given here');
  }
  return id;
}

export function parseScope(value: string): Scope {
  if (value === 'user' || value === 'project') {
    return value;
  }
  throw new ValidationError(`Unknown scope "${value}". Use "user" or "project".`);
}

export interface InstallTarget {
  scope: Scope;
  projectPath: string | null;
}

/**
 * Work out scope and project path for install. A project argument implies
 * project scope; project scope without one means the current directory.
 */
export function resolveInstallTarget(
  project: string | undefined,
  scope: Scope | undefined,
  defaultScope: Scope,
  cwd: string = process.cwd(),
): InstallTarget {
  const effective = scope ?? (project !== undefined ? 'project' : defaultScope);
  if (effective === 'user') {
    return { scope: 'user', projectPath: project ?? null };
  }
  return { scope: 'project', projectPath: project ?? cwd };
}
