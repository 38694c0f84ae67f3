/**
 * Static capability descriptors for every supported assistant.
 */

import { join } from 'node:path';
import type { AssistantCapability, AssistantId, Scope } from '../types/index.js';
import { ASSISTANT_IDS } from '../types/index.js';
import { ValidationError } from '../errors.js';
import type { AdapterContext } from './types.js';

export const ASSISTANTS: Readonly<Record<AssistantId, AssistantCapability>> = {
  'claude-code': {
    id: 'claude-code',
    displayName: 'Claude Code',
    layout: 'isolated',
    scopes: ['user', 'project'],
  },
  // Cursor reads rules only from a project's .cursor/rules directory.
  // Commands are not scope-limited for any assistant.
  cursor: {
    id: 'cursor',
    displayName: 'Cursor',
    layout: 'converted',
    scopes: ['project'],
  },
  // Gemini CLI only reads skill content from inside the workspace.
  'gemini-cli': {
    id: 'gemini-cli',
    displayName: 'Gemini CLI',
    layout: 'managed-section',
    scopes: ['project'],
  },
};

/** Narrow an arbitrary string to a supported assistant id. */
export function isAssistantId(value: string): value is AssistantId {
  return (ASSISTANT_IDS as readonly string[]).includes(value);
}

/** Whether an assistant supports installing skills at the given scope. */
export function supportsScope(assistant: AssistantId, scope: Scope): boolean {
  return ASSISTANTS[assistant].scopes.includes(scope);
}

/**
 * Base directory for an installation: the project path for project scope,
 * the user's home for user scope.
 * @throws {ValidationError} If a project path is missing.
 */
export function installRoot(context: AdapterContext): string {
  if (context.scope === 'project') {
    if (!context.projectPath) {
      throw new ValidationError('Project path required for project scope');
    }
    return context.projectPath;
  }
  return context.userHome;
}

/** Path segments below the install root where each assistant keeps its skills. */
export const SKILL_LOCATIONS: Readonly<Record<AssistantId, readonly string[]>> = {
  'claude-code': ['.claude', 'skills'],
  cursor: ['.cursor', 'rules'],
  'gemini-cli': [],
};

/**
 * Directory (or, for shared-file layouts, the directory of the file) holding skills.
 * @throws {ValidationError} If the assistant does not take skills at this scope.
 */
export function skillLocation(context: AdapterContext): string {
  if (!supportsScope(context.assistant, context.scope)) {
    throw new ValidationError(`${ASSISTANTS[context.assistant].displayName} does not support ${context.scope} scope`);
  }
  return join(installRoot(context), ...SKILL_LOCATIONS[context.assistant]);
}

/** Path segments below the install root where each assistant looks for slash commands. */
export const COMMAND_LOCATIONS: Readonly<Record<AssistantId, readonly string[]>> = {
  'claude-code': ['.claude', 'commands'],
  cursor: ['.cursor', 'commands'],
  'gemini-cli': ['.gemini', 'commands'],
};

/** Directory holding an assistant's command files, at any scope. */
export function commandLocation(context: AdapterContext): string {
  return join(installRoot(context), ...COMMAND_LOCATIONS[context.assistant]);
}
