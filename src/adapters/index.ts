/**
 * Adapter dispatch over the closed set of assistants.
 */

import type { AssistantId } from '../types/index.js';
import type { FormatAdapter } from './types.js';
import { ASSISTANTS } from './capabilities.js';
import { claudeCodeAdapter } from './claude-code.js';
import { cursorAdapter } from './cursor.js';
import { geminiCliAdapter } from './gemini-cli.js';

/** The skill adapter for an assistant, chosen by its layout. */
export function getAdapter(assistant: AssistantId): FormatAdapter {
  switch (ASSISTANTS[assistant].layout) {
    case 'isolated':
      return claudeCodeAdapter;
    case 'converted':
      return cursorAdapter;
    case 'managed-section':
      return geminiCliAdapter;
  }
}

export { ASSISTANTS, isAssistantId, supportsScope, installRoot, skillLocation, commandLocation } from './capabilities.js';
export { adaptCommand, commandFileName, commandKey } from './commands.js';
export { ArtifactTransaction, artifactSection, removeArtifact, pruneEmptyParents } from './artifact-writer.js';
export { artifactKey } from './types.js';
export type {
  AdapterContext,
  ArtifactOperation,
  FormatAdapter,
} from './types.js';
export {
  MANAGED_PREAMBLE,
  containsMarkerLine,
  upsertSection,
  removeSection,
  scanSections,
  listSectionKeys,
} from './managed-section.js';
export { claudeCodeAdapter, cursorAdapter, geminiCliAdapter };
