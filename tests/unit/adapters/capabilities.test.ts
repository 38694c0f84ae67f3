import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import {
  ASSISTANTS,
  claudeCodeAdapter,
  commandLocation,
  cursorAdapter,
  geminiCliAdapter,
  getAdapter,
  skillLocation,
} from '../../../src/adapters/index.js';
import type { AdapterContext } from '../../../src/adapters/types.js';
import { ValidationError } from '../../../src/errors.js';

const userContext: AdapterContext = {
  assistant: 'cursor',
  scope: 'user',
  projectPath: null,
  module: 'git-tools',
  userHome: '/home/tester',
};

describe('assistant capabilities', () => {
  it('picks the skill adapter from the assistant layout', () => {
    expect(getAdapter('claude-code')).toBe(claudeCodeAdapter);
    expect(getAdapter('cursor')).toBe(cursorAdapter);
    expect(getAdapter('gemini-cli')).toBe(geminiCliAdapter);
    expect(ASSISTANTS.cursor.layout).toBe('converted');
  });

  it('limits skills to supported scopes but not commands', () => {
    expect(() => skillLocation(userContext)).toThrow(new ValidationError('Cursor does not support user scope'));
    expect(commandLocation(userContext)).toBe(join('/home/tester', '.cursor', 'commands'));
  });
});
