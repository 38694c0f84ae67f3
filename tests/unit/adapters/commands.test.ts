import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { adaptCommand, commandFileName, renderGeminiCommand } from '../../../src/adapters/commands.js';
import type { AdapterContext } from '../../../src/adapters/types.js';
import { makeCommand } from '../../mocks/modules.js';

const context: AdapterContext = {
  assistant: 'claude-code',
  scope: 'project',
  projectPath: '/repo',
  module: 'git-tools',
  userHome: '/home/tester',
};

const commit = makeCommand({
  name: 'commit',
  description: 'Commit staged changes',
  body: '\nCommit with message: $ARGUMENTS\n\n',
  raw: '---\ndescription: Commit staged changes\n---\n\nCommit with message: $ARGUMENTS\n\n',
});

describe('command adapters', () => {
  it('names files after the module and command', () => {
    expect(commandFileName('claude-code', 'git-tools', 'commit')).toBe('git-tools-commit.md');
    expect(commandFileName('cursor', 'git-tools', 'commit')).toBe('git-tools-commit.md');
    expect(commandFileName('gemini-cli', 'git-tools', 'commit')).toBe('git-tools-commit.toml');
  });

  it('copies the command file verbatim for Claude Code', () => {
    expect(adaptCommand(commit, context)).toEqual({
      kind: 'file',
      command: 'commit',
      path: join('/repo', '.claude', 'commands', 'git-tools-commit.md'),
      content: commit.raw,
    });
  });

  it('drops frontmatter for Cursor', () => {
    const operation = adaptCommand(commit, { ...context, assistant: 'cursor' });
    expect(operation.path).toBe(join('/repo', '.cursor', 'commands', 'git-tools-commit.md'));
    expect(operation.content).toBe('Commit with message: $ARGUMENTS\n');
  });

  it('renders a TOML command with the Gemini argument placeholder', () => {
    const operation = adaptCommand(commit, { ...context, assistant: 'gemini-cli' });
    expect(operation.path).toBe(join('/repo', '.gemini', 'commands', 'git-tools-commit.toml'));
    expect(parseToml(operation.content)).toEqual({
      description: 'Commit staged changes',
      prompt: 'Commit with message: {{args}}',
    });
  });

  it('leaves out an empty description and keeps multi-line prompts', () => {
    const command = makeCommand({ name: 'review', body: 'Review the diff.\n\nThen summarize $ARGUMENTS and $ARGUMENTS.\n' });
    expect(parseToml(renderGeminiCommand(command))).toEqual({
      prompt: 'Review the diff.\n\nThen summarize {{args}} and {{args}}.',
    });
  });

  it('installs commands at user scope for every assistant', () => {
    const userContext = { ...context, scope: 'user' as const, projectPath: null };
    expect(adaptCommand(commit, { ...userContext, assistant: 'cursor' }).path)
      .toBe(join('/home/tester', '.cursor', 'commands', 'git-tools-commit.md'));
    expect(adaptCommand(commit, { ...userContext, assistant: 'gemini-cli' }).path)
      .toBe(join('/home/tester', '.gemini', 'commands', 'git-tools-commit.toml'));
  });
});
