/**
 * Command adapters: one file per module command, in each assistant's
 * command directory.
 *
 * | assistant   | file                                   | content                         |
 * |-------------|----------------------------------------|---------------------------------|
 * | claude-code | .claude/commands/<module>-<cmd>.md     | the command file as fetched     |
 * | cursor      | .cursor/commands/<module>-<cmd>.md     | body only, frontmatter dropped  |
 * | gemini-cli  | .gemini/commands/<module>-<cmd>.toml   | description and prompt as TOML  |
 */

import { join } from 'node:path';
import { stringify } from 'smol-toml';
import type { AssistantId, ModuleCommand } from '../types/index.js';
import { commandLocation } from './capabilities.js';
import type { AdapterContext, FileOperation } from './types.js';

/** Placeholder Claude Code and Cursor substitute with the command's arguments. */
const ARGUMENTS_PLACEHOLDER = /\$ARGUMENTS/g;

/** Gemini CLI's equivalent placeholder. */
const GEMINI_ARGUMENTS = '{{args}}';

/** The `module-command` stem every command file is named by. */
export function commandKey(moduleName: string, commandName: string): string {
  return `${moduleName}-${commandName}`;
}

/** File name of a command for an assistant. */
export function commandFileName(assistant: AssistantId, moduleName: string, commandName: string): string {
  const extension = assistant === 'gemini-cli' ? 'toml' : 'md';
  return `${commandKey(moduleName, commandName)}.${extension}`;
}

function trimBody(body: string): string {
  return body.replace(/^\n+/, '').replace(/\s+$/, '');
}

/** Render a Gemini CLI custom command. */
export function renderGeminiCommand(command: ModuleCommand): string {
  const prompt = trimBody(command.body).replace(ARGUMENTS_PLACEHOLDER, GEMINI_ARGUMENTS);
  return stringify(command.description.length > 0 ? { description: command.description, prompt } : { prompt });
}

function renderCommand(command: ModuleCommand, assistant: AssistantId): string {
  switch (assistant) {
    case 'claude-code':
      return command.raw;
    case 'cursor':
      return `${trimBody(command.body)}\n`;
    case 'gemini-cli':
      return renderGeminiCommand(command);
  }
}

/** The file a command produces for the context's assistant and scope. */
export function adaptCommand(command: ModuleCommand, context: AdapterContext): FileOperation {
  return {
    kind: 'file',
    command: command.name,
    path: join(commandLocation(context), commandFileName(context.assistant, context.module, command.name)),
    content: renderCommand(command, context.assistant),
  };
}
