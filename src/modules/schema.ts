/**
 * Zod schemas for module.yml manifests and the store's origin sidecar.
 */

import { z } from 'zod';

/**
 * Module, skill and command names become path segments and the `module.skill`
 * key of every artifact, so dots and separators are not allowed.
 */
export const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

const nameSchema = z.string().regex(NAME_PATTERN, 'must contain only letters, digits, "-" and "_"');

export const ModuleManifestSchema = z.object({
  name: nameSchema,
  version: z.string().min(1, 'Version is required').default('0.0.0'),
  description: z.string().optional(),
  skills: z.array(nameSchema).default([]),
  commands: z.array(nameSchema).default([]),
}).refine(
  (manifest) => manifest.skills.length + manifest.commands.length > 0,
  { message: 'At least one skill or command is required', path: ['skills'] },
).refine(
  (manifest) => new Set(manifest.skills).size === manifest.skills.length,
  { message: 'Skill names must be unique', path: ['skills'] },
).refine(
  (manifest) => new Set(manifest.commands).size === manifest.commands.length,
  { message: 'Command names must be unique', path: ['commands'] },
);

export type ModuleManifest = z.infer<typeof ModuleManifestSchema>;

export const ModuleOriginSchema = z.object({
  kind: z.enum(['git', 'tar', 'folder']),
  locator: z.string().min(1),
  subpath: z.string().optional(),
  marketplace: z.string().optional(),
});

/** Format zod issues as "path: message" strings. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Check a single name against {@link NAME_PATTERN}. */
export function isValidName(name: string): boolean {
  return NAME_PATTERN.test(name);
}
