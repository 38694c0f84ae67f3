/**
 * Zod schema for the persisted installation registry document.
 */

import { z } from 'zod';
import { ASSISTANT_IDS } from '../types/index.js';

const SkillArtifactSchema = z.object({
  skill: z.string().min(1),
  path: z.string().min(1),
  section: z.string().min(1).optional(),
});

const CommandArtifactSchema = z.object({
  command: z.string().min(1),
  path: z.string().min(1),
});

export const ArtifactRecordSchema = z.union([SkillArtifactSchema, CommandArtifactSchema]);

export const InstallationSchema = z.object({
  module: z.string().min(1),
  assistant: z.enum(ASSISTANT_IDS),
  scope: z.enum(['user', 'project']),
  projectPath: z.string().min(1).nullable(),
  version: z.string(),
  skills: z.array(z.string()),
  commands: z.array(z.string()).default([]),
  artifacts: z.array(ArtifactRecordSchema),
  createdDirs: z.array(z.string().min(1)).default([]),
  installedAt: z.string(),
}).refine(
  (installation) => (installation.scope === 'project') === (installation.projectPath !== null),
  { message: 'projectPath must be set for project scope and null for user scope', path: ['projectPath'] },
);

export const RegistryDocumentSchema = z.object({
  version: z.literal(1),
  installations: z.array(InstallationSchema),
});

export type RegistryDocument = z.infer<typeof RegistryDocumentSchema>;
