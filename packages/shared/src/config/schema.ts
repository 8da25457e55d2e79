import { z } from 'zod';

/**
 * A required plugin, either as a `name:version` string or spelled out.
 */
export const DependencyEntrySchema = z.union([
  z.string().min(1),
  z
    .object({
      name: z.string(),
      version: z.string(),
      downloadURL: z.string().optional(),
    })
    .strict(),
]);

export const RootEntrySchema = z
  .object({
    plugin: z.string().min(1),
    downloadURL: z.string().optional(),
    requires: z.array(DependencyEntrySchema).default([]),
  })
  .strict();

/**
 * One dependency manifest file. Each file becomes one mapping of
 * root plugin to required plugins.
 */
export const DependencyManifestSchema = z
  .object({
    roots: z.array(RootEntrySchema).default([]),
  })
  .strict();

export type DependencyEntry = z.infer<typeof DependencyEntrySchema>;
export type RootEntry = z.infer<typeof RootEntrySchema>;
export type DependencyManifest = z.infer<typeof DependencyManifestSchema>;
