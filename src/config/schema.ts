import { z } from 'zod';

// ── Install actions ─────────────────────────────────────────────────

export const ExpandActionSchema = z.object({
  action: z.literal('expand'),
  dir: z.string().optional(),
  strip: z.number().int().nonnegative().optional(),
});

export const CopyActionSchema = z.object({
  action: z.literal('copy'),
  to: z.string().optional(),
  name: z.string().optional(),
  mode: z.string().regex(/^[0-7]{3,4}$/, 'Octal file mode, e.g. 755').optional(),
});

export const FetchActionSchema = z.object({
  action: z.literal('fetch'),
  url: z.string().min(1),
});

export const RunActionSchema = z.object({
  action: z.literal('run'),
  command: z.tuple([z.string().min(1)]).rest(z.string()),
  cwd: z.string().optional(),
  env: z.record(z.string(), z.string()).optional(),
});

export const ActionSchema = z.discriminatedUnion('action', [
  ExpandActionSchema,
  CopyActionSchema,
  FetchActionSchema,
  RunActionSchema,
]);

// ── Descriptors ─────────────────────────────────────────────────────

export const VariantSchema = z.object({
  platforms: z.array(z.string().min(1)).min(1),
  url: z.string().min(1),
  base_url: z.string().optional(),
  arch_names: z.record(z.string(), z.string()).optional(),
  supports_x32: z.boolean().optional(),
  actions: z.array(ActionSchema).optional(),
});

export const DescriptorSchema = z.object({
  description: z.string().optional(),
  variants: z.array(VariantSchema).min(1),
});

// ── Catalog file ────────────────────────────────────────────────────

export const CatalogFileSchema = z.object({
  packages: z.record(z.string(), DescriptorSchema),
  'classic-cbdeps': z.object({
    packages: z.array(z.string()),
  }),
});
