import type { z } from 'zod';
import type {
  ActionSchema,
  ExpandActionSchema,
  CopyActionSchema,
  FetchActionSchema,
  RunActionSchema,
  VariantSchema,
  DescriptorSchema,
  CatalogFileSchema,
} from '../config/schema.js';

export type Action = z.infer<typeof ActionSchema>;
export type ExpandAction = z.infer<typeof ExpandActionSchema>;
export type CopyAction = z.infer<typeof CopyActionSchema>;
export type FetchAction = z.infer<typeof FetchActionSchema>;
export type RunAction = z.infer<typeof RunActionSchema>;
export type Variant = z.infer<typeof VariantSchema>;
export type PackageDescriptor = z.infer<typeof DescriptorSchema>;
export type CatalogFile = z.infer<typeof CatalogFileSchema>;

export type CatalogEntry =
  | { kind: 'detailed'; name: string; descriptor: PackageDescriptor }
  | { kind: 'legacy'; name: string };

export type DetailedEntry = Extract<CatalogEntry, { kind: 'detailed' }>;

export interface Catalog {
  path: string;
  entries: ReadonlyMap<string, CatalogEntry>;
}
