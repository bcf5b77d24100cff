// ============================================================================
// @mxqlint/catalog - Metadata Schemas
// ============================================================================
//
// Shape of `*.meta` category files and of the generated `category-index.json`.
// Unknown properties are kept: meta files carry more than the checker reads.
// ============================================================================

import { z } from 'zod';

const describedSchema = {
  unit: z.string().default(''),
  type: z.string().default(''),
  description: z.string().default(''),
};

export const tagMetaSchema = z.object({ tagName: z.string().min(1), ...describedSchema }).passthrough();

export const fieldMetaSchema = z.object({ fieldName: z.string().min(1), ...describedSchema }).passthrough();

export const categoryMetaSchema = z
  .object({
    categoryName: z.string().min(1),
    title: z.string().default(''),
    interval: z.union([z.string(), z.number()]).default(''),
    pk: z.array(z.string()).default([]),
    platforms: z.array(z.string()).default([]),
    tags: z.array(tagMetaSchema).default([]),
    fields: z.array(fieldMetaSchema).default([]),
  })
  .passthrough();

export type CategoryMeta = z.infer<typeof categoryMetaSchema>;

export const categoryIndexEntrySchema = z.object({
  title: z.string(),
  interval: z.union([z.string(), z.number()]),
  pk: z.array(z.string()),
  platforms: z.array(z.string()),
  /** Language code → meta file name. */
  languages: z.record(z.string()),
  tags: z.array(z.string()),
  fields: z.array(z.string()),
});

export type CategoryIndexEntry = z.infer<typeof categoryIndexEntrySchema>;

export const categoryIndexSchema = z.object({
  categories: z.record(categoryIndexEntrySchema),
  products: z.record(z.array(z.string())),
  keywords: z.record(z.array(z.string())),
});

export type CategoryIndex = z.infer<typeof categoryIndexSchema>;
