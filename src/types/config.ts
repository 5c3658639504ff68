/**
 * Environ Digest — Configuration Schemas
 *
 * Feeds and site documents are validated once at startup and then
 * passed explicitly through the pipeline.
 */

import { z } from 'zod';
import type { CategoryKey, FeedSource } from './feed-item';

// ============================================================
// FEEDS DOCUMENT
// ============================================================

export const FeedSourceEntrySchema = z.union([
  z.string().trim().url(),
  z.object({
    url: z.string().trim().url(),
    title: z.string().trim().min(1).optional(),
  }),
]);
export type FeedSourceEntry = z.infer<typeof FeedSourceEntrySchema>;

/**
 * `{ "<category>": [url | { url, title }] }`. A null list means no sources.
 */
export const FeedsDocumentSchema = z.record(
  z.string().min(1),
  z.array(FeedSourceEntrySchema).nullable()
);
export type FeedsDocument = z.infer<typeof FeedsDocumentSchema>;

// ============================================================
// SITE DOCUMENT
// ============================================================

export const CategoryDefinitionSchema = z.object({
  key: z
    .string()
    .regex(/^[a-z0-9_]+$/, 'category keys are lowercase snake_case')
    .refine(key => key !== '__proto__', 'category key "__proto__" is reserved'),
  label: z.string().min(1),
});
export type CategoryDefinition = z.infer<typeof CategoryDefinitionSchema>;

export const DEFAULT_CATEGORIES: CategoryDefinition[] = [
  { key: 'environment', label: 'محیط‌زیست' },
  { key: 'water', label: 'آب' },
  { key: 'wastewater', label: 'فاضلاب' },
  { key: 'oil_gas_petrochem', label: 'نفت/گاز/پتروشیمی' },
  { key: 'tenders', label: 'مناقصه‌ها' },
];

export const SiteDocumentSchema = z
  .object({
    siteName: z.string().min(1).default('Environ News+'),
    categories: z
      .array(CategoryDefinitionSchema)
      .min(1)
      .default(DEFAULT_CATEGORIES),
    perCategoryCap: z.number().int().positive().default(60),
    globalCap: z.number().int().positive().default(250),
  })
  .superRefine((site, ctx) => {
    const seen = new Set<string>();
    site.categories.forEach((category, index) => {
      if (seen.has(category.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['categories', index, 'key'],
          message: `duplicate category key "${category.key}"`,
        });
      }
      seen.add(category.key);
    });
  });
export type SiteConfig = z.infer<typeof SiteDocumentSchema>;

// ============================================================
// RUN CONFIGURATION
// ============================================================

export interface FetchSettings {
  timeoutMs: number;
  concurrency: number;
  userAgent: string;
}

/**
 * Everything one run needs, loaded before any fetching starts.
 */
export interface DigestConfig {
  site: SiteConfig;
  /** Sources per category, in navigation order; every category has an entry */
  sources: Map<CategoryKey, FeedSource[]>;
  fetch: FetchSettings;
}
