/**
 * Environ Digest — Render Context
 *
 * Final hand-off to the template renderer: per-category lists plus a
 * merged cross-category digest. Text is plain (tags stripped) but not
 * escaped; escaping belongs to the renderer.
 */

import type { CategoryKey, Item, SiteConfig } from '../types';
import { bound } from '../feeds/ranker';

// ============================================================
// TYPES
// ============================================================

export interface RenderItem {
  title: string;
  link: string;
  source: string;
  summary: string;
  category: CategoryKey;
  /** ISO-8601, UTC */
  publishedAt: string;
  /** e.g. "2024-01-01 12:00 UTC" */
  publishedLabel: string;
}

export interface NavEntry {
  key: CategoryKey;
  label: string;
  href: string;
}

export interface RenderContext {
  site: {
    name: string;
    nav: NavEntry[];
  };
  updatedAt: string;
  generatedAt: string;
  categories: Record<CategoryKey, RenderItem[]>;
  all: RenderItem[];
}

export interface BuildContextOptions {
  generatedAt?: Date;
}

// ============================================================
// FORMATTING
// ============================================================

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `YYYY-MM-DD HH:mm UTC`
 */
export function formatUtcLabel(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`
  );
}

export function toRenderItem(item: Item): RenderItem {
  return {
    title: item.title,
    link: item.link,
    source: item.source,
    summary: item.summary,
    category: item.category,
    publishedAt: item.publishedAt.toISOString(),
    publishedLabel: formatUtcLabel(item.publishedAt),
  };
}

// ============================================================
// BUILDER
// ============================================================

export function buildNav(site: SiteConfig): NavEntry[] {
  return site.categories.map(({ key, label }) => ({ key, label, href: `${key}.html` }));
}

/**
 * Assemble the renderer's context. Category lists are expected to be
 * bounded already and are not modified; the global list is a fresh merge
 * re-ranked and cut to `site.globalCap`.
 */
export function buildContext(
  categoryItems: ReadonlyMap<CategoryKey, readonly Item[]>,
  site: SiteConfig,
  options: BuildContextOptions = {}
): RenderContext {
  const generatedAt = options.generatedAt ?? new Date();
  const merged: Item[] = [];

  // Own data properties for every key, "__proto__" included
  const categories: Record<CategoryKey, RenderItem[]> = Object.fromEntries(
    site.categories.map(({ key }): [CategoryKey, RenderItem[]] => {
      const items = categoryItems.get(key) ?? [];
      merged.push(...items);
      return [key, items.map(toRenderItem)];
    })
  );

  return {
    site: {
      name: site.siteName,
      nav: buildNav(site),
    },
    updatedAt: formatUtcLabel(generatedAt),
    generatedAt: generatedAt.toISOString(),
    categories,
    all: bound(merged, site.globalCap).map(toRenderItem),
  };
}
