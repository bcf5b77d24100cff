// ============================================================================
// @mxqlint/catalog - Category Catalog
// ============================================================================
//
// File-backed category metadata. A directory holds one `*.meta` JSON file
// per category and language (`db_x.meta`, `db_x_ko.meta`). The index maps
// categories to their files, product prefixes and search keywords; it is
// read from `category-index.json` when present, otherwise built in memory.
// ============================================================================

import { existsSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import {
  CatalogError,
  type CategoryField,
  type CategoryLookup,
  type CategoryLookupResult,
  log,
} from '@mxqlint/core';
import type { ZodError } from 'zod';
import {
  type CategoryIndex,
  type CategoryMeta,
  categoryIndexSchema,
  categoryMetaSchema,
} from './schema.js';

export const INDEX_FILE = 'category-index.json';
export const DEFAULT_LANGUAGE = 'en';
const LANGUAGE_SUFFIXES = ['ko', 'ja'];

export interface SearchResult {
  categoryName: string;
  title: string;
  platforms: string[];
  relevance: number;
  languages: string[];
}

function describeZod(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

function readJson(file: string): unknown {
  let text: string;
  try {
    text = readFileSync(file, 'utf-8');
  } catch (e) {
    throw new CatalogError(file, e instanceof Error ? e.message : String(e));
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new CatalogError(file, e instanceof Error ? e.message : String(e));
  }
}

/** Language of a meta file from its name: `db_x_ko.meta` → `ko`. */
export function languageOf(fileName: string): string {
  const stem = path.basename(fileName, '.meta');
  return LANGUAGE_SUFFIXES.find((lang) => stem.endsWith(`_${lang}`)) ?? DEFAULT_LANGUAGE;
}

/** Product prefix of a category name: `db_postgresql_counter` → `db`. */
export function productOf(categoryName: string): string {
  return categoryName.split('_')[0].toLowerCase();
}

function keywordsOf(meta: CategoryMeta): Set<string> {
  const keywords = new Set<string>();
  for (const part of meta.categoryName.toLowerCase().split('_')) {
    if (part) keywords.add(part);
  }
  for (const word of meta.title.toLowerCase().match(/\w+/g) ?? []) keywords.add(word);
  for (const platform of meta.platforms) keywords.add(platform.toLowerCase());
  return keywords;
}

/** Own entry of an index record; inherited members such as `constructor` are not entries. */
function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

function pushUnique(map: Record<string, string[]>, key: string, value: string): void {
  const list = ownEntry(map, key) ?? [];
  if (!list.includes(value)) list.push(value);
  map[key] = list;
}

/**
 * Category metadata backed by a directory of meta files.
 * Implements the `CategoryLookup` collaborator used by field checks.
 *
 * @example
 * ```ts
 * const catalog = new CategoryCatalog('./categories');
 * validateQuery(text, { categoryLookup: catalog });
 * catalog.search('postgresql', 5);
 * ```
 */
export class CategoryCatalog implements CategoryLookup {
  readonly dir: string;
  readonly index: CategoryIndex;
  private readonly metaCache = new Map<string, CategoryMeta>();

  /**
   * @param dir - Directory holding `*.meta` files
   * @param options.rebuild - Ignore an existing `category-index.json` and scan the meta files
   */
  constructor(dir: string, options: { rebuild?: boolean } = {}) {
    this.dir = dir;
    this.index = options.rebuild ? this.buildIndex() : this.loadOrBuildIndex();
  }

  private get indexPath(): string {
    return path.join(this.dir, INDEX_FILE);
  }

  private loadOrBuildIndex(): CategoryIndex {
    if (!existsSync(this.indexPath)) return this.buildIndex();
    const parsed = categoryIndexSchema.safeParse(readJson(this.indexPath));
    if (!parsed.success) {
      throw new CatalogError(this.indexPath, describeZod(parsed.error));
    }
    return parsed.data;
  }

  /** Build the index from every meta file. Unreadable files are skipped with a warning. */
  buildIndex(): CategoryIndex {
    const index: CategoryIndex = { categories: {}, products: {}, keywords: {} };
    if (!existsSync(this.dir)) return index;

    const files = readdirSync(this.dir)
      .filter((f) => f.endsWith('.meta'))
      .sort();

    for (const file of files) {
      let meta: CategoryMeta;
      try {
        meta = this.readMeta(file);
      } catch (e) {
        if (!(e instanceof CatalogError)) throw e;
        log.warn(`skipping category metadata ${file}`, { path: e.path, reason: e.message });
        continue;
      }

      const name = meta.categoryName;
      const lang = languageOf(file);
      const entry = ownEntry(index.categories, name) ?? {
        title: meta.title,
        interval: meta.interval,
        pk: meta.pk,
        platforms: meta.platforms,
        languages: {},
        tags: [],
        fields: [],
      };
      index.categories[name] = entry;
      entry.languages[lang] = file;
      if (lang === DEFAULT_LANGUAGE) {
        entry.title = meta.title;
        entry.tags = meta.tags.map((t) => t.tagName);
        entry.fields = meta.fields.map((f) => f.fieldName);
      }

      pushUnique(index.products, productOf(name), name);
      for (const keyword of keywordsOf(meta)) pushUnique(index.keywords, keyword, name);
    }

    log.debug('category index built', {
      dir: this.dir,
      categories: Object.keys(index.categories).length,
    });
    return index;
  }

  /** Write the current index to `category-index.json` in the catalog directory. */
  writeIndex(): string {
    writeFileSync(this.indexPath, `${JSON.stringify(this.index, null, 2)}\n`, 'utf-8');
    return this.indexPath;
  }

  private readMeta(file: string): CategoryMeta {
    const cached = this.metaCache.get(file);
    if (cached) return cached;
    const full = path.join(this.dir, file);
    const parsed = categoryMetaSchema.safeParse(readJson(full));
    if (!parsed.success) {
      throw new CatalogError(full, describeZod(parsed.error));
    }
    this.metaCache.set(file, parsed.data);
    return parsed.data;
  }

  /**
   * Full metadata of a category in the requested language, falling back to
   * English. Undefined when the category is unknown.
   *
   * @throws {CatalogError} when the meta file cannot be read
   */
  getCategoryInfo(categoryName: string, language: string = DEFAULT_LANGUAGE): CategoryMeta | undefined {
    const entry = ownEntry(this.index.categories, categoryName);
    if (!entry) return undefined;
    const file =
      ownEntry(entry.languages, language) ??
      ownEntry(entry.languages, DEFAULT_LANGUAGE) ??
      Object.values(entry.languages)[0];
    if (file === undefined) return undefined;
    return this.readMeta(file);
  }

  /** Tags then fields of a category, as `{fieldName, unit, type, description}`. */
  lookup(categoryName: string): CategoryLookupResult {
    const meta = this.getCategoryInfo(categoryName);
    if (!meta) return { found: false };
    const fields: CategoryField[] = [
      ...meta.tags.map((t) => ({ fieldName: t.tagName, unit: t.unit, type: t.type, description: t.description })),
      ...meta.fields.map((f) => ({
        fieldName: f.fieldName,
        unit: f.unit,
        type: f.type,
        description: f.description,
      })),
    ];
    return { found: true, fields };
  }

  /**
   * Rank categories against a free-text query.
   * Keyword hits score 2 (exact) or 1 (partial); category-name hits score
   * 3 (exact) or 2 (partial). Ties sort by name.
   */
  search(query: string, limit = 10): SearchResult[] {
    const q = query.toLowerCase().trim();
    if (q.length === 0) return [];
    const scores = new Map<string, number>();
    const add = (name: string, score: number) => scores.set(name, (scores.get(name) ?? 0) + score);

    for (const [keyword, categories] of Object.entries(this.index.keywords)) {
      if (!keyword.includes(q) && !q.includes(keyword)) continue;
      const score = keyword === q ? 2 : 1;
      for (const name of categories) add(name, score);
    }
    for (const name of Object.keys(this.index.categories)) {
      const lower = name.toLowerCase();
      if (!lower.includes(q)) continue;
      add(name, lower === q ? 3 : 2);
    }

    return [...scores.entries()]
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .slice(0, limit)
      .map(([name, relevance]) => {
        const entry = ownEntry(this.index.categories, name);
        return {
          categoryName: name,
          title: entry?.title ?? '',
          platforms: entry?.platforms ?? [],
          relevance,
          languages: entry ? Object.keys(entry.languages) : [],
        };
      });
  }

  findByProduct(product: string): string[] {
    return ownEntry(this.index.products, product.toLowerCase()) ?? [];
  }

  listProducts(): string[] {
    return Object.keys(this.index.products).sort();
  }
}
