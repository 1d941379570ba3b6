import * as fs from 'fs';
import * as path from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../utils/logger';
import {
  ERROR_TYPES,
  buildErrorFileSchema,
  checkstyleErrorFileSchema,
  type CatalogEntry,
  type CatalogError,
  type CategorySelection,
  type Difficulty,
  type ErrorType,
} from './schema';

type Catalog = Map<string, CatalogEntry[]>;

export const DEFAULT_CATEGORIES: CategorySelection = {
  build: ['CompileTimeErrors', 'RuntimeErrors', 'LogicalErrors'],
  checkstyle: ['NamingConventionChecks', 'WhitespaceAndFormattingChecks'],
};

export interface JsonErrorRepositoryOptions {
  buildErrorsPath: string;
  checkstyleErrorsPath: string;
  /** Returns a float in [0, 1). */
  random?: () => number;
}

export interface ErrorsForLlmRequest {
  selectedCategories?: Partial<CategorySelection>;
  specificErrors?: CatalogError[];
  count?: number;
  difficulty?: Difficulty;
}

export interface ErrorsForLlmResult {
  errors: CatalogError[];
  problems: string[];
}

export function adjustCountForDifficulty(count: number, difficulty: Difficulty): number {
  switch (difficulty) {
    case 'easy':
      return Math.max(2, count - 2);
    case 'hard':
      return count + 2;
    default:
      return count;
  }
}

export function formatProblemDescription(error: CatalogError): string {
  const kind = error.type === 'build' ? 'Build Error' : 'Checkstyle Error';
  return `${kind} - ${error.name}: ${error.description} (Category: ${error.category})`;
}

/** Look for the file as given, then under the working directory's and the project's data/ folders. */
function candidatePaths(fileName: string): string[] {
  return [
    path.resolve(fileName),
    path.resolve('data', fileName),
    path.resolve(__dirname, '..', '..', 'data', fileName),
    path.resolve(__dirname, '..', '..', '..', 'data', fileName),
  ];
}

/**
 * Read-only access to the build-error and checkstyle catalogs.
 *
 * Both files map a category name to a list of errors; build errors are keyed
 * by `error_name`, checkstyle errors by `check_name`. Entries are normalized
 * to `CatalogEntry` on load so the rest of the class treats both alike.
 */
export class JsonErrorRepository {
  private readonly catalogs: Record<ErrorType, Catalog> = {
    build: new Map(),
    checkstyle: new Map(),
  };
  private readonly random: () => number;

  constructor(private readonly opts: JsonErrorRepositoryOptions) {
    this.random = opts.random ?? Math.random;
    this.loadErrorData();
  }

  /** True only if both catalogs loaded. */
  loadErrorData(): boolean {
    const build = this.loadCatalog('build', this.opts.buildErrorsPath, buildErrorFileSchema, (e) => ({
      name: e.error_name,
      description: e.description,
      implementationGuide: e.implementation_guide,
    }));
    const checkstyle = this.loadCatalog('checkstyle', this.opts.checkstyleErrorsPath, checkstyleErrorFileSchema, (e) => ({
      name: e.check_name,
      description: e.description,
      implementationGuide: e.implementation_guide,
    }));
    return build && checkstyle;
  }

  private loadCatalog<T>(
    type: ErrorType,
    fileName: string,
    schema: ZodType<Record<string, T[]>, ZodTypeDef, unknown>,
    normalize: (raw: T) => CatalogEntry,
  ): boolean {
    const filePath = candidatePaths(fileName).find((p) => fs.existsSync(p));
    if (!filePath) {
      logger.warn(`Could not find ${type} errors file`, { fileName });
      return false;
    }

    try {
      const parsed = schema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
      const catalog: Catalog = new Map();
      for (const [category, entries] of Object.entries(parsed)) {
        catalog.set(category, entries.map(normalize));
      }
      this.catalogs[type] = catalog;
      logger.info(`Loaded ${type} errors`, { filePath, categories: catalog.size });
      return true;
    } catch (err) {
      logger.error(`Error loading ${type} errors`, {
        filePath,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  getAllCategories(): CategorySelection {
    return {
      build: [...this.catalogs.build.keys()],
      checkstyle: [...this.catalogs.checkstyle.keys()],
    };
  }

  getCategoryErrors(type: ErrorType, category: string): CatalogEntry[] {
    return this.catalogs[type].get(category) ?? [];
  }

  /** Flattened entries of every selected category, per type; unknown categories are ignored. */
  getErrorsByCategories(selected: Partial<CategorySelection>): Record<ErrorType, CatalogEntry[]> {
    const result: Record<ErrorType, CatalogEntry[]> = { build: [], checkstyle: [] };
    for (const type of ERROR_TYPES) {
      for (const category of selected[type] ?? []) {
        result[type].push(...this.getCategoryErrors(type, category));
      }
    }
    return result;
  }

  /** Every error of one type, in catalog order. */
  listErrors(type: ErrorType): CatalogError[] {
    const result: CatalogError[] = [];
    for (const [category, entries] of this.catalogs[type]) {
      for (const entry of entries) {
        result.push({ type, category, name: entry.name, description: entry.description });
      }
    }
    return result;
  }

  getErrorDetails(type: ErrorType, name: string): CatalogEntry | null {
    for (const entries of this.catalogs[type].values()) {
      const found = entries.find((e) => e.name === name);
      if (found) return found;
    }
    return null;
  }

  getErrorByName(type: ErrorType, name: string): CatalogError | null {
    for (const [category, entries] of this.catalogs[type]) {
      const found = entries.find((e) => e.name === name);
      if (found) return { type, category, name: found.name, description: found.description };
    }
    return null;
  }

  getRandomErrorsByCategories(selected: Partial<CategorySelection>, count = 4): CatalogError[] {
    const all: CatalogError[] = [];
    for (const type of ERROR_TYPES) {
      for (const category of selected[type] ?? []) {
        for (const entry of this.getCategoryErrors(type, category)) {
          all.push({ type, category, ...entry });
        }
      }
    }
    return all.length <= count ? all : this.sample(all, count);
  }

  /**
   * Pick the errors a generated exercise should contain.
   *
   * Explicit `specificErrors` are used as given (implementation guides filled in
   * from the catalog). Otherwise every selected category contributes one or two
   * random errors, and the pool is cut down to the difficulty-adjusted count.
   * Empty `build` and `checkstyle` lists fall back to DEFAULT_CATEGORIES; a
   * selection naming neither type yields nothing.
   */
  getErrorsForLlm(request: ErrorsForLlmRequest): ErrorsForLlmResult {
    const { specificErrors, count = 4, difficulty = 'medium' } = request;
    let { selectedCategories } = request;

    if (specificErrors && specificErrors.length > 0) {
      const errors = specificErrors.map((error) => {
        const guide = this.findImplementationGuide(error.type, error.category, error.name);
        return guide ? { ...error, implementationGuide: guide } : { ...error };
      });
      return { errors, problems: errors.map(formatProblemDescription) };
    }

    if (!selectedCategories || (!('build' in selectedCategories) && !('checkstyle' in selectedCategories))) {
      return { errors: [], problems: [] };
    }

    if (!selectedCategories.build?.length && !selectedCategories.checkstyle?.length) {
      selectedCategories = DEFAULT_CATEGORIES;
    }

    const pool: CatalogError[] = [];
    for (const type of ERROR_TYPES) {
      for (const category of selectedCategories[type] ?? []) {
        const entries = this.getCategoryErrors(type, category);
        const take = Math.min(entries.length, 1 + Math.floor(this.random() * 2));
        for (const entry of this.sample(entries, take)) {
          pool.push({ type, category, ...entry });
        }
      }
    }

    const target = adjustCountForDifficulty(count, difficulty);
    const errors = pool.length > target ? this.sample(pool, target) : pool;
    return { errors, problems: errors.map(formatProblemDescription) };
  }

  /** Case-insensitive match on name or description across both catalogs. */
  searchErrors(term: string): CatalogError[] {
    const needle = term.toLowerCase();
    const results: CatalogError[] = [];
    for (const type of ERROR_TYPES) {
      for (const [category, entries] of this.catalogs[type]) {
        for (const entry of entries) {
          if (entry.name.toLowerCase().includes(needle) || entry.description.toLowerCase().includes(needle)) {
            results.push({ type, category, name: entry.name, description: entry.description });
          }
        }
      }
    }
    return results;
  }

  private findImplementationGuide(type: ErrorType, category: string, name: string): string | undefined {
    return this.getCategoryErrors(type, category).find((e) => e.name === name)?.implementationGuide;
  }

  /** Partial Fisher–Yates; returns `count` distinct items. */
  private sample<T>(items: readonly T[], count: number): T[] {
    const copy = [...items];
    const n = Math.min(count, copy.length);
    for (let i = 0; i < n; i++) {
      const j = i + Math.floor(this.random() * (copy.length - i));
      [copy[i], copy[j]] = [copy[j], copy[i]];
    }
    return copy.slice(0, n);
  }
}
