import { z } from 'zod';

export const ERROR_TYPES = ['build', 'checkstyle'] as const;
export type ErrorType = (typeof ERROR_TYPES)[number];

const buildErrorSchema = z.object({
  error_name: z.string().min(1),
  description: z.string(),
  implementation_guide: z.string().optional(),
});

const checkstyleErrorSchema = z.object({
  check_name: z.string().min(1),
  description: z.string(),
  implementation_guide: z.string().optional(),
});

export const buildErrorFileSchema = z.record(z.string(), z.array(buildErrorSchema));
export const checkstyleErrorFileSchema = z.record(z.string(), z.array(checkstyleErrorSchema));

/** One catalog entry, whichever file it came from. */
export interface CatalogEntry {
  name: string;
  description: string;
  implementationGuide?: string;
}

export interface CatalogError extends CatalogEntry {
  type: ErrorType;
  category: string;
}

export type CategorySelection = Record<ErrorType, string[]>;

export const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

export const CODE_LENGTHS = ['short', 'medium', 'long'] as const;
export type CodeLength = (typeof CODE_LENGTHS)[number];

export function isDifficulty(value: unknown): value is Difficulty {
  return DIFFICULTIES.some((d) => d === value);
}

export function isCodeLength(value: unknown): value is CodeLength {
  return CODE_LENGTHS.some((l) => l === value);
}

export const categorySelectionSchema = z.object({
  build: z.array(z.string()).default([]),
  checkstyle: z.array(z.string()).default([]),
});

export const catalogErrorSchema = z.object({
  type: z.enum(ERROR_TYPES),
  category: z.string(),
  name: z.string(),
  description: z.string().default(''),
  implementationGuide: z.string().optional(),
});

export function emptySelection(): CategorySelection {
  return { build: [], checkstyle: [] };
}
