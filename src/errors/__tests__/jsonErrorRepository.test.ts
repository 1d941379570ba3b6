import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  JsonErrorRepository,
  adjustCountForDifficulty,
  formatProblemDescription,
} from '../jsonErrorRepository';

const BUILD_ERRORS = {
  CompileTimeErrors: [
    { error_name: 'Missing semicolon', description: 'Statement not terminated', implementation_guide: 'Drop one semicolon' },
    { error_name: 'Incompatible types', description: 'String assigned to int' },
    { error_name: 'Undefined symbol', description: 'Variable never declared' },
  ],
  LogicalErrors: [
    { error_name: 'Off-by-one error', description: 'Loop runs once too often' },
    { error_name: 'Inverted condition', description: 'Branch condition negated' },
  ],
};

const CHECKSTYLE_ERRORS = {
  NamingConventionChecks: [
    { check_name: 'MemberName', description: 'Field names must be camelCase' },
    { check_name: 'ConstantName', description: 'Constants must be UPPER_CASE' },
  ],
};

describe('JsonErrorRepository', () => {
  let dir: string;
  let buildPath: string;
  let checkstylePath: string;

  function repo(random: () => number = () => 0): JsonErrorRepository {
    return new JsonErrorRepository({ buildErrorsPath: buildPath, checkstyleErrorsPath: checkstylePath, random });
  }

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'error-catalog-'));
    buildPath = path.join(dir, 'build_errors.json');
    checkstylePath = path.join(dir, 'checkstyle_error.json');
    await fs.writeFile(buildPath, JSON.stringify(BUILD_ERRORS), 'utf8');
    await fs.writeFile(checkstylePath, JSON.stringify(CHECKSTYLE_ERRORS), 'utf8');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('lists categories of both catalogs in file order', () => {
    expect(repo().getAllCategories()).toEqual({
      build: ['CompileTimeErrors', 'LogicalErrors'],
      checkstyle: ['NamingConventionChecks'],
    });
  });

  it('normalizes entries of both files', () => {
    const r = repo();
    expect(r.getCategoryErrors('build', 'CompileTimeErrors')[0]).toEqual({
      name: 'Missing semicolon',
      description: 'Statement not terminated',
      implementationGuide: 'Drop one semicolon',
    });
    expect(r.getCategoryErrors('checkstyle', 'NamingConventionChecks').map((e) => e.name)).toEqual([
      'MemberName',
      'ConstantName',
    ]);
    expect(r.getCategoryErrors('build', 'NoSuchCategory')).toEqual([]);
  });

  it('flattens the selected categories and ignores unknown ones', () => {
    const result = repo().getErrorsByCategories({ build: ['LogicalErrors', 'Unknown'], checkstyle: [] });
    expect(result.build.map((e) => e.name)).toEqual(['Off-by-one error', 'Inverted condition']);
    expect(result.checkstyle).toEqual([]);
  });

  it('looks errors up by name', () => {
    const r = repo();
    expect(r.getErrorDetails('checkstyle', 'ConstantName')?.description).toBe('Constants must be UPPER_CASE');
    expect(r.getErrorDetails('build', 'ConstantName')).toBeNull();
    expect(r.getErrorByName('build', 'Inverted condition')).toEqual({
      type: 'build',
      category: 'LogicalErrors',
      name: 'Inverted condition',
      description: 'Branch condition negated',
    });
  });

  it('samples random errors from the selection', () => {
    const r = repo();
    const selected = { build: ['CompileTimeErrors'], checkstyle: ['NamingConventionChecks'] };
    expect(r.getRandomErrorsByCategories(selected, 2).map((e) => e.name)).toEqual(['Missing semicolon', 'Incompatible types']);
    expect(r.getRandomErrorsByCategories(selected, 10)).toHaveLength(5);
  });

  it('takes one error per category when the random source is low', () => {
    const { errors, problems } = repo().getErrorsForLlm({
      selectedCategories: { build: ['CompileTimeErrors', 'LogicalErrors'], checkstyle: ['NamingConventionChecks'] },
    });
    expect(errors.map((e) => e.name)).toEqual(['Missing semicolon', 'Off-by-one error', 'MemberName']);
    expect(problems).toEqual([
      'Build Error - Missing semicolon: Statement not terminated (Category: CompileTimeErrors)',
      'Build Error - Off-by-one error: Loop runs once too often (Category: LogicalErrors)',
      'Checkstyle Error - MemberName: Field names must be camelCase (Category: NamingConventionChecks)',
    ]);
  });

  it('takes two errors per category when the random source is high', () => {
    const { errors } = repo(() => 0.99).getErrorsForLlm({
      selectedCategories: { build: ['LogicalErrors'], checkstyle: [] },
      count: 4,
    });
    expect(errors).toHaveLength(2);
  });

  it('cuts the pool down to the difficulty-adjusted count', () => {
    const { errors } = repo().getErrorsForLlm({
      selectedCategories: { build: ['CompileTimeErrors', 'LogicalErrors'], checkstyle: ['NamingConventionChecks'] },
      count: 4,
      difficulty: 'easy',
    });
    expect(errors.map((e) => e.name)).toEqual(['Missing semicolon', 'Off-by-one error']);
  });

  it('falls back to the default categories for an empty selection', () => {
    const { errors } = repo().getErrorsForLlm({ selectedCategories: { build: [], checkstyle: [] } });
    expect(errors.map((e) => e.category)).toEqual(['CompileTimeErrors', 'LogicalErrors', 'NamingConventionChecks']);
  });

  it('returns nothing without a selection', () => {
    expect(repo().getErrorsForLlm({})).toEqual({ errors: [], problems: [] });
  });

  it('returns nothing for a selection that names neither error type', () => {
    expect(repo().getErrorsForLlm({ selectedCategories: {} })).toEqual({ errors: [], problems: [] });
  });

  it('lists every error of one type in catalog order', () => {
    expect(repo().listErrors('checkstyle')).toEqual([
      { type: 'checkstyle', category: 'NamingConventionChecks', name: 'MemberName', description: 'Field names must be camelCase' },
      { type: 'checkstyle', category: 'NamingConventionChecks', name: 'ConstantName', description: 'Constants must be UPPER_CASE' },
    ]);
    expect(repo().listErrors('build').map((e) => e.name)).toEqual([
      'Missing semicolon',
      'Incompatible types',
      'Undefined symbol',
      'Off-by-one error',
      'Inverted condition',
    ]);
  });

  it('uses specific errors as given and fills in their guides', () => {
    const { errors, problems } = repo().getErrorsForLlm({
      specificErrors: [
        { type: 'build', category: 'CompileTimeErrors', name: 'Missing semicolon', description: 'Statement not terminated' },
      ],
      count: 1,
    });
    expect(errors).toEqual([
      {
        type: 'build',
        category: 'CompileTimeErrors',
        name: 'Missing semicolon',
        description: 'Statement not terminated',
        implementationGuide: 'Drop one semicolon',
      },
    ]);
    expect(problems).toEqual(['Build Error - Missing semicolon: Statement not terminated (Category: CompileTimeErrors)']);
  });

  it('searches names and descriptions case-insensitively', () => {
    const r = repo();
    expect(r.searchErrors('SEMICOLON').map((e) => e.name)).toEqual(['Missing semicolon']);
    expect(r.searchErrors('camelcase').map((e) => e.name)).toEqual(['MemberName']);
    expect(r.searchErrors('nothing matches this')).toEqual([]);
  });

  it('starts empty when a catalog is missing or malformed', async () => {
    const badPath = path.join(dir, 'bad.json');
    await fs.writeFile(badPath, JSON.stringify({ CompileTimeErrors: [{ description: 'no name' }] }), 'utf8');
    const r = new JsonErrorRepository({
      buildErrorsPath: badPath,
      checkstyleErrorsPath: path.join(dir, 'missing.json'),
    });
    expect(r.getAllCategories()).toEqual({ build: [], checkstyle: [] });
    expect(r.loadErrorData()).toBe(false);
  });
});

describe('adjustCountForDifficulty', () => {
  it('shrinks for easy, keeps medium and grows for hard', () => {
    expect(adjustCountForDifficulty(4, 'easy')).toBe(2);
    expect(adjustCountForDifficulty(3, 'easy')).toBe(2);
    expect(adjustCountForDifficulty(4, 'medium')).toBe(4);
    expect(adjustCountForDifficulty(4, 'hard')).toBe(6);
  });
});

describe('formatProblemDescription', () => {
  it('names the error type', () => {
    expect(
      formatProblemDescription({ type: 'checkstyle', category: 'BlockChecks', name: 'NeedBraces', description: 'Braces required' }),
    ).toBe('Checkstyle Error - NeedBraces: Braces required (Category: BlockChecks)');
  });
});
