import { Router, Request, Response } from 'express';
import { parseTheme } from '../styles/tokens';
import { renderErrorsPage } from '../templates/errorsPage';
import { isSelectionMode, parseSpecificErrorKey, specificErrorKey } from '../templates/errorSelector';
import { isProblemArea, mapProblemAreasToCategories } from '../../errors/problemAreas';
import {
  ERROR_TYPES,
  emptySelection,
  isCodeLength,
  isDifficulty,
  type CatalogError,
  type CategorySelection,
} from '../../errors/schema';
import type { JsonErrorRepository } from '../../errors/jsonErrorRepository';
import { queryList, queryString } from '../../utils/query';
import { logger } from '../../utils/logger';
import type { AppServices } from '../../api/services';

/** Hidden `specific` picks plus `add`, minus `remove`, resolved against the catalog. */
function resolveSpecificErrors(repo: JsonErrorRepository, keys: string[], add: string[], remove: string[]): CatalogError[] {
  const resolved: CatalogError[] = [];
  for (const key of [...keys, ...add]) {
    if (remove.includes(key)) continue;
    const parsed = parseSpecificErrorKey(key);
    if (!parsed) continue;
    const error = repo.getErrorByName(parsed.type, parsed.name);
    if (!error || error.category !== parsed.category) continue;
    if (resolved.some((e) => specificErrorKey(e) === key)) continue;
    resolved.push(error);
  }
  return resolved;
}

/**
 * GET /errors?mode=standard|advanced|specific&difficulty=&length=&area=&build=&checkstyle=&specific=&q=
 * Error selector page. Standard mode selects categories through focus areas,
 * advanced mode through category checkboxes, specific mode picks exact errors.
 * The preview shows what the next exercise would contain.
 */
export function errorsPageRouter(services: AppServices): Router {
  const router = Router();
  const repo = services.errorRepository;

  router.get('/', (req: Request, res: Response) => {
    const theme = parseTheme(req.query.theme, services.settings.defaultTheme);
    const mode = isSelectionMode(req.query.mode) ? req.query.mode : 'standard';
    const difficulty = isDifficulty(req.query.difficulty) ? req.query.difficulty : 'medium';
    const length = isCodeLength(req.query.length) ? req.query.length : 'medium';
    const pickerType = req.query.etype === 'checkstyle' ? 'checkstyle' : 'build';
    const areas = queryList(req.query.area).filter(isProblemArea);
    const searchTerm = queryString(req.query.q)?.trim() || undefined;

    try {
      const categories = repo.getAllCategories();
      const requested: CategorySelection = mode === 'standard' ? mapProblemAreasToCategories(areas) : emptySelection();
      if (mode === 'advanced') {
        for (const type of ERROR_TYPES) requested[type] = queryList(req.query[type]);
      }
      const selected: CategorySelection = emptySelection();
      for (const type of ERROR_TYPES) {
        selected[type] = categories[type].filter((c) => requested[type].includes(c));
      }

      const specificErrors = resolveSpecificErrors(
        repo,
        queryList(req.query.specific),
        queryList(req.query.add),
        queryList(req.query.remove),
      );

      const matches = searchTerm ? repo.searchErrors(searchTerm) : undefined;
      const pickerErrors = (matches ?? repo.listErrors(pickerType)).filter((e) => e.type === pickerType);

      const hasCategories = selected.build.length > 0 || selected.checkstyle.length > 0;
      const useSpecific = mode === 'specific' && specificErrors.length > 0;
      const preview = useSpecific || hasCategories
        ? repo.getErrorsForLlm({
            selectedCategories: selected,
            specificErrors: useSpecific ? specificErrors : undefined,
            difficulty,
          })
        : undefined;

      const html = renderErrorsPage({
        theme,
        mode,
        difficulty,
        length,
        categories,
        selected,
        areas,
        specificErrors,
        pickerType,
        pickerErrors,
        searchTerm,
        searchResults: matches,
        preview,
      });

      res.setHeader('Content-Type', 'text/html; charset=utf-8');
      res.send(html);
    } catch (err) {
      logger.error('Errors page render error', { error: err instanceof Error ? err.message : String(err) });
      res.status(500).send('Internal error rendering error selector');
    }
  });

  return router;
}
