import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { THEME_NAMES } from '../styles/tokens';
import { renderReviewPage, type ReviewPageData } from '../templates/reviewPage';
import { EMPTY_REVIEW_MESSAGE } from '../templates/reviewPanel';
import { escapeHtml } from '../templates/layout';
import type { AppServices } from '../../api/services';

const reviewPageSchema = z.object({
  code: z.string().default(''),
  // A form posts one field per problem, which arrives as a string when there is only one
  knownProblems: z.preprocess((v) => (typeof v === 'string' ? [v] : v), z.array(z.string()).optional()),
  showKnownProblems: z.union([z.boolean(), z.enum(['true', 'false']).transform((v) => v === 'true')]).optional(),
  fileName: z.string().optional(),
  iteration: z.coerce.number().int().min(1).default(1),
  maxIterations: z.coerce.number().int().min(1).default(3),
  guidance: z.string().optional(),
  analysis: z
    .object({
      identifiedCount: z.number().int().min(0),
      totalProblems: z.number().int().min(0),
      identifiedPercentage: z.number().min(0),
    })
    .optional(),
  previousReview: z.string().optional(),
  /** The review being submitted; starts the next attempt. */
  review: z.string().optional(),
  theme: z.enum(THEME_NAMES).optional(),
});

/**
 * POST /review
 * Renders the code under review and the review panel for the posted state.
 * A posted `review` moves to the next attempt and becomes the previous review;
 * the last attempt completes the exercise.
 */
export function reviewRouter(services: AppServices): Router {
  const router = Router();

  router.post('/', (req: Request, res: Response) => {
    const parsed = reviewPageSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
      res.status(400).send(`<p>Invalid review request: ${escapeHtml(fields)}</p>`);
      return;
    }

    const { theme, review, ...data } = parsed.data;
    if (data.iteration > data.maxIterations) {
      res.status(400).send('<p>Invalid review request: iteration exceeds maxIterations</p>');
      return;
    }

    let page: ReviewPageData = { ...data, theme: theme ?? services.settings.defaultTheme };
    let status = 200;

    if (review !== undefined) {
      if (!review.trim()) {
        page = { ...page, errorMessage: EMPTY_REVIEW_MESSAGE };
        status = 400;
      } else if (data.iteration >= data.maxIterations) {
        page = { ...page, previousReview: review, completed: true };
      } else {
        page = { ...page, iteration: data.iteration + 1, previousReview: review };
      }
    }

    res.status(status);
    res.setHeader('Content-Type', 'text/html; charset=utf-8');
    res.send(renderReviewPage(page));
  });

  return router;
}
