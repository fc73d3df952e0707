import { Router, type Request, type Response } from 'express';
import { queryInput } from '../../domain/schemas.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { successResponse, sendAppError, sendValidationError } from '../middleware/error-handler.js';
import { requireSession, getRequestSession } from '../middleware/require-session.js';
import * as queryService from '../../services/query/index.js';
import type { AppDeps } from '../deps.js';

export function createQueryRouter(deps: AppDeps): Router {
  const router = Router();

  router.post('/query', requireSession(deps.sessions), async (req: Request, res: Response) => {
    const session = getRequestSession(req);
    if (!session) {
      return sendAppError(res, createAppError(ErrorCode.UNAUTHORIZED, 'Unauthorized. Please log in.', false));
    }

    const parsed = queryInput.safeParse(req.body ?? {});
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const result = await queryService.answerPatientQuery(deps, session.email, parsed.data.query);
    if (!result.ok) return sendAppError(res, result.error);

    const { query, answer, sources } = result.value;
    res.json(successResponse({ query, answer, sources }));
  });

  return router;
}
