import { Router, type Request, type Response } from 'express';
import { askInput } from '../../domain/schemas.js';
import { successResponse, sendAppError, sendValidationError } from '../middleware/error-handler.js';
import * as askService from '../../services/ask/index.js';
import type { AppDeps } from '../deps.js';

/** Unauthenticated: answers may come from any patient's form. */
export function createAskRouter(deps: AppDeps): Router {
  const router = Router();

  router.post('/ask', async (req: Request, res: Response) => {
    const parsed = askInput.safeParse(req.body ?? {});
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const result = await askService.askQuestion(deps.entityIndex, parsed.data.question);
    if (!result.ok) return sendAppError(res, result.error);

    res.json(
      successResponse({
        answer: result.value.answer,
        document_id: result.value.documentId,
        entity: result.value.entity,
        session_id: parsed.data.session_id,
      }),
    );
  });

  return router;
}
