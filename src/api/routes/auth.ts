import { Router, type Request, type Response } from 'express';
import { loginInput, registerInput } from '../../domain/schemas.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { NOT_AVAILABLE } from '../../domain/types.js';
import { successResponse, sendAppError, sendValidationError } from '../middleware/error-handler.js';
import { requireSession, getRequestSession } from '../middleware/require-session.js';
import * as patientService from '../../services/patient/index.js';
import { logger } from '../../infrastructure/logger.js';
import type { AppDeps } from '../deps.js';

const log = logger.child({ module: 'auth' });

export function createAuthRouter(deps: AppDeps): Router {
  const router = Router();

  router.post('/register', async (req: Request, res: Response) => {
    const parsed = registerInput.safeParse(req.body ?? {});
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const result = await patientService.registerPatient(deps, parsed.data);
    if (!result.ok) return sendAppError(res, result.error);

    res.json(successResponse({ message: 'Registration successful', email: result.value.email }));
  });

  router.post('/login', async (req: Request, res: Response) => {
    const parsed = loginInput.safeParse(req.body ?? {});
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const result = await patientService.authenticatePatient(deps, parsed.data);
    if (!result.ok) return sendAppError(res, result.error);

    const patientName = result.value.patientName || NOT_AVAILABLE;
    const session = deps.sessions.create(result.value.email, patientName);
    log.info({ accountId: result.value.id, expiresAt: session.expiresAt.toISOString() }, 'Session created');

    res.json(
      successResponse({
        message: 'Login successful',
        session_token: session.token,
        patient_name: patientName,
        email: session.email,
      }),
    );
  });

  router.post('/logout', requireSession(deps.sessions), (req: Request, res: Response) => {
    const session = getRequestSession(req);
    if (!session) {
      return sendAppError(res, createAppError(ErrorCode.UNAUTHORIZED, 'Unauthorized. Please log in.', false));
    }

    deps.sessions.invalidate(session.token);
    res.json(successResponse({ message: 'Logged out successfully' }));
  });

  return router;
}
