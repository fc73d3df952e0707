import { Router, type Request, type Response } from 'express';
import multer from 'multer';
import { successResponse, sendAppError } from '../middleware/error-handler.js';
import * as uploadService from '../../services/upload/index.js';
import type { AppDeps } from '../deps.js';

export function createUploadRouter(deps: AppDeps): Router {
  const router = Router();
  const { consentBucket, uploadMaxBytes } = deps.settings;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: uploadMaxBytes, files: 1 },
  });

  router.post('/upload', upload.single('file'), async (req: Request, res: Response) => {
    const incoming = req.file ? { originalName: req.file.originalname, data: req.file.buffer } : undefined;

    const validated = uploadService.validateUpload(incoming, uploadMaxBytes);
    if (!validated.ok) return sendAppError(res, validated.error);

    const stored = await uploadService.storeUpload(deps.blobs, consentBucket, validated.value);
    if (!stored.ok) return sendAppError(res, stored.error);

    res.json(
      successResponse({
        message: 'File uploaded successfully',
        filename: stored.value.filename,
        original_name: stored.value.originalName,
      }),
    );
  });

  return router;
}
