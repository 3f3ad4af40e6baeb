import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { config } from '../config';
import { withSource } from '../logger';
import { ValidationError } from '../types/errors';

const log = withSource('validateRequest');

const DocumentSchema = z.object({
  id: z.number().int().positive().optional(),
  text: z.string(),
});

// An empty documents array passes here on purpose: the pipeline answers it
// with EmptyCorpusError, the same as an empty directory
const SimilarityBodySchema = z
  .object({
    documents: z.array(DocumentSchema).max(config.api.maxRequestDocuments),
    shingleSize: z.number().int().min(1).max(64).optional(),
    numHashes: z.number().int().min(1).max(4096).optional(),
    similarityThreshold: z.number().min(0).max(1).optional(),
    seed: z.number().int().min(0).max(0xffff_ffff).optional(),
    normalize: z.boolean().optional().default(true),
  })
  .superRefine((data, ctx) => {
    const ids = data.documents
      .map(doc => doc.id)
      .filter((id): id is number => id !== undefined);
    if (ids.length > 0 && ids.length !== data.documents.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['documents'],
        message: 'Either every document has an id or none does',
      });
    }
    if (new Set(ids).size !== ids.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['documents'],
        message: 'Document ids must be unique',
      });
    }
  });

function sendValidationError(res: Response, reqPath: string, issues: z.ZodIssue[]) {
  const requestId: unknown = res.locals?.requestId;
  if (issues.length) {
    log.warn({ path: reqPath, issues, requestId }, 'request validation failed');
  }
  const error = new ValidationError('Invalid payload');
  const body: { error: string; code: string; details: z.ZodIssue[]; requestId?: string } = {
    error: error.message,
    code: error.code,
    details: issues,
  };
  if (typeof requestId === 'string') body.requestId = requestId;
  return res.status(error.statusCode).json(body);
}

export function validateSimilarityRequest(req: Request, res: Response, next: NextFunction): void {
  const parsed = SimilarityBodySchema.safeParse(req.body);
  if (!parsed.success) {
    sendValidationError(res, req.path, parsed.error.issues);
    return;
  }
  req.validated = { ...(req.validated || {}), body: parsed.data };
  next();
}
