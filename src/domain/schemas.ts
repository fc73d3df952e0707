import { z } from 'zod';
import { NOT_AVAILABLE } from './types.js';

export const storageEventSchema = z.object({
  bucket: z.string().min(1, 'Bucket is required'),
  name: z.string().min(1, 'Object name is required'),
});

// Models sometimes answer with null, numbers or blanks; all of them collapse to a string or "N/A".
const entityValue = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return NOT_AVAILABLE;
    const text = String(value).trim();
    return text === '' ? NOT_AVAILABLE : text;
  });

export const consentEntitiesSchema = z.object({
  patient_name: entityValue,
  patient_email: entityValue,
  date_of_birth: entityValue,
  doctor_name: entityValue,
  procedure: entityValue,
  date: entityValue,
});

const itemList = z
  .array(z.string())
  .nullish()
  .transform((items) => items ?? []);

export const consentAnalysisSchema = z.object({
  summary: z
    .string()
    .nullish()
    .transform((summary) => summary ?? ''),
  entities: z.preprocess((value) => value ?? {}, consentEntitiesSchema),
  consented_items: itemList,
  declined_items: itemList,
  patient_id: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((id) => (id === null || id === undefined || String(id).trim() === '' ? 'unknown' : String(id))),
});

export const ocrResultDocumentSchema = z.object({
  responses: z.array(
    z.object({
      fullTextAnnotation: z.object({ text: z.string() }).optional(),
    }),
  ),
});

const trimmedText = z
  .string()
  .optional()
  .transform((value) => (value ?? '').trim());

export const registerInput = z
  .object({
    email: trimmedText.transform((email) => email.toLowerCase()),
    password: trimmedText,
    patient_name: trimmedText,
    date_of_birth: trimmedText,
  })
  .refine((input) => input.email !== '' && input.password !== '', {
    message: 'Email and password are required',
  });

export const loginInput = z
  .object({
    email: trimmedText.transform((email) => email.toLowerCase()),
    password: trimmedText,
  })
  .refine((input) => input.email !== '' && input.password !== '', {
    message: 'Email and password are required',
  });

export const queryInput = z
  .object({ query: trimmedText })
  .refine((input) => input.query !== '', { message: 'No query provided' });

export const askInput = z
  .object({
    question: trimmedText,
    session_id: z.string().optional().default('default'),
  })
  .refine((input) => input.question !== '', { message: 'No question provided' });

export type ConsentAnalysis = z.output<typeof consentAnalysisSchema>;
export type OcrResultDocument = z.output<typeof ocrResultDocumentSchema>;
export type RegisterInput = z.output<typeof registerInput>;
export type LoginInput = z.output<typeof loginInput>;
export type QueryInput = z.output<typeof queryInput>;
export type AskInput = z.output<typeof askInput>;
