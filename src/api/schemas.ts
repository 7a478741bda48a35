import { z } from 'zod';
import { RULE_IDS } from '../analyzer/types';
import { MAX_REQUEST_FINDINGS } from '../explain/types';

export const PASSWORD_HEADER = 'x-access-password';

export const MAX_SOURCE_LENGTH = 100_000;
export const MAX_ERROR_MESSAGE_LENGTH = 20_000;

export const findingSchema = z.object({
  ruleId: z.enum(RULE_IDS),
  severity: z.enum(['error', 'warning', 'info']),
  title: z.string(),
  line: z.number().int().min(1),
  message: z.string(),
  suggestion: z.string(),
});

export const parseErrorSchema = z.object({
  line: z.number().int().min(1),
  column: z.number().int().min(1),
  message: z.string(),
});

export const explainRequestSchema = z.object({
  source: z.string().min(1, 'Source code is required').max(MAX_SOURCE_LENGTH, 'Source code is too long'),
  findings: z.array(findingSchema).max(MAX_REQUEST_FINDINGS, 'Too many findings'),
  omittedFindings: z.number().int().min(0).optional(),
  parseError: parseErrorSchema.nullable().optional(),
  errorMessage: z.string().max(MAX_ERROR_MESSAGE_LENGTH, 'Error message is too long').nullable().optional(),
  apiKey: z.string().min(1).optional(),
});

export const explanationResultSchema = z.discriminatedUnion('success', [
  z.object({ success: z.literal(true), text: z.string(), modelUsed: z.string() }),
  z.object({
    success: z.literal(false),
    text: z.literal(''),
    modelUsed: z.string(),
    errorMessage: z.string(),
  }),
]);

export const loginRequestSchema = z.object({
  password: z.string(),
});

export const serverInfoSchema = z.object({
  passwordRequired: z.boolean(),
  model: z.string(),
  explanationConfigured: z.boolean(),
});

export type ServerInfo = z.infer<typeof serverInfoSchema>;

export const errorResponseSchema = z.object({
  message: z.string(),
});
