import Joi from 'joi';

/**
 * Validation schemas for API request bodies and query strings
 */

export interface AskRequest {
  question: string;
  context?: string;
}

export interface RelevantEmailsQuery {
  limit: number;
}

export interface SummaryQuery {
  days: number;
}

export const askRequestSchema = Joi.object<AskRequest>({
  question: Joi.string().trim().min(1).max(2000).required(),
  context: Joi.string().allow('').max(20000).optional()
});

export const relevantEmailsQuerySchema = Joi.object<RelevantEmailsQuery>({
  limit: Joi.number().integer().min(1).max(100).default(20)
});

export const summaryQuerySchema = Joi.object<SummaryQuery>({
  days: Joi.number().integer().min(1).max(90).default(7)
});

export function validateAskRequest(body: unknown): Joi.ValidationResult<AskRequest> {
  return askRequestSchema.validate(body, { abortEarly: false });
}

export function validateRelevantEmailsQuery(query: unknown): Joi.ValidationResult<RelevantEmailsQuery> {
  return relevantEmailsQuerySchema.validate(query, { abortEarly: false });
}

export function validateSummaryQuery(query: unknown): Joi.ValidationResult<SummaryQuery> {
  return summaryQuerySchema.validate(query, { abortEarly: false });
}
