import Joi from 'joi';
import { CATEGORY_PRECEDENCE } from '../types/models';
import { DraftInput, EmailRecordInput, GuardrailCheckRequest, TriageRequest } from '../types/api';

/**
 * Validation schemas and functions for request payloads
 */

// Missing text fields are tolerated here; the pipeline degrades such records
const optionalText = Joi.string().allow('').empty(null).default('');

export const emailRecordInputSchema = Joi.object<EmailRecordInput>({
  message_id: Joi.string().trim().min(1).required(),
  thread_id: optionalText,
  sender: optionalText,
  display_name: optionalText,
  subject: optionalText,
  body: optionalText,
  received_at: Joi.date().iso().required(),
  labels: Joi.array().items(Joi.string()).default([]),
  recipients: Joi.array().items(Joi.string().allow('')).default([])
});

export const draftInputSchema = Joi.object<DraftInput>({
  draft_id: Joi.string().trim().min(1).required(),
  body: Joi.string().allow('').required(),
  recipients: Joi.array().items(Joi.string().allow('')).required(),
  cc: Joi.array().items(Joi.string().allow('')).default([])
});

export const triageRequestSchema = Joi.object<TriageRequest>({
  emails: Joi.array().items(emailRecordInputSchema).required(),
  drafts: Joi.object().pattern(Joi.string(), draftInputSchema).default({}),
  allow_oversized_batch: Joi.boolean().default(false)
});

export const guardrailCheckRequestSchema = Joi.object<GuardrailCheckRequest>({
  draft: draftInputSchema.required(),
  category: Joi.string().valid(...CATEGORY_PRECEDENCE).optional(),
  message_id: Joi.string().optional()
});

const validationOptions: Joi.ValidationOptions = { abortEarly: false, stripUnknown: true };

// Validation functions
export function validateTriageRequest(body: unknown): { error?: Joi.ValidationError; value?: TriageRequest } {
  return triageRequestSchema.validate(body, validationOptions);
}

export function validateGuardrailCheckRequest(body: unknown): { error?: Joi.ValidationError; value?: GuardrailCheckRequest } {
  return guardrailCheckRequestSchema.validate(body, validationOptions);
}

export function validateEmailRecordInput(input: unknown): { error?: Joi.ValidationError; value?: EmailRecordInput } {
  return emailRecordInputSchema.validate(input, validationOptions);
}

// Utility functions for data transformation and validation
export function sanitizeEmailContent(content: string): string {
  return content
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control characters
    .trim();
}

// Custom validation error class
export class ValidationError extends Error {
  public details: Joi.ValidationErrorItem[];

  constructor(message: string, details: Joi.ValidationErrorItem[]) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

// Helper function to throw validation errors
export function throwValidationError(result: { error?: Joi.ValidationError }): never {
  if (result.error) {
    throw new ValidationError(result.error.message, result.error.details);
  }
  throw new Error('Validation failed');
}
