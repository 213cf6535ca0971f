import Joi from 'joi';
import { TASK_KINDS } from '../types/index.js';
import type { TaskFilters, TaskState, TaskSubmission } from '../types/index.js';
import { ValidationError } from './errors.js';

/**
 * Common validation schemas for queue inputs
 */

const TASK_STATES: TaskState[] = ['pending', 'running', 'succeeded', 'failed', 'cancelled'];

export const taskKeySchema = Joi.string()
  .min(1)
  .max(512)
  .pattern(/^\S+$/)
  .messages({
    'string.pattern.base': 'Task key cannot contain whitespace',
  });

export const taskKindSchema = Joi.string()
  .valid(...TASK_KINDS)
  .required()
  .messages({
    'any.only': `Unknown task kind. Expected one of: ${TASK_KINDS.join(', ')}`,
  });

// Lowercase registry path, optionally with host and namespace segments
export const imageNameSchema = Joi.string()
  .min(1)
  .max(255)
  .pattern(/^[a-z0-9]+(?:[._-][a-z0-9]+)*(?::[0-9]+)?(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*$/)
  .messages({
    'string.pattern.base': 'Image name must be a lowercase registry path such as registry.example.com/team/app',
  });

export const imageTagSchema = Joi.string()
  .max(128)
  .pattern(/^[A-Za-z0-9_][A-Za-z0-9_.-]*$/)
  .messages({
    'string.pattern.base': 'Tag can only contain letters, numbers, underscores, periods, and hyphens',
  });

export const submitTaskSchema = Joi.object<TaskSubmission>({
  kind: taskKindSchema,
  key: taskKeySchema.optional(),
  params: Joi.object().unknown(true).default({}),
});

export const taskFiltersSchema = Joi.object<TaskFilters>({
  state: Joi.string().valid(...TASK_STATES).optional(),
  key: taskKeySchema.optional(),
  kind: Joi.string().valid(...TASK_KINDS).optional(),
  limit: Joi.number().integer().min(1).max(1000).optional(),
  offset: Joi.number().integer().min(0).optional(),
});

/**
 * Validate data against a schema, returning the defaulted value
 */
export function validate<T>(schema: Joi.Schema<T>, data: unknown): T {
  const { error, value } = schema.validate(data, {
    abortEarly: false,
    stripUnknown: false,
    allowUnknown: false,
  });

  if (error) {
    const details = error.details.map(detail => ({
      field: detail.path.join('.'),
      message: detail.message,
      value: detail.context?.value,
    }));

    const message = `Validation failed: ${details.map(d => `${d.field}: ${d.message}`).join(', ')}`;
    throw new ValidationError(message, details);
  }

  return value;
}

/**
 * Check if an error is a validation error
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
