// This module maps zod validation failures onto the stable parameter error codes clients rely on.

import { z } from 'zod';
import { AppError, validationError } from './errors.js';

export interface FieldErrorCodes {
  // Code used when the field is present but invalid.
  invalid: Record<string, string>;
  // Code used when a required field is absent; falls back to `invalid`.
  missing?: Record<string, string>;
}

export const INVALID_PARAMS_CODE = 'invalid_params';

// This helper reports whether one zod issue describes an absent value.
function isMissingValueIssue(issue: z.ZodIssue): boolean {
  return issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined;
}

// This function converts the first zod issue into an AppError carrying the field-specific code.
export function toValidationError(error: z.ZodError, codes: FieldErrorCodes): AppError {
  const issue = error.issues[0];
  const field = issue && typeof issue.path[0] === 'string' ? issue.path[0] : null;
  const issues = error.issues.map((entry) => ({
    path: entry.path.join('.'),
    message: entry.message
  }));

  if (!issue || !field) {
    return validationError(INVALID_PARAMS_CODE, issue?.message ?? 'Invalid params.', { issues });
  }

  const missingCode = isMissingValueIssue(issue) ? codes.missing?.[field] : undefined;
  const code = missingCode ?? codes.invalid[field] ?? INVALID_PARAMS_CODE;

  return validationError(code, `${field}: ${issue.message}`, { field, issues });
}

// This helper parses input with a schema and raises the mapped validation error on failure.
export function parseWithCodes<T extends z.ZodTypeAny>(schema: T, input: unknown, codes: FieldErrorCodes): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError(parsed.error, codes);
  }

  return parsed.data;
}
