// Error report: the structured form of a Result's errors for API responses

import { z } from 'zod';
import { ReportFormatError } from '../core/errors.js';
import { ErrorMessage } from './error-message.js';
import { Result } from './result.js';

export const ErrorEntrySchema = z.object({
  message: z.string(),
  actualValue: z.string().nullable()
});

export const ErrorReportSchema = z.object({
  valid: z.boolean(),
  errors: z.array(ErrorEntrySchema)
}).refine(report => report.valid === (report.errors.length === 0), {
  message: 'A report is valid exactly when it has no errors',
  path: ['valid']
});

export type ErrorReport = z.infer<typeof ErrorReportSchema>;

export function toErrorReport(result: Result<unknown>): ErrorReport {
  const errors = result.getErrors().map(error => error.toJSON());
  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Reads a report produced by {@link toErrorReport}, e.g. from another service's response body.
 * Actual values come back in their rendered string form.
 */
export function parseErrorReport(data: unknown): ErrorMessage[] {
  const parsed = ErrorReportSchema.safeParse(data);
  if (!parsed.success) {
    throw new ReportFormatError('Invalid error report', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    });
  }

  return parsed.data.errors.map(entry =>
    entry.actualValue === null
      ? new ErrorMessage(entry.message)
      : new ErrorMessage(entry.message, entry.actualValue)
  );
}

/**
 * One line per error, in recorded order
 */
export function formatErrors(result: Result<unknown>): string {
  return result.getErrors().map(error => error.toString()).join('\n');
}
