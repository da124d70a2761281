/**
 * Materialization checks for requests, using Zod.
 */

import { z, type ZodError } from 'zod';

/** RFC 7230 token */
const HEADER_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/** Visible ASCII, space, tab and obs-text; never CR, LF or NUL */
const HEADER_VALUE_PATTERN = /^[\t\x20-\x7e\x80-\xff]*$/;

export const httpMethodSchema = z.enum(['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS']);

export type HttpMethod = z.infer<typeof httpMethodSchema>;

export const headerNameSchema = z.string().regex(HEADER_NAME_PATTERN, 'Invalid header name');

export const headerValueSchema = z.string().regex(HEADER_VALUE_PATTERN, 'Invalid header value');

export const requestPartsSchema = z.object({
  method: httpMethodSchema,
  url: z.string().min(1, 'URL must not be empty'),
  headers: z.record(headerNameSchema, headerValueSchema),
  timeout: z.number().finite().nonnegative().optional(),
});

export type RequestPartsInput = z.input<typeof requestPartsSchema>;

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

export function zodErrorToIssues(error: ZodError): ValidationIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.') || 'request',
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Format validation issues into a single message
 */
export function formatValidationMessage(issues: ValidationIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}

export function validateRequestParts(parts: RequestPartsInput): ValidationIssue[] {
  const result = requestPartsSchema.safeParse(parts);
  return result.success ? [] : zodErrorToIssues(result.error);
}
