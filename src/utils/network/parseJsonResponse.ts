/**
 * @fileoverview Reads a JSON body and validates it against a zod schema.
 * @module src/utils/network/parseJsonResponse
 */
import type { z } from 'zod';

import { PipelineError, PipelineErrorCode } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

/**
 * Validates an already-decoded value.
 *
 * @param description - What the value is, used in the error message (e.g. "ChEMBL molecule page").
 * @throws {PipelineError} `SchemaError` listing every issue.
 */
export function validateWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  description: string,
  context: RequestContext,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`,
    );
    logger.error(`Unexpected ${description} shape`, { ...context, issues });
    throw new PipelineError(
      PipelineErrorCode.SchemaError,
      `Unexpected ${description} shape: ${issues.join('; ')}`,
      { requestId: context.requestId, issues },
    );
  }
  return result.data;
}

/**
 * Parses `response` as JSON and validates it.
 *
 * @throws {PipelineError} `SchemaError` when the body is not JSON or does not match.
 */
export async function parseJsonResponse<S extends z.ZodTypeAny>(
  response: Response,
  schema: S,
  description: string,
  context: RequestContext,
): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new PipelineError(
      PipelineErrorCode.SchemaError,
      `${description} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { requestId: context.requestId },
    );
  }
  return validateWith(schema, body, description, context);
}
