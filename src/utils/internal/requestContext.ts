/**
 * @fileoverview Creation of the context object threaded through every operation for log correlation.
 * @module src/utils/internal/requestContext
 */
import { randomUUID } from 'node:crypto';

/**
 * Context passed to every provider call and spread into log entries.
 */
export interface RequestContext {
  requestId: string;
  timestamp: string;
  operation?: string;
  [key: string]: unknown;
}

export const requestContextService = {
  /**
   * Creates a new context. A `parentContext` keeps its `requestId` so that
   * nested operations stay correlated with the run that started them.
   */
  createRequestContext(
    additionalContext: Record<string, unknown> & { operation?: string } = {},
    parentContext?: RequestContext,
  ): RequestContext {
    return {
      ...parentContext,
      ...additionalContext,
      requestId: parentContext?.requestId ?? randomUUID(),
      timestamp: new Date().toISOString(),
    };
  },
};
