/**
 * Plain-language tool errors
 */

import {
  CredentialRefreshError,
  NotAuthenticatedError,
  errorMessage,
} from '@docdesk/auth';
import { errorResult, type ToolContext, type ToolResult } from '@docdesk/tools';
import { logger } from '@docdesk/observability';

/**
 * HTTP status of a googleapis (gaxios) error, when there is one
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (!(error instanceof Error) || !('response' in error)) {
    return undefined;
  }
  const response: unknown = error.response;
  if (typeof response === 'object' && response !== null && 'status' in response) {
    const status: unknown = response.status;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/**
 * Failures only a fresh consent grant can fix
 */
export function needsReconnect(error: unknown): boolean {
  return (
    error instanceof NotAuthenticatedError ||
    error instanceof CredentialRefreshError ||
    httpStatusOf(error) === 401
  );
}

export function describeFailure(error: unknown): string {
  if (error instanceof NotAuthenticatedError) {
    return error.message;
  }
  if (error instanceof CredentialRefreshError) {
    return `${error.message}. Send me any message and click 'Connect Google' to reconnect.`;
  }

  const message = errorMessage(error);
  switch (httpStatusOf(error)) {
    case 401:
      return `Google rejected the saved credentials: ${message}. Send me any message and click 'Connect Google' to reconnect.`;
    case 404:
      return `Document not found: ${message}`;
    case 403:
      return `Permission denied: ${message}`;
    default:
      return `Google API request failed: ${message}`;
  }
}

/**
 * Run a tool body, turning any failure into an error result for the model.
 * Credential failures also queue a reconnect button for the user.
 */
export async function guarded(
  tool: string,
  context: ToolContext,
  body: () => Promise<ToolResult>
): Promise<ToolResult> {
  try {
    return await body();
  } catch (error) {
    logger.warn('Document tool failed', {
      tool,
      status: httpStatusOf(error),
      error: errorMessage(error),
    });
    if (needsReconnect(error)) {
      context.interactions.requestReconnect();
    }
    return errorResult(describeFailure(error));
  }
}
