/**
 * Release processing failures
 *
 * Handlers are tried most specific first: registered handlers, then the
 * metadata handler, then the fallback. Every handler stores the failure on
 * the release and marks it FAILED. Only the fallback asks for a retry, since
 * everything else needs a change on the user's side first.
 */

import type { ReleaseErrorPayload } from '../db/schema';
import { ReleaseMetadataError, isVcsError } from '../services/vcs/errors';
import { captureError } from '../utils/sentry';
import { logger } from '../utils/sharedLogger';

export interface ReleaseErrorHandler {
  /** Stored as the failure kind */
  kind: string;
  matches(error: unknown): boolean;
  /** Report to Sentry and keep the event id as the correlation id */
  report?: boolean;
  /** Re-raise so the queue retries the job */
  retry?: boolean;
}

/**
 * The release a failure is stored on. Built from a loaded VcsRelease, or from
 * the bare row when loading it is what failed.
 */
export interface ReleaseFailureTarget {
  provider: string;
  /** Provider-side release id */
  releaseId: string;
  userId: string | null;
  markFailed(errors: ReleaseErrorPayload): Promise<void>;
}

export interface HandledReleaseError {
  handler: ReleaseErrorHandler;
  retry: boolean;
}

export const metadataErrorHandler: ReleaseErrorHandler = {
  kind: 'release-metadata',
  matches: (error) => error instanceof ReleaseMetadataError,
};

export const fallbackErrorHandler: ReleaseErrorHandler = {
  kind: 'unexpected',
  matches: () => true,
  report: true,
  retry: true,
};

const registeredHandlers: ReleaseErrorHandler[] = [];

/**
 * Add a deployment-specific handler; it takes precedence over the built-in ones
 */
export function registerReleaseErrorHandler(handler: ReleaseErrorHandler): void {
  registeredHandlers.push(handler);
}

export function resetReleaseErrorHandlers(): void {
  registeredHandlers.length = 0;
}

export function releaseErrorHandlers(): ReleaseErrorHandler[] {
  return [...registeredHandlers, metadataErrorHandler, fallbackErrorHandler];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the first matching handler against `error`
 */
export async function handleReleaseError(
  target: ReleaseFailureTarget,
  error: unknown,
  handlers: ReleaseErrorHandler[] = releaseErrorHandlers()
): Promise<HandledReleaseError> {
  const handler = handlers.find((candidate) => candidate.matches(error)) ?? fallbackErrorHandler;

  const errorId =
    handler.report && error instanceof Error
      ? captureError(error, {
          userId: target.userId ?? undefined,
          extra: { provider: target.provider, releaseId: target.releaseId },
        })
      : undefined;

  // A provider error says more than the handler that caught it
  const kind = handler === fallbackErrorHandler && isVcsError(error) ? error.kind : handler.kind;

  await target.markFailed({
    errors: errorMessage(error),
    kind,
    ...(errorId ? { errorId } : {}),
  });

  logger.warn(
    {
      provider: target.provider,
      releaseId: target.releaseId,
      kind,
      retry: handler.retry === true,
      err: errorMessage(error),
    },
    'Release processing failed'
  );

  return { handler, retry: handler.retry === true };
}
