/**
 * Domain errors raised by providers, the version-control service and the receiver.
 *
 * Every error carries a literal `kind` so callers can match on the `VcsError`
 * union instead of walking an instanceof chain. The HTTP status is the one the
 * global error handler and the webhook receiver answer with.
 */

import { ApiError } from '../../lib/errors';

export type VcsErrorKind =
  | 'repository-access'
  | 'repository-not-found'
  | 'repository-disabled'
  | 'release-already-received'
  | 'invalid-sender'
  | 'remote-account-not-found'
  | 'remote-account-data-not-set'
  | 'user-info-none'
  | 'token-not-found'
  | 'unexpected-provider-response'
  | 'release-zipball-fetch'
  | 'release-metadata'
  | 'provider-not-registered';

abstract class VcsBaseError extends ApiError {
  abstract readonly kind: VcsErrorKind;
}

// ============================================================================
// Access and lookup
// ============================================================================

export class RepositoryAccessError extends VcsBaseError {
  readonly kind = 'repository-access' as const;

  constructor(
    readonly userId: string,
    readonly repositoryName: string,
    readonly repositoryId: string | null
  ) {
    super({
      type: 'repository-access',
      title: 'Forbidden',
      status: 403,
      detail: `The user cannot access the repository ${repositoryName}.`,
    });
    this.name = 'RepositoryAccessError';
  }
}

export class InvalidSenderError extends VcsBaseError {
  readonly kind = 'invalid-sender' as const;

  constructor(detail = 'Invalid sender for event') {
    super({ type: 'invalid-sender', title: 'Forbidden', status: 403, detail });
    this.name = 'InvalidSenderError';
  }
}

export class RepositoryNotFoundError extends VcsBaseError {
  readonly kind = 'repository-not-found' as const;

  constructor(readonly repository: string) {
    super({
      type: 'repository-not-found',
      title: 'Not Found',
      status: 404,
      detail: `The repository ${repository} was not found.`,
    });
    this.name = 'RepositoryNotFoundError';
  }
}

// ============================================================================
// Conflicts
// ============================================================================

export class RepositoryDisabledError extends VcsBaseError {
  readonly kind = 'repository-disabled' as const;

  constructor(readonly repository: string) {
    super({
      type: 'repository-disabled',
      title: 'Conflict',
      status: 409,
      detail: 'This repository is not enabled for webhooks.',
    });
    this.name = 'RepositoryDisabledError';
  }
}

export class ReleaseAlreadyReceivedError extends VcsBaseError {
  readonly kind = 'release-already-received' as const;

  constructor(readonly releaseId: string) {
    super({
      type: 'release-already-received',
      title: 'Conflict',
      status: 409,
      detail: 'The release has already been received.',
    });
    this.name = 'ReleaseAlreadyReceivedError';
  }
}

// ============================================================================
// Account setup preconditions
// ============================================================================

export class RemoteAccountNotFound extends VcsBaseError {
  readonly kind = 'remote-account-not-found' as const;

  constructor(readonly userId: string, detail = 'Remote account was not found for user.') {
    super({ type: 'remote-account-not-found', title: 'Precondition Failed', status: 412, detail });
    this.name = 'RemoteAccountNotFound';
  }
}

export class RemoteAccountDataNotSet extends VcsBaseError {
  readonly kind = 'remote-account-data-not-set' as const;

  constructor(readonly userId: string, detail = 'Remote account data is not set for user.') {
    super({ type: 'remote-account-data-not-set', title: 'Precondition Failed', status: 412, detail });
    this.name = 'RemoteAccountDataNotSet';
  }
}

export class UserInfoNoneError extends VcsBaseError {
  readonly kind = 'user-info-none' as const;

  constructor(detail = 'The provider did not return the user profile.') {
    super({ type: 'user-info-none', title: 'Precondition Failed', status: 412, detail });
    this.name = 'UserInfoNoneError';
  }
}

export class VcsTokenNotFound extends VcsBaseError {
  readonly kind = 'token-not-found' as const;

  constructor(readonly userId: string, readonly provider: string) {
    super({
      type: 'token-not-found',
      title: 'Unauthorized',
      status: 401,
      detail: `No ${provider} access token is stored for this user.`,
    });
    this.name = 'VcsTokenNotFound';
  }
}

// ============================================================================
// Provider and release processing failures
// ============================================================================

export class UnexpectedProviderResponse extends VcsBaseError {
  readonly kind = 'unexpected-provider-response' as const;

  constructor(readonly provider: string, readonly responseStatus: number, readonly path: string) {
    super({
      type: 'unexpected-provider-response',
      title: 'Bad Gateway',
      status: 502,
      detail: `${provider} answered ${responseStatus} for ${path}`,
    });
    this.name = 'UnexpectedProviderResponse';
  }
}

export class ReleaseZipballFetchError extends VcsBaseError {
  readonly kind = 'release-zipball-fetch' as const;

  constructor(detail = 'The release archive could not be fetched.') {
    super({ type: 'release-zipball-fetch', title: 'Bad Gateway', status: 502, detail });
    this.name = 'ReleaseZipballFetchError';
  }
}

export class ReleaseMetadataError extends VcsBaseError {
  readonly kind = 'release-metadata' as const;

  constructor(readonly fileName: string, detail = 'The metadata file is not valid JSON.') {
    super({ type: 'release-metadata', title: 'Unprocessable Entity', status: 422, detail });
    this.name = 'ReleaseMetadataError';
  }
}

export class ProviderNotRegisteredError extends VcsBaseError {
  readonly kind = 'provider-not-registered' as const;

  constructor(readonly providerId: string) {
    super({
      type: 'provider-not-registered',
      title: 'Internal Server Error',
      status: 500,
      detail: `No VCS provider registered with id: ${providerId}`,
    });
    this.name = 'ProviderNotRegisteredError';
  }
}

export type VcsError =
  | RepositoryAccessError
  | InvalidSenderError
  | RepositoryNotFoundError
  | RepositoryDisabledError
  | ReleaseAlreadyReceivedError
  | RemoteAccountNotFound
  | RemoteAccountDataNotSet
  | UserInfoNoneError
  | VcsTokenNotFound
  | UnexpectedProviderResponse
  | ReleaseZipballFetchError
  | ReleaseMetadataError
  | ProviderNotRegisteredError;

const VCS_ERROR_KINDS: ReadonlySet<string> = new Set<VcsErrorKind>([
  'repository-access',
  'repository-not-found',
  'repository-disabled',
  'release-already-received',
  'invalid-sender',
  'remote-account-not-found',
  'remote-account-data-not-set',
  'user-info-none',
  'token-not-found',
  'unexpected-provider-response',
  'release-zipball-fetch',
  'release-metadata',
  'provider-not-registered',
]);

export function isVcsError(error: unknown): error is VcsError {
  return error instanceof VcsBaseError && VCS_ERROR_KINDS.has(error.kind);
}
