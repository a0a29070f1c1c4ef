import { describe, it, expect } from 'vitest';
import { ApiError, ValidationError, UnauthorizedError, NotFoundError, InternalError } from '../src/lib/errors';
import {
  InvalidSenderError,
  ReleaseAlreadyReceivedError,
  ReleaseMetadataError,
  ReleaseZipballFetchError,
  RemoteAccountNotFound,
  RepositoryAccessError,
  RepositoryDisabledError,
  RepositoryNotFoundError,
  UnexpectedProviderResponse,
  VcsTokenNotFound,
  isVcsError,
} from '../src/services/vcs/errors';

describe('API Errors (RFC 7807 Compliance)', () => {
  describe('ApiError base class', () => {
    it('should create error with all properties', () => {
      const error = new ApiError({
        type: 'test-error',
        title: 'Test Error',
        status: 418,
        detail: 'Something happened',
        instance: '/v1/things/1',
      });

      expect(error.type).toBe('/errors/test-error');
      expect(error.title).toBe('Test Error');
      expect(error.status).toBe(418);
      expect(error.detail).toBe('Something happened');
      expect(error.instance).toBe('/v1/things/1');
      expect(error.message).toBe('Something happened');
      expect(error.name).toBe('ApiError');
    });

    it('should use the title as message without detail', () => {
      const error = new ApiError({ type: 'test-error', title: 'Test Error', status: 418 });

      expect(error.message).toBe('Test Error');
    });

    it('should convert to problem details with a trace id', () => {
      const error = new ApiError({ type: 'test-error', title: 'Test Error', status: 418, detail: 'Oops' });

      expect(error.toProblemDetails('req-1')).toEqual({
        type: '/errors/test-error',
        title: 'Test Error',
        status: 418,
        detail: 'Oops',
        traceId: 'req-1',
      });
    });

    it('should omit empty optional fields', () => {
      const error = new ApiError({ type: 'test-error', title: 'Test Error', status: 418, errors: [] });

      expect(error.toProblemDetails()).toEqual({ type: '/errors/test-error', title: 'Test Error', status: 418 });
    });
  });

  describe('ValidationError', () => {
    it('should have status 400 and list field errors', () => {
      const error = new ValidationError('Invalid data', [
        { field: 'name', code: 'required', message: 'Name is required' },
      ]);

      expect(error.status).toBe(400);
      expect(error.type).toBe('/errors/validation-error');
      expect(error.name).toBe('ValidationError');
      expect(error.toProblemDetails().errors).toEqual([
        { field: 'name', code: 'required', message: 'Name is required' },
      ]);
    });

    it('should create from Zod error', () => {
      const error = ValidationError.fromZodError({
        errors: [
          { path: ['email'], message: 'Invalid email' },
          { path: ['user', 'name'], message: 'Name too short' },
        ],
      });

      expect(error.detail).toBe('Invalid request data');
      expect(error.errors).toEqual([
        { field: 'email', code: 'invalid', message: 'Invalid email' },
        { field: 'user.name', code: 'invalid', message: 'Name too short' },
      ]);
    });
  });

  describe('UnauthorizedError', () => {
    it('should have status 401 and a default message', () => {
      const error = new UnauthorizedError();

      expect(error.status).toBe(401);
      expect(error.type).toBe('/errors/unauthorized');
      expect(error.detail).toBe('Authentication required');
    });

    it('should accept custom message', () => {
      expect(new UnauthorizedError('Token expired').detail).toBe('Token expired');
    });
  });

  describe('NotFoundError', () => {
    it('should have status 404', () => {
      const error = new NotFoundError('Unknown provider: bitbucket');

      expect(error.status).toBe(404);
      expect(error.title).toBe('Not Found');
      expect(error.detail).toBe('Unknown provider: bitbucket');
    });
  });

  describe('InternalError', () => {
    it('should not leak a stack trace into problem details', () => {
      const problem = new InternalError().toProblemDetails();

      expect(problem).toEqual({
        type: '/errors/internal-error',
        title: 'Internal Server Error',
        status: 500,
        detail: 'An unexpected error occurred',
      });
    });
  });
});

describe('VCS errors', () => {
  it('should map each kind to its status', () => {
    const cases: Array<[ApiError & { kind: string }, string, number]> = [
      [new RepositoryAccessError('user-1', 'testuser/project', '42'), 'repository-access', 403],
      [new InvalidSenderError(), 'invalid-sender', 403],
      [new RepositoryNotFoundError('testuser/project'), 'repository-not-found', 404],
      [new RepositoryDisabledError('testuser/project'), 'repository-disabled', 409],
      [new ReleaseAlreadyReceivedError('rel-1'), 'release-already-received', 409],
      [new RemoteAccountNotFound('user-1'), 'remote-account-not-found', 412],
      [new VcsTokenNotFound('user-1', 'github'), 'token-not-found', 401],
      [new UnexpectedProviderResponse('github', 500, '/user'), 'unexpected-provider-response', 502],
      [new ReleaseZipballFetchError(), 'release-zipball-fetch', 502],
      [new ReleaseMetadataError('.release-metadata.json'), 'release-metadata', 422],
    ];

    for (const [error, kind, status] of cases) {
      expect(error.kind).toBe(kind);
      expect(error.status).toBe(status);
      expect(error.type).toBe(`/errors/${kind}`);
    }
  });

  it('should describe the failing provider call', () => {
    expect(new UnexpectedProviderResponse('github', 500, '/user').message).toBe('github answered 500 for /user');
    expect(new RepositoryNotFoundError('testuser/project').message).toBe(
      'The repository testuser/project was not found.'
    );
  });

  it('should recognize VCS errors only', () => {
    expect(isVcsError(new RepositoryDisabledError('testuser/project'))).toBe(true);
    expect(isVcsError(new NotFoundError())).toBe(false);
    expect(isVcsError(new Error('boom'))).toBe(false);
    expect(isVcsError('boom')).toBe(false);
  });
});
