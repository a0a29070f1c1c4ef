import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createWebhookToken } from '../src/utils/jwt';
import { authHeader, closeTestApp, createTestApp } from './helpers/testApp';
import {
  createTestContext,
  fakeReleasePayload,
  mockUser,
  seedConnectedUser,
  type TestContext,
} from './helpers/mocks';
import { FAKE_PROVIDER } from './helpers/fakeProvider';

describe('HTTP API', () => {
  let ctx: TestContext;
  let app: FastifyInstance;

  beforeEach(async () => {
    ctx = createTestContext();
    app = await createTestApp(ctx);
  });

  afterEach(async () => {
    await closeTestApp(app);
  });

  describe('health', () => {
    it('should report a healthy database', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'healthy', database: 'connected', environment: 'test' });
      expect(response.headers['x-request-id']).toBeDefined();
    });

    it('should answer 503 when the database is down', async () => {
      const unhealthy = await createTestApp(ctx, async () => {
        throw new Error('connection refused');
      });

      const response = await unhealthy.inject({ method: 'GET', url: '/health' });
      await closeTestApp(unhealthy);

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ status: 'unhealthy', database: 'disconnected' });
    });

    it('should expose the v1 health check', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/health' });

      expect(response.json()).toMatchObject({ version: 'v1', status: 'ok' });
    });
  });

  describe('authentication', () => {
    it('should require a bearer token', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/vcs' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({
        type: '/errors/unauthorized',
        title: 'Unauthorized',
        status: 401,
        detail: 'Authentication required',
      });
    });

    it('should reject an invalid token', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v1/vcs',
        headers: { authorization: 'Bearer not-a-token' },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json().detail).toBe('Invalid or expired token');
    });
  });

  describe('/v1/vcs', () => {
    const headers = authHeader(mockUser.id);

    it('should list the registered providers', async () => {
      const response = await app.inject({ method: 'GET', url: '/v1/vcs', headers });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual([
        {
          id: 'fake',
          name: 'Fake Forge',
          icon: 'fake',
          repository: 'repository',
          repositoryPlural: 'repositories',
          description: 'In-process forge',
          baseUrl: 'https://forge.test',
          newRepositoryUrl: 'https://forge.test/new',
        },
      ]);
    });

    it('should connect an account', async () => {
      ctx.remote.users.set(mockUser.id, { id: mockUser.remoteId, username: 'testuser', displayName: null });

      const response = await app.inject({
        method: 'POST',
        url: '/v1/vcs/fake',
        headers,
        payload: { accessToken: 'oauth-access-token' },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json().data.initialized).toBe(true);
      expect(await ctx.accounts.getAccessToken(mockUser.id, FAKE_PROVIDER)).toBe('oauth-access-token');
    });

    it('should answer 404 for an unknown provider', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/vcs/bitbucket',
        headers,
        payload: { accessToken: 'oauth-access-token' },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ type: '/errors/not-found', detail: 'Unknown provider: bitbucket' });
    });

    it('should validate the request body', async () => {
      const response = await app.inject({ method: 'POST', url: '/v1/vcs/fake', headers, payload: {} });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ type: '/errors/validation-error', status: 400 });
      expect(response.json().errors[0].field).toBe('accessToken');
    });

    describe('with a connected account', () => {
      beforeEach(() => {
        seedConnectedUser(ctx);
        ctx.remote.addRepository({ id: '42', fullName: 'testuser/zeta' }, [mockUser.remoteId]);
        ctx.remote.addRepository({ id: '43', fullName: 'testuser/alpha', licenseSpdx: 'MIT' }, [mockUser.remoteId]);
        ctx.remote.grant(mockUser.id, '42', '43');
      });

      async function sync() {
        return app.inject({ method: 'POST', url: '/v1/vcs/fake/repositories/sync', headers });
      }

      it('should sync and return the sync time', async () => {
        const response = await sync();

        expect(response.statusCode).toBe(200);
        const account = await ctx.accounts.getRemoteAccount(mockUser.id, FAKE_PROVIDER);
        expect(response.json().data).toEqual({ lastSync: account?.extraData.lastSync });
        expect(ctx.dispatcher.syncHooksJobs).toHaveLength(1);
      });

      it('should skip hooks when asked', async () => {
        await app.inject({
          method: 'POST',
          url: '/v1/vcs/fake/repositories/sync',
          headers,
          payload: { hooks: false },
        });

        expect(ctx.dispatcher.syncHooksJobs).toEqual([]);
        expect(ctx.store.state.repositories).toHaveLength(2);
      });

      it('should list repositories sorted by name, one page at a time', async () => {
        await sync();

        const response = await app.inject({ method: 'GET', url: '/v1/vcs/fake/repositories?limit=1', headers });

        expect(response.statusCode).toBe(200);
        const body = response.json();
        expect(body.data).toEqual([
          {
            id: '43',
            fullName: 'testuser/alpha',
            defaultBranch: 'main',
            description: null,
            license: 'MIT',
            htmlUrl: 'https://forge.test/testuser/alpha',
            enabled: false,
            enabledByUserId: null,
            latestRelease: null,
          },
        ]);
        expect(body.meta.pagination).toEqual({ total: 2, limit: 1, offset: 0, hasMore: true });
      });

      it('should show a repository with its releases', async () => {
        await sync();
        const repo = await ctx.store.getRepository(FAKE_PROVIDER, { providerId: '42' });
        await ctx.store.createRelease({
          provider: FAKE_PROVIDER,
          providerId: 'rel-1',
          tag: 'v1.0.0',
          repositoryId: repo?.id ?? '',
        });

        const response = await app.inject({ method: 'GET', url: '/v1/vcs/fake/repositories/42', headers });

        expect(response.statusCode).toBe(200);
        const { data } = response.json();
        expect(data.fullName).toBe('testuser/zeta');
        expect(data.newReleaseUrl).toBe('https://forge.test/testuser/zeta/releases/new');
        expect(data.releases).toHaveLength(1);
        expect(data.releases[0]).toMatchObject({ id: 'rel-1', tag: 'v1.0.0', status: 'received', recordId: null });
      });

      it('should refuse repositories the user cannot access', async () => {
        await ctx.store.createRepository({
          provider: FAKE_PROVIDER,
          providerId: '99',
          fullName: 'someone/else',
          defaultBranch: 'main',
        });

        const response = await app.inject({ method: 'GET', url: '/v1/vcs/fake/repositories/99', headers });

        expect(response.statusCode).toBe(403);
        expect(response.json().type).toBe('/errors/repository-access');
      });

      it('should enable and disable a repository', async () => {
        await sync();

        const enabled = await app.inject({ method: 'POST', url: '/v1/vcs/fake/repositories/42/enable', headers });
        const disabled = await app.inject({ method: 'POST', url: '/v1/vcs/fake/repositories/42/disable', headers });

        expect(enabled.json().data).toEqual({ id: '42', enabled: true });
        expect(disabled.json().data).toEqual({ id: '42', enabled: false });
        expect(ctx.remote.deletedHooks).toEqual([{ repositoryId: '42', hookId: '100' }]);
      });

      it('should answer 409 when disabling a repository that is not enabled', async () => {
        await sync();

        const response = await app.inject({ method: 'POST', url: '/v1/vcs/fake/repositories/42/disable', headers });

        expect(response.statusCode).toBe(409);
        expect(response.json()).toMatchObject({
          type: '/errors/repository-disabled',
          detail: 'This repository is not enabled for webhooks.',
        });
      });

      it('should disconnect the account', async () => {
        const response = await app.inject({ method: 'DELETE', url: '/v1/vcs/fake', headers });

        expect(response.statusCode).toBe(204);
        expect(await ctx.accounts.getRemoteAccount(mockUser.id, FAKE_PROVIDER)).toBeNull();
        expect(ctx.dispatcher.disconnectJobs).toHaveLength(1);
      });
    });
  });

  describe('/v1/receivers', () => {
    beforeEach(async () => {
      seedConnectedUser(ctx);
      await ctx.store.createRepository({
        provider: FAKE_PROVIDER,
        providerId: '42',
        fullName: 'testuser/project',
        defaultBranch: 'main',
        hook: '100',
        enabledByUserId: mockUser.id,
      });
    });

    const token = () =>
      encodeURIComponent(createWebhookToken({ userId: mockUser.id, provider: FAKE_PROVIDER, tokenId: 'webhook-token-id' }));

    it('should accept a release event', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `/v1/receivers/fake/events?access_token=${token()}`,
        payload: fakeReleasePayload(),
      });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({});
      expect(ctx.dispatcher.processReleaseJobs).toEqual([{ provider: FAKE_PROVIDER, releaseId: 'rel-1' }]);
    });

    it('should keep the raw body for signature checks', async () => {
      ctx.factory.updateConfigOverride({ config: { signature: 'test-secret' } });

      const response = await app.inject({
        method: 'POST',
        url: `/v1/receivers/fake/events?access_token=${token()}`,
        headers: { 'x-fake-signature': 'test-secret' },
        payload: fakeReleasePayload(),
      });

      expect(response.statusCode).toBe(202);
      expect(ctx.store.state.events[0].payload).toEqual(fakeReleasePayload());
    });

    it('should answer with the refusal in the body', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/receivers/fake/events',
        payload: fakeReleasePayload(),
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({ message: 'Invalid webhook access token', status: 403 });
    });

    it('should answer 404 for an unknown receiver', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `/v1/receivers/bitbucket/events?access_token=${token()}`,
        payload: fakeReleasePayload(),
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ message: 'Unknown receiver: bitbucket', status: 404 });
    });

    it('should reject a malformed JSON body', async () => {
      const response = await app.inject({
        method: 'POST',
        url: `/v1/receivers/fake/events?access_token=${token()}`,
        headers: { 'content-type': 'application/json' },
        payload: '{"action":',
      });

      expect(response.statusCode).toBe(400);
    });
  });
});
