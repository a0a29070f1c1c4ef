import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createWebhookToken } from '../src/utils/jwt';
import type { Repository } from '../src/db/schema';
import type { IncomingWebhook } from '../src/services/receiver.service';
import {
  createTestContext,
  fakeReleasePayload,
  mockUser,
  otherUser,
  seedConnectedUser,
  type TestContext,
} from './helpers/mocks';
import { FAKE_PROVIDER } from './helpers/fakeProvider';

function webhookToken(userId = mockUser.id, tokenId = 'webhook-token-id', provider = FAKE_PROVIDER): string {
  return createWebhookToken({ userId, provider, tokenId });
}

function delivery(payload: unknown, overrides: Partial<IncomingWebhook> = {}): IncomingWebhook {
  return {
    receiverId: FAKE_PROVIDER,
    accessToken: webhookToken(),
    payload,
    rawBody: JSON.stringify(payload),
    headers: {},
    ...overrides,
  };
}

describe('WebhookReceiver', () => {
  let ctx: TestContext;
  let repo: Repository;

  beforeEach(async () => {
    ctx = createTestContext();
    seedConnectedUser(ctx);
    repo = await ctx.store.createRepository({
      provider: FAKE_PROVIDER,
      providerId: '42',
      fullName: 'testuser/project',
      defaultBranch: 'main',
      hook: '100',
      enabledByUserId: mockUser.id,
    });
  });

  describe('authentication', () => {
    it('should answer 404 for an unknown receiver', async () => {
      const outcome = await ctx.receiver.receive(delivery(fakeReleasePayload(), { receiverId: 'bitbucket' }));

      expect(outcome).toEqual({ status: 404, body: { message: 'Unknown receiver: bitbucket', status: 404 } });
      expect(ctx.store.state.events).toHaveLength(0);
    });

    it('should answer 403 without an access token', async () => {
      const outcome = await ctx.receiver.receive(delivery(fakeReleasePayload(), { accessToken: undefined }));

      expect(outcome).toEqual({ status: 403, body: { message: 'Invalid webhook access token', status: 403 } });
    });

    it('should answer 403 for a malformed token', async () => {
      const outcome = await ctx.receiver.receive(delivery(fakeReleasePayload(), { accessToken: 'not-a-jwt' }));

      expect(outcome.status).toBe(403);
    });

    it('should answer 403 for a token issued for another provider', async () => {
      const outcome = await ctx.receiver.receive(
        delivery(fakeReleasePayload(), { accessToken: webhookToken(mockUser.id, 'webhook-token-id', 'github') })
      );

      expect(outcome.status).toBe(403);
    });

    it('should answer 403 for a token id that is no longer current', async () => {
      const outcome = await ctx.receiver.receive(
        delivery(fakeReleasePayload(), { accessToken: webhookToken(mockUser.id, 'rotated-token-id') })
      );

      expect(outcome.status).toBe(403);
    });

    it('should answer 403 when the account was disconnected', async () => {
      const outcome = await ctx.receiver.receive(
        delivery(fakeReleasePayload(), { accessToken: webhookToken(otherUser.id) })
      );

      expect(outcome.status).toBe(403);
    });

    it('should answer 403 when the signature does not match', async () => {
      ctx.factory.updateConfigOverride({ config: { signature: 'test-secret' } });

      const rejected = await ctx.receiver.receive(
        delivery(fakeReleasePayload(), { headers: { 'x-fake-signature': 'wrong' } })
      );
      const accepted = await ctx.receiver.receive(
        delivery(fakeReleasePayload(), { headers: { 'x-fake-signature': 'test-secret' } })
      );

      expect(rejected).toEqual({ status: 403, body: { message: 'Invalid webhook signature', status: 403 } });
      expect(accepted.status).toBe(202);
    });

    it('should answer 400 for a payload that is not an object', async () => {
      const outcome = await ctx.receiver.receive(delivery([1, 2, 3]));

      expect(outcome).toEqual({ status: 400, body: { message: 'Webhook payload must be a JSON object', status: 400 } });
      expect(ctx.store.state.events).toHaveLength(0);
    });
  });

  describe('release events', () => {
    it('should accept a release and queue it for processing', async () => {
      const outcome = await ctx.receiver.receive(delivery(fakeReleasePayload()));

      expect(outcome.status).toBe(202);
      expect(outcome.body).toEqual({});

      const [release] = ctx.store.state.releases;
      expect(release).toMatchObject({
        provider: FAKE_PROVIDER,
        providerId: 'rel-1',
        tag: 'v1.0.0',
        status: 'received',
        repositoryId: repo.id,
        eventId: outcome.eventId,
      });
      expect(ctx.dispatcher.processReleaseJobs).toEqual([{ provider: FAKE_PROVIDER, releaseId: 'rel-1' }]);
    });

    it('should store the event with its response', async () => {
      const outcome = await ctx.receiver.receive(delivery(fakeReleasePayload()));

      const event = await ctx.store.getWebhookEvent(outcome.eventId ?? '');
      expect(event).toMatchObject({
        receiverId: FAKE_PROVIDER,
        userId: mockUser.id,
        responseCode: 202,
        response: {},
      });
    });

    it('should answer 200 and store nothing else for other events', async () => {
      const outcome = await ctx.receiver.receive(delivery({ action: 'deleted', release: { id: 'rel-1' } }));

      expect(outcome.status).toBe(200);
      expect(outcome.body).toEqual({});
      expect(ctx.store.state.events[0].responseCode).toBe(200);
      expect(ctx.store.state.releases).toHaveLength(0);
      expect(ctx.dispatcher.processReleaseJobs).toHaveLength(0);
    });

    it('should answer 409 for a release received twice', async () => {
      await ctx.receiver.receive(delivery(fakeReleasePayload()));
      const outcome = await ctx.receiver.receive(delivery(fakeReleasePayload()));

      expect(outcome.status).toBe(409);
      expect(outcome.body).toEqual({ message: 'The release has already been received.', status: 409 });
      expect(ctx.store.state.releases).toHaveLength(1);
      expect(ctx.store.state.events[1].responseCode).toBe(409);
    });

    it('should not queue a duplicate of a release already processed', async () => {
      await ctx.receiver.receive(delivery(fakeReleasePayload()));
      await ctx.store.updateRelease(ctx.store.state.releases[0].id, { status: 'published' });

      const outcome = await ctx.receiver.receive(delivery(fakeReleasePayload()));

      expect(outcome.status).toBe(409);
      expect(ctx.dispatcher.processReleaseJobs).toEqual([{ provider: FAKE_PROVIDER, releaseId: 'rel-1' }]);
    });

    it('should find a repository by name when its provider id is unknown', async () => {
      const outcome = await ctx.receiver.receive(delivery(fakeReleasePayload({ repositoryId: '43' })));

      expect(outcome.status).toBe(202);
      expect(ctx.store.state.releases[0].repositoryId).toBe(repo.id);
    });

    it('should answer 404 for an unknown repository', async () => {
      const outcome = await ctx.receiver.receive(
        delivery(fakeReleasePayload({ repositoryId: '77', fullName: 'testuser/elsewhere' }))
      );

      expect(outcome.body).toEqual({ message: 'The repository testuser/elsewhere was not found.', status: 404 });
    });

    it('should answer 409 when the repository is disabled', async () => {
      await ctx.store.updateRepository(repo.id, { hook: null, enabledByUserId: null });

      const outcome = await ctx.receiver.receive(delivery(fakeReleasePayload()));

      expect(outcome.body).toEqual({ message: 'This repository is not enabled for webhooks.', status: 409 });
    });

    it('should answer 403 when the hook was enabled by another user', async () => {
      seedConnectedUser(ctx, otherUser, 'other-token-id');
      await ctx.store.updateRepository(repo.id, { enabledByUserId: otherUser.id });

      const outcome = await ctx.receiver.receive(delivery(fakeReleasePayload()));

      expect(outcome.body).toEqual({
        message: 'The hook for testuser/project belongs to another user',
        status: 403,
      });
      expect(ctx.store.state.releases).toHaveLength(0);
    });

    it('should queue a kept release again when it is redelivered after a queueing failure', async () => {
      ctx.dispatcher.failWith = new Error('queue unavailable');

      const failed = await ctx.receiver.receive(delivery(fakeReleasePayload()));
      ctx.dispatcher.failWith = null;
      const redelivered = await ctx.receiver.receive(delivery(fakeReleasePayload()));

      expect(failed.body).toEqual({ message: 'queue unavailable', status: 500 });
      expect(ctx.store.state.releases).toHaveLength(1);
      expect(redelivered.status).toBe(409);
      expect(ctx.dispatcher.processReleaseJobs).toEqual([{ provider: FAKE_PROVIDER, releaseId: 'rel-1' }]);
    });

    it('should answer 500 and roll back on a storage failure', async () => {
      vi.spyOn(ctx.store, 'createRelease').mockRejectedValueOnce(new Error('connection reset'));

      const outcome = await ctx.receiver.receive(delivery(fakeReleasePayload()));

      expect(outcome.body).toEqual({ message: 'connection reset', status: 500 });
      expect(ctx.store.state.releases).toHaveLength(0);
      expect(ctx.store.state.events[0].responseCode).toBe(500);
    });
  });
});
