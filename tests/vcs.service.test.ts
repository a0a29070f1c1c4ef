import { describe, it, expect, vi, beforeEach } from 'vitest';
import { VersionControlService, diffRepository } from '../src/services/vcs.service';
import {
  RemoteAccountDataNotSet,
  RemoteAccountNotFound,
  RepositoryAccessError,
  RepositoryDisabledError,
  RepositoryNotFoundError,
  UserInfoNoneError,
} from '../src/services/vcs/errors';
import { getProvider } from '../src/services/vcs';
import { createTestContext, mockUser, otherUser, seedConnectedUser, type TestContext } from './helpers/mocks';
import { FAKE_PROVIDER } from './helpers/fakeProvider';

const RECEIVER_PREFIX = 'https://archiver.test/v1/receivers/fake/events?access_token=';

describe('VersionControlService', () => {
  let ctx: TestContext;
  let service: VersionControlService;

  beforeEach(() => {
    ctx = createTestContext();
    seedConnectedUser(ctx);
    ctx.remote.addRepository({ id: '42', fullName: 'testuser/project', description: 'A project' }, [mockUser.remoteId]);
    ctx.remote.grant(mockUser.id, '42');
    service = VersionControlService.forProviderAndUser(FAKE_PROVIDER, mockUser.id, ctx);
  });

  async function localRepo(providerId: string) {
    const repo = await ctx.store.getRepository(FAKE_PROVIDER, { providerId });
    if (!repo) {
      throw new Error(`repository ${providerId} missing`);
    }
    return repo;
  }

  describe('isAuthenticated', () => {
    it('should be true with a stored token', async () => {
      expect(await service.isAuthenticated()).toBe(true);
    });

    it('should be false without one', async () => {
      ctx.accounts.seed(otherUser.id, FAKE_PROVIDER, { accessToken: null });
      const other = VersionControlService.forProviderAndUser(FAKE_PROVIDER, otherUser.id, ctx);

      expect(await other.isAuthenticated()).toBe(false);
    });
  });

  describe('sync', () => {
    it('should create remote repositories with the user as member', async () => {
      await service.sync();

      const repo = await localRepo('42');
      expect(repo).toMatchObject({
        provider: FAKE_PROVIDER,
        fullName: 'testuser/project',
        defaultBranch: 'main',
        htmlUrl: 'https://forge.test/testuser/project',
        description: 'A project',
        hook: null,
        enabledByUserId: null,
      });
      expect((await service.userAvailableRepositories()).map((r) => r.providerId)).toEqual(['42']);
    });

    it('should make every remote repository available without enabling any', async () => {
      ctx.remote.addRepository({ id: '43', fullName: 'testuser/second' }, [mockUser.remoteId]);
      ctx.remote.addRepository({ id: '44', fullName: 'testuser/third' }, [mockUser.remoteId]);
      ctx.remote.grant(mockUser.id, '43', '44');

      await service.sync();

      expect(await service.userAvailableRepositories()).toHaveLength(3);
      expect(await service.userEnabledRepositories()).toHaveLength(0);
    });

    it('should store the repository snapshot and sync time on the account', async () => {
      await service.sync();

      const account = await ctx.accounts.getRemoteAccount(mockUser.id, FAKE_PROVIDER);
      expect(account?.extraData.repos).toEqual({
        '42': { id: '42', fullName: 'testuser/project', defaultBranch: 'main' },
      });
      expect(account?.extraData.tokens).toEqual({ webhook: 'webhook-token-id' });
      expect(await service.getLastSyncTime()).toBe(account?.extraData.lastSync);
    });

    it('should queue hook reconciliation by default', async () => {
      await service.sync();

      expect(ctx.dispatcher.syncHooksJobs).toEqual([
        { provider: FAKE_PROVIDER, userId: mockUser.id, repositoryIds: ['42'] },
      ]);
    });

    it('should skip hooks when asked to', async () => {
      await service.sync({ hooks: false });

      expect(ctx.dispatcher.syncHooksJobs).toEqual([]);
    });

    it('should reconcile hooks inline when not async', async () => {
      const hook = ctx.remote.addHook('42', `${RECEIVER_PREFIX}abc`);

      await service.sync({ asyncHooks: false });

      expect(ctx.dispatcher.syncHooksJobs).toEqual([]);
      expect(await localRepo('42')).toMatchObject({ hook: hook.id, enabledByUserId: mockUser.id });
    });

    it('should overwrite local metadata with the remote one', async () => {
      await service.sync({ hooks: false });
      ctx.remote.addRepository({ id: '42', fullName: 'testuser/renamed', description: 'Renamed', defaultBranch: 'trunk' }, [
        mockUser.remoteId,
      ]);

      await service.sync({ hooks: false });

      expect(await localRepo('42')).toMatchObject({
        fullName: 'testuser/renamed',
        description: 'Renamed',
        defaultBranch: 'trunk',
      });
    });

    it('should revoke membership of repositories no longer administered', async () => {
      await service.sync({ hooks: false });
      ctx.remote.userRepos.set(mockUser.id, []);

      await service.sync({ hooks: false });

      expect(await service.userAvailableRepositories()).toEqual([]);
      expect(ctx.store.state.repositories).toHaveLength(1);
    });

    it('should disable repositories the user enabled and lost', async () => {
      await service.sync({ hooks: false });
      const repo = await localRepo('42');
      await ctx.store.updateRepository(repo.id, { hook: '100', enabledByUserId: mockUser.id });
      ctx.remote.userRepos.set(mockUser.id, []);

      await service.sync({ hooks: false });

      expect(await localRepo('42')).toMatchObject({ hook: null, enabledByUserId: null });
    });

    it('should add every linked admin as member', async () => {
      seedConnectedUser(ctx, otherUser, 'other-token-id');
      ctx.remote.admins.set('42', [mockUser.remoteId, otherUser.remoteId, '9999']);

      await service.sync({ hooks: false });

      const repo = await localRepo('42');
      expect((await ctx.store.listRepositoryUserIds(repo.id)).sort()).toEqual([mockUser.id, otherUser.id].sort());
    });

    it('should do nothing without a provider session', async () => {
      ctx.accounts.seed(otherUser.id, FAKE_PROVIDER, { accessToken: null });
      const other = VersionControlService.forProviderAndUser(FAKE_PROVIDER, otherUser.id, ctx);

      await other.sync();

      expect(ctx.store.state.repositories).toEqual([]);
      expect(ctx.dispatcher.syncHooksJobs).toEqual([]);
    });

    it('should throw RemoteAccountNotFound for a token without account', async () => {
      const other = new VersionControlService(getProvider(FAKE_PROVIDER).forAccessToken(otherUser.id, 'test-access-token'), ctx);

      await expect(other.sync()).rejects.toThrow(RemoteAccountNotFound);
    });
  });

  describe('getLastSyncTime', () => {
    it('should throw before the first sync', async () => {
      await expect(service.getLastSyncTime()).rejects.toThrow(RemoteAccountDataNotSet);
    });
  });

  describe('hooks', () => {
    it('should create and enable a repository found through its hook', async () => {
      ctx.remote.addRepository({ id: '43', fullName: 'team/tool' }, [mockUser.remoteId]);
      const hook = ctx.remote.addHook('43', `${RECEIVER_PREFIX}abc`);

      await service.syncRepoHook('43');

      const repo = await localRepo('43');
      expect(repo).toMatchObject({ fullName: 'team/tool', hook: hook.id, enabledByUserId: mockUser.id });
      expect(await ctx.store.listRepositoryUserIds(repo.id)).toEqual([mockUser.id]);
    });

    it('should disable a repository whose hook is gone', async () => {
      await service.sync({ hooks: false });
      const repo = await localRepo('42');
      await ctx.store.updateRepository(repo.id, { hook: '100', enabledByUserId: mockUser.id });

      await service.syncRepoHook('42');

      expect(await localRepo('42')).toMatchObject({ hook: null, enabledByUserId: null });
    });

    it('should ignore hooks pointing at another host', async () => {
      await service.sync({ hooks: false });
      ctx.remote.addHook('42', 'https://ci.example.com/hook');

      await service.syncRepoHook('42');

      expect((await localRepo('42')).hook).toBeNull();
    });

    it('should skip repositories that cannot be found and continue', async () => {
      await service.sync({ hooks: false });
      ctx.remote.addRepository({ id: '43', fullName: 'team/tool' });
      ctx.remote.addHook('43', `${RECEIVER_PREFIX}abc`);
      const hook = ctx.remote.addHook('42', `${RECEIVER_PREFIX}abc`);
      vi.spyOn(service.provider, 'getRepository').mockResolvedValue(null);

      await service.syncRepoHooks(['43', '42']);

      expect(await ctx.store.getRepository(FAKE_PROVIDER, { providerId: '43' })).toBeNull();
      expect((await localRepo('42')).hook).toBe(hook.id);
    });
  });

  describe('access', () => {
    beforeEach(async () => {
      await service.sync({ hooks: false });
    });

    it('should allow repositories in the last sync snapshot', async () => {
      const repo = await service.getRepository({ providerId: '42' });
      expect(repo.fullName).toBe('testuser/project');
    });

    it('should allow repositories the user enabled', async () => {
      const repo = await ctx.store.createRepository({
        provider: FAKE_PROVIDER,
        providerId: '50',
        fullName: 'testuser/legacy',
        defaultBranch: 'main',
        hook: '7',
        enabledByUserId: mockUser.id,
      });

      expect(await service.checkRepoAccessPermissions(repo)).toBe(true);
    });

    it('should refuse other repositories', async () => {
      await ctx.store.createRepository({
        provider: FAKE_PROVIDER,
        providerId: '99',
        fullName: 'someone/else',
        defaultBranch: 'main',
      });

      await expect(service.getRepository({ fullName: 'someone/else' })).rejects.toThrow(RepositoryAccessError);
    });

    it('should throw RepositoryNotFoundError for unknown repositories', async () => {
      await expect(service.getRepository({ providerId: '404' })).rejects.toThrow(
        'The repository 404 was not found.'
      );
    });

    it('should list repositories with their latest release', async () => {
      const repo = await localRepo('42');
      await ctx.store.createRelease({
        provider: FAKE_PROVIDER,
        providerId: 'rel-1',
        tag: 'v1.0.0',
        repositoryId: repo.id,
        createdAt: new Date('2024-01-01T00:00:00Z'),
      });
      const latest = await ctx.store.createRelease({
        provider: FAKE_PROVIDER,
        providerId: 'rel-2',
        tag: 'v1.1.0',
        repositoryId: repo.id,
        createdAt: new Date('2024-02-01T00:00:00Z'),
      });

      const [listing] = await service.listRepositories();

      expect(listing.repository.id).toBe(repo.id);
      expect(listing.latestRelease?.id).toBe(latest.id);
      expect(await service.getRepoLatestRelease(repo)).toBeNull();
      expect((await service.listRepoReleases(repo)).map((r) => r.tag)).toEqual(['v1.1.0', 'v1.0.0']);
    });

    it('should return the default branch of an available repository', async () => {
      expect(await service.getRepoDefaultBranch('42')).toBe('main');
      expect(await service.getRepoDefaultBranch('99')).toBeNull();
    });
  });

  describe('initAccount', () => {
    beforeEach(() => {
      ctx = createTestContext();
      service = VersionControlService.forProviderAndUser(FAKE_PROVIDER, mockUser.id, ctx);
    });

    it('should cache the profile, issue a webhook token id and link the identity', async () => {
      ctx.accounts.seed(mockUser.id, FAKE_PROVIDER);
      ctx.remote.users.set(mockUser.id, { id: '5001', username: 'testuser', displayName: 'Test User' });

      await service.initAccount();

      const account = await ctx.accounts.getRemoteAccount(mockUser.id, FAKE_PROVIDER);
      expect(account?.extraData).toMatchObject({ version: 1, id: '5001', login: 'testuser', name: 'Test User' });
      expect(account?.extraData.tokens?.webhook).toMatch(/^[0-9a-f-]{36}$/);
      expect(ctx.accounts.identities).toEqual([{ userId: mockUser.id, method: FAKE_PROVIDER, externalId: '5001' }]);
    });

    it('should throw UserInfoNoneError without a profile', async () => {
      ctx.accounts.seed(mockUser.id, FAKE_PROVIDER);

      await expect(service.initAccount()).rejects.toThrow(UserInfoNoneError);
    });

    it('should throw RemoteAccountNotFound without an account', async () => {
      await expect(service.initAccount()).rejects.toThrow(RemoteAccountNotFound);
    });
  });

  describe('enable and disable', () => {
    beforeEach(async () => {
      await service.sync({ hooks: false });
    });

    it('should install the hook and mark the repository enabled', async () => {
      expect(await service.enableRepository('42')).toBe(true);

      const [hook] = ctx.remote.hooks.get('42') ?? [];
      expect(hook.url.startsWith(RECEIVER_PREFIX)).toBe(true);
      expect(await localRepo('42')).toMatchObject({ hook: hook.id, enabledByUserId: mockUser.id });
      expect((await service.userEnabledRepositories()).map((r) => r.providerId)).toEqual(['42']);
    });

    it('should return false when the provider cannot create the hook', async () => {
      ctx.remote.repos.delete('42');

      expect(await service.enableRepository('42')).toBe(false);
      expect((await localRepo('42')).hook).toBeNull();
    });

    it('should refuse repositories the user does not administer', async () => {
      await expect(service.enableRepository('77')).rejects.toThrow(RepositoryNotFoundError);
    });

    it('should remove the hook and mark the repository disabled', async () => {
      await service.enableRepository('42');

      expect(await service.disableRepository('42')).toBe(true);
      expect(ctx.remote.deletedHooks).toEqual([{ repositoryId: '42', hookId: '100' }]);
      expect(await localRepo('42')).toMatchObject({ hook: null, enabledByUserId: null });
    });

    it('should throw RepositoryDisabledError when no hook is recorded', async () => {
      await expect(service.disableRepository('42')).rejects.toThrow(RepositoryDisabledError);
    });
  });
});

describe('diffRepository', () => {
  it('should return only the changed fields', () => {
    const now = new Date();
    const local = {
      id: 'r1',
      provider: FAKE_PROVIDER,
      providerId: '42',
      fullName: 'a/b',
      defaultBranch: 'main',
      htmlUrl: 'https://forge.test/a/b',
      description: null,
      licenseSpdx: 'MIT',
      hook: null,
      enabledByUserId: null,
      createdAt: now,
      updatedAt: now,
    };

    expect(
      diffRepository(local, {
        id: '42',
        fullName: 'a/b',
        defaultBranch: 'main',
        htmlUrl: 'https://forge.test/a/b',
        description: 'New',
        licenseSpdx: null,
      })
    ).toEqual({ description: 'New', licenseSpdx: null });
    expect(
      diffRepository(local, {
        id: '42',
        fullName: 'a/b',
        defaultBranch: 'main',
        htmlUrl: 'https://forge.test/a/b',
        description: null,
        licenseSpdx: 'MIT',
      })
    ).toBeNull();
  });
});
