/**
 * VCS Routes
 * Connect provider accounts, sync and enable/disable repositories
 */

import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticateUser, requireUserId } from '../../../middleware/auth';
import { NotFoundError, paginate, parsePagination, sendData, sendPaginatedData } from '../../../lib';
import type { Release, Repository } from '../../../db/schema';
import type { VcsServiceDeps } from '../../../services/vcs.service';
import { VersionControlService } from '../../../services/vcs.service';
import { connectAccount, disconnectHandler } from '../../../services/account.service';
import {
  getProvider,
  getRegisteredProviders,
  hasProvider,
  RepositoryNotFoundError,
  type RepositoryProviderFactory,
} from '../../../services/vcs';

// Schemas
const ProviderParamsSchema = z.object({
  provider: z.string().min(1),
});

const RepositoryParamsSchema = ProviderParamsSchema.extend({
  repositoryId: z.string().min(1),
});

const ConnectBodySchema = z.object({
  accessToken: z.string().min(1),
});

const SyncBodySchema = z
  .object({
    hooks: z.boolean().default(true),
  })
  .default({});

// ============================================================================
// Serializers
// ============================================================================

function serializeRelease(release: Release) {
  return {
    id: release.providerId,
    tag: release.tag,
    status: release.status,
    recordId: release.recordId,
    errors: release.errors,
    createdAt: release.createdAt.toISOString(),
    updatedAt: release.updatedAt.toISOString(),
  };
}

function serializeRepository(factory: RepositoryProviderFactory, repo: Repository) {
  return {
    id: repo.providerId,
    fullName: repo.fullName,
    defaultBranch: repo.defaultBranch,
    description: repo.description,
    license: repo.licenseSpdx,
    htmlUrl: repo.htmlUrl ?? factory.urlForRepository(repo.fullName),
    enabled: repo.hook !== null,
    enabledByUserId: repo.enabledByUserId,
  };
}

/**
 * Resolve the provider named in the path
 * @throws NotFoundError for ids that are not registered
 */
function resolveProvider(providerId: string): RepositoryProviderFactory {
  if (!hasProvider(providerId)) {
    throw new NotFoundError(`Unknown provider: ${providerId}`);
  }
  return getProvider(providerId);
}

export type VcsRoutesOptions = {
  deps: VcsServiceDeps;
};

export async function vcsRoutes(fastify: FastifyInstance, opts: VcsRoutesOptions) {
  const { deps } = opts;

  fastify.addHook('preHandler', authenticateUser);

  const serviceFor = (providerId: string, userId: string) => {
    resolveProvider(providerId);
    return VersionControlService.forProviderAndUser(providerId, userId, deps);
  };

  /**
   * GET /v1/vcs
   * Providers enabled on this deployment
   */
  fastify.get('/', async (request, reply) => {
    return sendData(
      reply,
      getRegisteredProviders().map((factory) => ({
        ...factory.vocabulary,
        description: factory.description,
        baseUrl: factory.baseUrl,
        newRepositoryUrl: factory.urlForNewRepo(),
      })),
      { requestId: request.id }
    );
  });

  /**
   * POST /v1/vcs/:provider
   * Store the OAuth token, initialize the account and run a first sync
   */
  fastify.post('/:provider', async (request, reply) => {
    const userId = requireUserId(request);
    const { provider } = ProviderParamsSchema.parse(request.params);
    const body = ConnectBodySchema.parse(request.body);
    resolveProvider(provider);

    const result = await connectAccount(provider, userId, body.accessToken, deps);
    return sendData(reply, result, { status: 201, requestId: request.id });
  });

  /**
   * DELETE /v1/vcs/:provider
   * Disconnect the account; hooks are removed in the background
   */
  fastify.delete('/:provider', async (request, reply) => {
    const userId = requireUserId(request);
    const { provider } = ProviderParamsSchema.parse(request.params);
    resolveProvider(provider);

    await disconnectHandler(provider, userId, deps);
    return reply.status(204).send();
  });

  /**
   * POST /v1/vcs/:provider/repositories/sync
   */
  fastify.post('/:provider/repositories/sync', async (request, reply) => {
    const userId = requireUserId(request);
    const { provider } = ProviderParamsSchema.parse(request.params);
    const { hooks } = SyncBodySchema.parse(request.body ?? {});

    const svc = serviceFor(provider, userId);
    await svc.sync({ hooks, asyncHooks: true });
    return sendData(reply, { lastSync: await svc.getLastSyncTime() }, { requestId: request.id });
  });

  /**
   * GET /v1/vcs/:provider/repositories?limit=&offset=
   * Sorted by full name
   */
  fastify.get('/:provider/repositories', async (request, reply) => {
    const userId = requireUserId(request);
    const { provider } = ProviderParamsSchema.parse(request.params);
    const query = parsePagination(request.query);

    const svc = serviceFor(provider, userId);
    const listings = await svc.listRepositories();
    listings.sort((a, b) => a.repository.fullName.localeCompare(b.repository.fullName));
    const { page, meta } = paginate(listings, query);

    return sendPaginatedData(
      reply,
      page.map(({ repository, latestRelease }) => ({
        ...serializeRepository(svc.provider.factory, repository),
        latestRelease: latestRelease ? serializeRelease(latestRelease) : null,
      })),
      meta,
      { requestId: request.id }
    );
  });

  /**
   * GET /v1/vcs/:provider/repositories/:repositoryId
   */
  fastify.get('/:provider/repositories/:repositoryId', async (request, reply) => {
    const userId = requireUserId(request);
    const { provider, repositoryId } = RepositoryParamsSchema.parse(request.params);

    const svc = serviceFor(provider, userId);
    const repository = await svc.getRepository({ providerId: repositoryId });
    const releases = await svc.listRepoReleases(repository);
    const factory = svc.provider.factory;

    return sendData(
      reply,
      {
        ...serializeRepository(factory, repository),
        newReleaseUrl: factory.urlForNewRelease(repository.fullName),
        releases: releases.map(serializeRelease),
      },
      { requestId: request.id }
    );
  });

  /**
   * POST /v1/vcs/:provider/repositories/:repositoryId/enable
   */
  fastify.post('/:provider/repositories/:repositoryId/enable', async (request, reply) => {
    const userId = requireUserId(request);
    const { provider, repositoryId } = RepositoryParamsSchema.parse(request.params);

    const svc = serviceFor(provider, userId);
    if (!(await svc.enableRepository(repositoryId))) {
      throw new RepositoryNotFoundError(repositoryId);
    }
    return sendData(reply, { id: repositoryId, enabled: true }, { requestId: request.id });
  });

  /**
   * POST /v1/vcs/:provider/repositories/:repositoryId/disable
   */
  fastify.post('/:provider/repositories/:repositoryId/disable', async (request, reply) => {
    const userId = requireUserId(request);
    const { provider, repositoryId } = RepositoryParamsSchema.parse(request.params);

    const svc = serviceFor(provider, userId);
    if (!(await svc.disableRepository(repositoryId))) {
      throw new RepositoryNotFoundError(repositoryId);
    }
    return sendData(reply, { id: repositoryId, enabled: false }, { requestId: request.id });
  });
}
