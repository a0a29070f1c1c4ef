import { and, desc, eq, inArray, isNull } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import * as schema from './schema';
import {
  vcsReleases,
  vcsRepositories,
  vcsRepositoryUsers,
  vcsWebhookEvents,
  type NewRelease,
  type NewRepository,
  type NewWebhookEvent,
  type Release,
  type ReleaseStatus,
  type Repository,
  type WebhookEvent,
  type WebhookResponseBody,
} from './schema';
import type { ReleasePatch, RepositoryLookup, RepositoryPatch, VcsStore } from '../services/store';
import { ReleaseAlreadyReceivedError, RepositoryNotFoundError } from '../services/vcs/errors';
import { NotFoundError } from '../lib/errors';

export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

const UNIQUE_VIOLATION = '23505';

/**
 * postgres-js raises PostgresError with the SQLSTATE in `code`
 */
export function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && error.code === UNIQUE_VIOLATION) {
    return true;
  }
  return 'cause' in error && isUniqueViolation(error.cause);
}

export class DrizzleVcsStore implements VcsStore {
  constructor(
    private readonly executor: Executor,
    private readonly inTransaction = false
  ) {}

  async transaction<T>(fn: (tx: VcsStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return fn(this);
    }
    return this.executor.transaction((tx) => fn(new DrizzleVcsStore(tx, true)));
  }

  // ============================================================================
  // Repositories
  // ============================================================================

  async getRepository(provider: string, lookup: RepositoryLookup): Promise<Repository | null> {
    const match = 'providerId' in lookup
      ? eq(vcsRepositories.providerId, lookup.providerId)
      : eq(vcsRepositories.fullName, lookup.fullName);

    const [repo] = await this.executor
      .select()
      .from(vcsRepositories)
      .where(and(eq(vcsRepositories.provider, provider), match))
      .limit(1);
    return repo ?? null;
  }

  async getRepositoryById(id: string): Promise<Repository | null> {
    const [repo] = await this.executor.select().from(vcsRepositories).where(eq(vcsRepositories.id, id)).limit(1);
    return repo ?? null;
  }

  async createRepository(data: NewRepository): Promise<Repository> {
    const [repo] = await this.executor.insert(vcsRepositories).values(data).returning();
    return repo;
  }

  async updateRepository(id: string, patch: RepositoryPatch): Promise<Repository> {
    const [repo] = await this.executor
      .update(vcsRepositories)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(vcsRepositories.id, id))
      .returning();
    if (!repo) {
      throw new RepositoryNotFoundError(id);
    }
    return repo;
  }

  async listUserRepositories(provider: string, userId: string): Promise<Repository[]> {
    const rows = await this.executor
      .select({ repository: vcsRepositories })
      .from(vcsRepositories)
      .innerJoin(vcsRepositoryUsers, eq(vcsRepositoryUsers.repositoryId, vcsRepositories.id))
      .where(
        and(
          eq(vcsRepositories.provider, provider),
          eq(vcsRepositoryUsers.userId, userId),
          isNull(vcsRepositoryUsers.revokedAt)
        )
      );
    return rows.map((row) => row.repository);
  }

  async listRepositoriesEnabledBy(provider: string, userId: string): Promise<Repository[]> {
    return this.executor
      .select()
      .from(vcsRepositories)
      .where(and(eq(vcsRepositories.provider, provider), eq(vcsRepositories.enabledByUserId, userId)));
  }

  // ============================================================================
  // Repository users
  // ============================================================================

  async listRepositoryUserIds(repositoryId: string): Promise<string[]> {
    const rows = await this.executor
      .select({ userId: vcsRepositoryUsers.userId })
      .from(vcsRepositoryUsers)
      .where(and(eq(vcsRepositoryUsers.repositoryId, repositoryId), isNull(vcsRepositoryUsers.revokedAt)));
    return rows.map((row) => row.userId);
  }

  async addRepositoryUser(repositoryId: string, userId: string): Promise<void> {
    const now = new Date();
    await this.executor
      .insert(vcsRepositoryUsers)
      .values({ repositoryId, userId })
      .onConflictDoUpdate({
        target: [vcsRepositoryUsers.repositoryId, vcsRepositoryUsers.userId],
        set: { revokedAt: null, createdAt: now, updatedAt: now },
      });
  }

  async revokeRepositoryUser(repositoryId: string, userId: string): Promise<void> {
    const now = new Date();
    await this.executor
      .update(vcsRepositoryUsers)
      .set({ revokedAt: now, updatedAt: now })
      .where(
        and(
          eq(vcsRepositoryUsers.repositoryId, repositoryId),
          eq(vcsRepositoryUsers.userId, userId),
          isNull(vcsRepositoryUsers.revokedAt)
        )
      );
  }

  // ============================================================================
  // Releases
  // ============================================================================

  async createRelease(data: NewRelease): Promise<Release> {
    try {
      const [release] = await this.executor.insert(vcsReleases).values(data).returning();
      return release;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ReleaseAlreadyReceivedError(data.providerId);
      }
      throw error;
    }
  }

  async getRelease(provider: string, providerId: string): Promise<Release | null> {
    const [release] = await this.executor
      .select()
      .from(vcsReleases)
      .where(and(eq(vcsReleases.provider, provider), eq(vcsReleases.providerId, providerId)))
      .limit(1);
    return release ?? null;
  }

  async getReleaseInStatus(provider: string, providerId: string, statuses: ReleaseStatus[]): Promise<Release | null> {
    const [release] = await this.executor
      .select()
      .from(vcsReleases)
      .where(
        and(
          eq(vcsReleases.provider, provider),
          eq(vcsReleases.providerId, providerId),
          inArray(vcsReleases.status, statuses)
        )
      )
      .limit(1);
    return release ?? null;
  }

  async updateRelease(id: string, patch: ReleasePatch): Promise<Release> {
    const [release] = await this.executor
      .update(vcsReleases)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(vcsReleases.id, id))
      .returning();
    if (!release) {
      throw new NotFoundError(`Release ${id} not found`);
    }
    return release;
  }

  async getLatestRelease(repositoryId: string, status?: ReleaseStatus): Promise<Release | null> {
    const [release] = await this.executor
      .select()
      .from(vcsReleases)
      .where(
        status
          ? and(eq(vcsReleases.repositoryId, repositoryId), eq(vcsReleases.status, status))
          : eq(vcsReleases.repositoryId, repositoryId)
      )
      .orderBy(desc(vcsReleases.createdAt))
      .limit(1);
    return release ?? null;
  }

  async listReleases(repositoryId: string): Promise<Release[]> {
    return this.executor
      .select()
      .from(vcsReleases)
      .where(eq(vcsReleases.repositoryId, repositoryId))
      .orderBy(desc(vcsReleases.createdAt));
  }

  // ============================================================================
  // Webhook events
  // ============================================================================

  async createWebhookEvent(data: NewWebhookEvent): Promise<WebhookEvent> {
    const [event] = await this.executor.insert(vcsWebhookEvents).values(data).returning();
    return event;
  }

  async getWebhookEvent(id: string): Promise<WebhookEvent | null> {
    const [event] = await this.executor.select().from(vcsWebhookEvents).where(eq(vcsWebhookEvents.id, id)).limit(1);
    return event ?? null;
  }

  async setWebhookEventResponse(id: string, responseCode: number, response: WebhookResponseBody): Promise<void> {
    await this.executor
      .update(vcsWebhookEvents)
      .set({ responseCode, response, updatedAt: new Date() })
      .where(eq(vcsWebhookEvents.id, id));
  }
}
