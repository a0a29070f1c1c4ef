/**
 * GitLab VCS Provider
 *
 * Works against gitlab.com and self-managed instances. Repositories are
 * "projects" in GitLab's vocabulary.
 */

import { timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { RepositoryProvider, RepositoryProviderFactory, headerValue } from '../base.provider';
import type { RemoteAccountStore } from '../../store';
import type {
  GenericContributor,
  GenericOwner,
  GenericReleaseEvent,
  GenericRepository,
  GenericUser,
  GenericWebhook,
  IncomingHeaders,
  ProviderDescriptor,
} from '../types';
import { VcsTokenNotFound } from '../errors';
import { GitLabApiClient, MAINTAINER_ACCESS, type GitLabHookData } from './gitlab.api-client';

// ============================================================================
// Configuration
// ============================================================================

export interface GitLabConfig {
  /** Sent by GitLab as X-Gitlab-Token; empty disables the check */
  sharedValidationToken: string;
  /** Ignore releases whose release date lies in the future */
  skipUpcomingReleases: boolean;
  /** Shown in the hook description */
  siteName: string;
}

export type GitLabFactoryOptions = Partial<Pick<ProviderDescriptor, 'id' | 'name' | 'description' | 'credentialsKey'>> & {
  baseUrl: string;
  webhookReceiverUrl: string;
  config: GitLabConfig;
};

const gitLabConfigOverrideSchema = z
  .object({
    shared_validation_token: z.string().optional(),
    skip_upcoming_releases: z.boolean().optional(),
  })
  .strict()
  .transform((value) => {
    const parsed: Partial<GitLabConfig> = {};
    if (value.shared_validation_token !== undefined) parsed.sharedValidationToken = value.shared_validation_token;
    if (value.skip_upcoming_releases !== undefined) parsed.skipUpcomingReleases = value.skip_upcoming_releases;
    return parsed;
  });

// ============================================================================
// Webhook payloads
// ============================================================================

const projectSchema = z.object({
  id: z.union([z.number(), z.string()]),
  path_with_namespace: z.string(),
  default_branch: z.string().nullish(),
  web_url: z.string(),
  description: z.string().nullish(),
  license: z.object({ key: z.string() }).nullish(),
});

const releaseEventSchema = z.object({
  id: z.union([z.number(), z.string()]),
  tag: z.string(),
  url: z.string(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  created_at: z.string(),
  released_at: z.string().nullish(),
  assets: z
    .object({
      sources: z.array(z.object({ format: z.string(), url: z.string() })).default([]),
    })
    .default({ sources: [] }),
  project: projectSchema,
});

const eventKindSchema = z.object({
  object_kind: z.string().optional(),
  action: z.string().optional(),
  released_at: z.string().nullish(),
});

type ProjectLike = z.infer<typeof projectSchema>;

const DEFAULT_BRANCH = 'main';

function toGenericRepository(project: ProjectLike): GenericRepository {
  return {
    id: String(project.id),
    fullName: project.path_with_namespace,
    defaultBranch: project.default_branch ?? DEFAULT_BRANCH,
    htmlUrl: project.web_url,
    description: project.description ?? null,
    licenseSpdx: project.license ? project.license.key.toUpperCase() : null,
  };
}

// ============================================================================
// GitLab Provider Factory
// ============================================================================

export class GitLabProviderFactory extends RepositoryProviderFactory<GitLabConfig> {
  protected readonly configSchema = gitLabConfigOverrideSchema;

  constructor(accounts: RemoteAccountStore, options: GitLabFactoryOptions) {
    super(
      {
        id: options.id ?? 'gitlab',
        name: options.name ?? 'GitLab',
        description: options.description ?? 'Automatically archive your repositories',
        icon: 'gitlab',
        credentialsKey: options.credentialsKey ?? 'GITLAB_APP_CREDENTIALS',
        baseUrl: options.baseUrl,
        webhookReceiverUrl: options.webhookReceiverUrl,
        repositoryName: 'project',
        repositoryNamePlural: 'projects',
      },
      options.config,
      accounts
    );
  }

  /**
   * Only `release` events with action `create`. GitLab has no drafts but
   * does have upcoming releases (release date in the future).
   */
  webhookIsCreateReleaseEvent(payload: unknown, now: Date = new Date()): boolean {
    const parsed = eventKindSchema.safeParse(payload);
    if (!parsed.success) {
      return false;
    }

    const { object_kind, action, released_at } = parsed.data;
    if (object_kind !== 'release' || action !== 'create') {
      return false;
    }

    if (this.config.skipUpcomingReleases && released_at) {
      const releasedAt = new Date(released_at);
      if (releasedAt.getTime() > now.getTime()) {
        return false;
      }
    }
    return true;
  }

  webhookEventToGeneric(payload: unknown): GenericReleaseEvent {
    const event = releaseEventSchema.parse(payload);

    let zipballUrl: string | null = null;
    let tarballUrl: string | null = null;
    for (const source of event.assets.sources) {
      if (source.format === 'zip') {
        zipballUrl = source.url;
      } else if (source.format === 'tar') {
        tarballUrl = source.url;
      }
    }

    return {
      release: {
        id: String(event.id),
        tagName: event.tag,
        htmlUrl: event.url,
        name: event.name ?? null,
        body: event.description ?? null,
        zipballUrl,
        tarballUrl,
        createdAt: new Date(event.created_at),
        publishedAt: event.released_at ? new Date(event.released_at) : null,
      },
      repository: toGenericRepository(event.project),
    };
  }

  verifyWebhookRequest(headers: IncomingHeaders, _rawBody: string): boolean {
    const expected = this.config.sharedValidationToken;
    if (!expected) {
      return true;
    }

    const token = headerValue(headers, 'x-gitlab-token');
    if (!token) {
      return false;
    }
    const given = Buffer.from(token);
    const wanted = Buffer.from(expected);
    return given.length === wanted.length && timingSafeEqual(given, wanted);
  }

  urlForTag(repositoryName: string, tagName: string): string {
    return `${this.baseUrl}/${repositoryName}/-/tags/${tagName}`;
  }

  urlForNewRelease(repositoryName: string): string {
    return `${this.baseUrl}/${repositoryName}/-/releases/new`;
  }

  urlForNewFile(repositoryName: string, branchName: string, fileName: string): string {
    return `${this.baseUrl}/${repositoryName}/-/new/${branchName}/?file_name=${fileName}`;
  }

  urlForNewRepo(): string {
    return `${this.baseUrl}/projects/new`;
  }

  forUser(userId: string): GitLabProvider {
    return new GitLabProvider(this, userId);
  }

  forAccessToken(userId: string, accessToken: string): GitLabProvider {
    return new GitLabProvider(this, userId, accessToken);
  }
}

// ============================================================================
// GitLab Provider
// ============================================================================

export class GitLabProvider extends RepositoryProvider {
  private client: Promise<GitLabApiClient | null> | null = null;

  constructor(
    readonly factory: GitLabProviderFactory,
    userId: string,
    accessToken?: string
  ) {
    super(userId, accessToken);
  }

  private api(): Promise<GitLabApiClient | null> {
    if (!this.client) {
      this.client = this.getAccessToken().then((token) =>
        token ? new GitLabApiClient(token, this.factory.baseUrl) : null
      );
    }
    return this.client;
  }

  private async requireApi(): Promise<GitLabApiClient> {
    const api = await this.api();
    if (!api) {
      throw new VcsTokenNotFound(this.userId, this.factory.id);
    }
    return api;
  }

  // ============================================================================
  // Projects
  // ============================================================================

  async listRepositories(): Promise<Map<string, GenericRepository> | null> {
    const api = await this.api();
    if (!api) {
      return null;
    }

    const repos = new Map<string, GenericRepository>();
    for (const project of await api.listProjects()) {
      // License needs one request per project, left out of the listing
      repos.set(String(project.id), { ...toGenericRepository(project), licenseSpdx: null });
    }
    return repos;
  }

  async getRepository(repositoryId: string): Promise<GenericRepository | null> {
    const api = await this.requireApi();
    const project = await api.getProject(repositoryId);
    return project ? toGenericRepository(project) : null;
  }

  async getRepositoryOwner(repositoryId: string): Promise<GenericOwner | null> {
    const api = await this.requireApi();
    const project = await api.getProject(repositoryId);
    if (!project) {
      return null;
    }

    const { namespace } = project;
    return {
      id: String(namespace.id),
      pathName: namespace.path,
      displayName: namespace.name,
      type: namespace.kind === 'user' ? 'person' : 'organization',
    };
  }

  /**
   * The contributors endpoint returns name, email and commit count only.
   * Accounts are matched by public email where possible.
   */
  async listRepositoryContributors(repositoryId: string, max: number): Promise<GenericContributor[] | null> {
    const api = await this.requireApi();
    const contributors = await api.listContributors(repositoryId, max);
    if (!contributors) {
      return null;
    }

    const result: GenericContributor[] = [];
    for (const contributor of contributors) {
      const [match] = await api.searchUsers(contributor.email);
      result.push(
        match
          ? {
              id: String(match.id),
              username: match.username,
              displayName: match.name,
              company: null,
              contributionsCount: contributor.commits,
            }
          : {
              id: contributor.email,
              username: contributor.email,
              displayName: contributor.name,
              company: null,
              contributionsCount: contributor.commits,
            }
      );
    }
    return result;
  }

  async listRepositoryUserIds(repositoryId: string): Promise<string[] | null> {
    const api = await this.requireApi();
    const members = await api.listMembers(repositoryId);
    if (!members) {
      return null;
    }
    return members.filter((m) => m.access_level >= MAINTAINER_ACCESS).map((m) => String(m.id));
  }

  async retrieveRemoteFile(repositoryId: string, ref: string, path: string): Promise<string | null> {
    const api = await this.requireApi();
    const file = await api.getFile(repositoryId, path, ref);
    if (!file) {
      return null;
    }
    return Buffer.from(file.content, file.encoding === 'base64' ? 'base64' : 'utf8').toString('utf8');
  }

  // ============================================================================
  // Hooks
  // ============================================================================

  async listRepositoryWebhooks(repositoryId: string): Promise<GenericWebhook[] | null> {
    const api = await this.requireApi();
    const hooks = await api.listHooks(repositoryId);
    if (!hooks) {
      return null;
    }
    return hooks.map((hook) => ({
      id: String(hook.id),
      repositoryId: String(hook.project_id),
      url: hook.url,
    }));
  }

  async createWebhook(repositoryId: string): Promise<string | null> {
    const api = await this.requireApi();
    const hooks = await api.listHooks(repositoryId);
    if (!hooks) {
      return null;
    }

    const url = await this.webhookUrl();
    const data: GitLabHookData = {
      url,
      token: this.factory.config.sharedValidationToken,
      releases_events: true,
      description: `Managed by ${this.factory.config.siteName}`,
    };

    const existing = hooks.find((hook) => hook.url === url);
    const hook = existing
      ? await api.updateHook(repositoryId, existing.id, data)
      : await api.createHook(repositoryId, data);

    return hook ? String(hook.id) : null;
  }

  async deleteWebhook(repositoryId: string, hookId?: string): Promise<boolean> {
    const api = await this.requireApi();

    let target = hookId;
    if (target === undefined) {
      const hook = await this.getFirstValidWebhook(repositoryId);
      if (!hook) {
        return true;
      }
      target = hook.id;
    }

    await api.deleteHook(repositoryId, target);
    return true;
  }

  // ============================================================================
  // Users and tokens
  // ============================================================================

  async getOwnUser(): Promise<GenericUser | null> {
    const api = await this.requireApi();
    const user = await api.getUser();
    if (!user) {
      return null;
    }
    return { id: String(user.id), username: user.username, displayName: user.name };
  }

  /**
   * GitLab revokes OAuth tokens through the OAuth server, not the API
   */
  async revokeToken(_accessToken: string): Promise<void> {
    return;
  }

  // ============================================================================
  // Release archives
  // ============================================================================

  async resolveReleaseZipballUrl(url: string): Promise<string> {
    return url;
  }

  protected async openReleaseZipball(url: string, signal: AbortSignal): Promise<Response> {
    const api = await this.requireApi();
    return fetch(url, { headers: api.authHeaders, redirect: 'follow', signal });
  }
}
