/**
 * GitHub VCS Provider
 *
 * Factory (payload normalization, signature check, URLs) and per-user provider
 * for github.com and GitHub Enterprise.
 */

import { createHmac, timingSafeEqual } from 'crypto';
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
import { ReleaseZipballFetchError, VcsTokenNotFound } from '../errors';
import { GitHubApiClient, type GitHubHookConfig, type GitHubLicense, type GitHubRepo } from './github.api-client';
import { logger } from '../../../utils/sharedLogger';

// ============================================================================
// Configuration
// ============================================================================

export interface GitHubConfig {
  apiBaseUrl: string;
  /** HMAC secret set on every hook; empty disables signature checks */
  sharedSecret: string;
  insecureSsl: boolean;
  clientId?: string;
  clientSecret?: string;
}

export type GitHubFactoryOptions = Partial<Pick<ProviderDescriptor, 'id' | 'name' | 'description' | 'credentialsKey'>> & {
  baseUrl: string;
  webhookReceiverUrl: string;
  config: GitHubConfig;
};

const gitHubConfigOverrideSchema = z
  .object({
    shared_secret: z.string().optional(),
    insecure_ssl: z.boolean().optional(),
    api_base_url: z.string().url().optional(),
  })
  .strict()
  .transform((value) => {
    const parsed: Partial<GitHubConfig> = {};
    if (value.shared_secret !== undefined) parsed.sharedSecret = value.shared_secret;
    if (value.insecure_ssl !== undefined) parsed.insecureSsl = value.insecure_ssl;
    if (value.api_base_url !== undefined) parsed.apiBaseUrl = value.api_base_url;
    return parsed;
  });

const HOOK_EVENTS = ['release'];
const CREATE_RELEASE_ACTIONS = new Set(['published', 'released', 'created']);

// ============================================================================
// Webhook payloads
// ============================================================================

const licenseSchema = z.object({ spdx_id: z.string().nullish() }).nullish();

const releaseEventSchema = z.object({
  action: z.string(),
  release: z.object({
    id: z.union([z.number(), z.string()]),
    tag_name: z.string(),
    name: z.string().nullish(),
    body: z.string().nullish(),
    html_url: z.string(),
    tarball_url: z.string().nullish(),
    zipball_url: z.string().nullish(),
    created_at: z.string(),
    published_at: z.string().nullish(),
    draft: z.boolean().nullish(),
  }),
  repository: z.object({
    id: z.union([z.number(), z.string()]),
    full_name: z.string(),
    html_url: z.string(),
    description: z.string().nullish(),
    default_branch: z.string(),
    license: licenseSchema,
  }),
});

const eventKindSchema = z.object({
  action: z.string().optional(),
  release: z.object({ draft: z.boolean().nullish() }).passthrough().optional(),
});

/**
 * GitHub reports "other" licenses as NOASSERTION
 */
function extractLicense(license: Partial<Pick<GitHubLicense, 'spdx_id'>> | null | undefined): string | null {
  const spdx = license?.spdx_id;
  if (!spdx || spdx === 'NOASSERTION') {
    return null;
  }
  return spdx;
}

function toGenericRepository(repo: GitHubRepo): GenericRepository {
  return {
    id: String(repo.id),
    fullName: repo.full_name,
    defaultBranch: repo.default_branch,
    htmlUrl: repo.html_url,
    description: repo.description,
    licenseSpdx: extractLicense(repo.license),
  };
}

// ============================================================================
// GitHub Provider Factory
// ============================================================================

export class GitHubProviderFactory extends RepositoryProviderFactory<GitHubConfig> {
  protected readonly configSchema = gitHubConfigOverrideSchema;

  constructor(accounts: RemoteAccountStore, options: GitHubFactoryOptions) {
    super(
      {
        id: options.id ?? 'github',
        name: options.name ?? 'GitHub',
        description: options.description ?? 'Automatically archive your repositories',
        icon: 'github',
        credentialsKey: options.credentialsKey ?? 'GITHUB_APP_CREDENTIALS',
        baseUrl: options.baseUrl,
        webhookReceiverUrl: options.webhookReceiverUrl,
        repositoryName: 'repository',
        repositoryNamePlural: 'repositories',
      },
      options.config,
      accounts
    );
  }

  webhookIsCreateReleaseEvent(payload: unknown): boolean {
    const parsed = eventKindSchema.safeParse(payload);
    if (!parsed.success || !parsed.data.action) {
      return false;
    }
    // Drafts never become records
    return CREATE_RELEASE_ACTIONS.has(parsed.data.action) && !parsed.data.release?.draft;
  }

  webhookEventToGeneric(payload: unknown): GenericReleaseEvent {
    const { release, repository } = releaseEventSchema.parse(payload);

    return {
      release: {
        id: String(release.id),
        tagName: release.tag_name,
        name: release.name ?? null,
        body: release.body ?? null,
        htmlUrl: release.html_url,
        tarballUrl: release.tarball_url ?? null,
        zipballUrl: release.zipball_url ?? null,
        createdAt: new Date(release.created_at),
        publishedAt: release.published_at ? new Date(release.published_at) : null,
      },
      repository: {
        id: String(repository.id),
        fullName: repository.full_name,
        defaultBranch: repository.default_branch,
        htmlUrl: repository.html_url,
        description: repository.description ?? null,
        licenseSpdx: extractLicense(repository.license),
      },
    };
  }

  /**
   * Verify the `X-Hub-Signature-256` header (HMAC-SHA256 of the raw body)
   */
  verifyWebhookRequest(headers: IncomingHeaders, rawBody: string): boolean {
    const secret = this.config.sharedSecret;
    if (!secret) {
      return true;
    }

    const signature = headerValue(headers, 'x-hub-signature-256');
    if (!signature) {
      return false;
    }

    const expected = `sha256=${createHmac('sha256', secret).update(rawBody).digest('hex')}`;
    const given = Buffer.from(signature);
    const wanted = Buffer.from(expected);
    // timingSafeEqual throws on length mismatch
    return given.length === wanted.length && timingSafeEqual(given, wanted);
  }

  urlForTag(repositoryName: string, tagName: string): string {
    return `${this.baseUrl}/${repositoryName}/tree/${tagName}`;
  }

  urlForNewRelease(repositoryName: string): string {
    return `${this.baseUrl}/${repositoryName}/releases/new`;
  }

  urlForNewFile(repositoryName: string, branchName: string, fileName: string): string {
    return `${this.baseUrl}/${repositoryName}/new/${branchName}?filename=${fileName}`;
  }

  forUser(userId: string): GitHubProvider {
    return new GitHubProvider(this, userId);
  }

  forAccessToken(userId: string, accessToken: string): GitHubProvider {
    return new GitHubProvider(this, userId, accessToken);
  }
}

// ============================================================================
// GitHub Provider
// ============================================================================

export class GitHubProvider extends RepositoryProvider {
  private client: Promise<GitHubApiClient | null> | null = null;

  constructor(
    readonly factory: GitHubProviderFactory,
    userId: string,
    accessToken?: string
  ) {
    super(userId, accessToken);
  }

  /**
   * API client for the user's token, null when no token is stored
   */
  private api(): Promise<GitHubApiClient | null> {
    if (!this.client) {
      this.client = this.getAccessToken().then((token) =>
        token ? new GitHubApiClient(token, this.factory.config.apiBaseUrl) : null
      );
    }
    return this.client;
  }

  private async requireApi(): Promise<GitHubApiClient> {
    const api = await this.api();
    if (!api) {
      throw new VcsTokenNotFound(this.userId, this.factory.id);
    }
    return api;
  }

  // ============================================================================
  // Repositories
  // ============================================================================

  async listRepositories(): Promise<Map<string, GenericRepository> | null> {
    const api = await this.api();
    if (!api) {
      return null;
    }

    const repos = new Map<string, GenericRepository>();
    for (const repo of await api.listRepositories()) {
      if (repo.permissions?.admin) {
        repos.set(String(repo.id), toGenericRepository(repo));
      }
    }
    return repos;
  }

  async getRepository(repositoryId: string): Promise<GenericRepository | null> {
    const api = await this.requireApi();
    const repo = await api.getRepository(repositoryId);
    return repo ? toGenericRepository(repo) : null;
  }

  async getRepositoryOwner(repositoryId: string): Promise<GenericOwner | null> {
    const api = await this.requireApi();
    const repo = await api.getRepository(repositoryId);
    if (!repo) {
      return null;
    }

    return {
      id: String(repo.owner.id),
      pathName: repo.owner.login,
      type: repo.owner.type === 'User' ? 'person' : 'organization',
      // Not part of the repository payload
      displayName: null,
    };
  }

  async listRepositoryContributors(repositoryId: string, max: number): Promise<GenericContributor[] | null> {
    const api = await this.requireApi();
    const contributors = await api.listContributors(repositoryId, max);
    if (!contributors) {
      return null;
    }

    const result: GenericContributor[] = [];
    for (const contributor of contributors) {
      // Anonymous contributors have no account
      if (!contributor.login) {
        continue;
      }
      const profile = await api.getUserByLogin(contributor.login);
      result.push({
        id: String(profile?.id ?? contributor.id),
        username: contributor.login,
        displayName: profile?.name ?? null,
        company: profile?.company ?? null,
        contributionsCount: contributor.contributions,
      });
    }
    return result;
  }

  async listRepositoryUserIds(repositoryId: string): Promise<string[] | null> {
    const api = await this.requireApi();
    const collaborators = await api.listCollaborators(repositoryId);
    if (!collaborators) {
      return null;
    }
    return collaborators.filter((c) => c.permissions?.admin).map((c) => String(c.id));
  }

  async retrieveRemoteFile(repositoryId: string, ref: string, path: string): Promise<string | null> {
    const api = await this.requireApi();
    const file = await api.getFileContents(repositoryId, path, ref);
    if (!file || file.type !== 'file') {
      return null;
    }
    return Buffer.from(file.content, file.encoding === 'base64' ? 'base64' : 'utf8').toString('utf8');
  }

  // ============================================================================
  // Webhooks
  // ============================================================================

  async listRepositoryWebhooks(repositoryId: string): Promise<GenericWebhook[] | null> {
    const api = await this.requireApi();
    const hooks = await api.listHooks(repositoryId);
    if (!hooks) {
      return null;
    }
    return hooks.map((hook) => ({
      id: String(hook.id),
      repositoryId,
      url: hook.config.url ?? '',
    }));
  }

  async createWebhook(repositoryId: string): Promise<string | null> {
    const api = await this.requireApi();
    const hooks = await api.listHooks(repositoryId);
    if (!hooks) {
      return null;
    }

    const url = await this.webhookUrl();
    const hookConfig: GitHubHookConfig = {
      url,
      content_type: 'json',
      secret: this.factory.config.sharedSecret,
      insecure_ssl: this.factory.config.insecureSsl ? '1' : '0',
    };

    const existing = hooks.find((hook) => hook.config.url === url);
    const hook = existing
      ? await api.updateHook(repositoryId, existing.id, hookConfig, HOOK_EVENTS)
      : await api.createHook(repositoryId, hookConfig, HOOK_EVENTS);

    return hook ? String(hook.id) : null;
  }

  async deleteWebhook(repositoryId: string, hookId?: string): Promise<boolean> {
    const api = await this.requireApi();
    const repo = await api.getRepository(repositoryId);
    if (!repo) {
      return false;
    }

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
    return { id: String(user.id), username: user.login, displayName: user.name };
  }

  async revokeToken(accessToken: string): Promise<void> {
    const { clientId, clientSecret, apiBaseUrl } = this.factory.config;
    if (!clientId || !clientSecret) {
      logger.warn({ provider: this.factory.id }, 'OAuth client credentials not configured, token not revoked');
      return;
    }
    await GitHubApiClient.revokeToken(apiBaseUrl, clientId, clientSecret, accessToken);
  }

  // ============================================================================
  // Release archives
  // ============================================================================

  /**
   * HEAD the archive URL and settle on the URL to download from.
   * A tag and a branch sharing a name answer 300 with an alternate link;
   * tokens without access to a public archive answer 404, in which case an
   * anonymous request is tried.
   */
  async resolveReleaseZipballUrl(url: string): Promise<string> {
    const api = await this.requireApi();
    let target = url;
    let response = await fetch(target, { method: 'HEAD', headers: api.authHeaders, redirect: 'follow' });

    if (response.status === 300) {
      const alternate = parseLinkHeader(response.headers.get('link')).get('alternate');
      if (alternate) {
        target = alternate;
        response = await fetch(target, { method: 'HEAD', headers: api.authHeaders, redirect: 'follow' });
      }
    }

    if (response.status === 404) {
      logger.warn({ url: response.url || target }, 'GitHub zipball URL not found, trying unauthenticated request');
      response = await fetch(target, { method: 'HEAD', redirect: 'follow' });
      if (response.status === 200) {
        return response.url || target;
      }
    }

    if (response.status !== 200) {
      throw new ReleaseZipballFetchError(`Archive ${target} answered ${response.status}`);
    }

    return response.url || target;
  }

  protected async openReleaseZipball(url: string, signal: AbortSignal): Promise<Response> {
    const api = await this.requireApi();
    return fetch(url, { headers: api.authHeaders, redirect: 'follow', signal });
  }
}

/**
 * `<https://a>; rel="alternate", <https://b>; rel="next"` → rel → url
 */
export function parseLinkHeader(header: string | null): Map<string, string> {
  const links = new Map<string, string>();
  if (!header) {
    return links;
  }

  for (const part of header.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?([^";]+)"?/.exec(part.trim());
    if (match) {
      links.set(match[2], match[1]);
    }
  }
  return links;
}
