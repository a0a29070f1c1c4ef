/**
 * VCS Base Provider
 *
 * Two halves per forge:
 * - a factory: stateless descriptor (id, URLs, settings) that also normalizes
 *   webhook payloads, and binds to a user with forUser()/forAccessToken()
 * - a provider: the per-user API session doing the remote calls
 */

import type { z } from 'zod';
import type { RemoteAccount } from '../../db/schema';
import type { RemoteAccountStore } from '../store';
import type {
  GenericContributor,
  GenericOwner,
  GenericReleaseEvent,
  GenericRepository,
  GenericUser,
  GenericWebhook,
  IncomingHeaders,
  ProviderConfigOverride,
  ProviderDescriptor,
  ProviderVocabulary,
} from './types';
import { RemoteAccountDataNotSet, ReleaseZipballFetchError } from './errors';
import { createWebhookToken } from '../../utils/jwt';

// ============================================================================
// Factory
// ============================================================================

export abstract class RepositoryProviderFactory<TConfig extends object = object> {
  readonly id: string;
  name: string;
  description: string;
  icon: string;
  credentialsKey: string;
  baseUrl: string;
  webhookReceiverUrl: string;
  readonly repositoryName: string;
  readonly repositoryNamePlural: string;

  protected currentConfig: TConfig;

  /**
   * Validates the `config` part of a deploy-time override
   */
  protected abstract readonly configSchema: z.ZodType<Partial<TConfig>, z.ZodTypeDef, unknown>;

  constructor(
    descriptor: ProviderDescriptor,
    config: TConfig,
    readonly accounts: RemoteAccountStore
  ) {
    this.id = descriptor.id;
    this.name = descriptor.name;
    this.description = descriptor.description;
    this.icon = descriptor.icon;
    this.credentialsKey = descriptor.credentialsKey;
    this.baseUrl = descriptor.baseUrl;
    this.webhookReceiverUrl = descriptor.webhookReceiverUrl;
    this.repositoryName = descriptor.repositoryName;
    this.repositoryNamePlural = descriptor.repositoryNamePlural;
    this.currentConfig = config;
  }

  get config(): Readonly<TConfig> {
    return this.currentConfig;
  }

  /**
   * Apply deploy-time settings. Each key is overridable on its own.
   */
  updateConfigOverride(override: ProviderConfigOverride): void {
    if (override.name !== undefined) this.name = override.name;
    if (override.description !== undefined) this.description = override.description;
    if (override.icon !== undefined) this.icon = override.icon;
    if (override.credentialsKey !== undefined) this.credentialsKey = override.credentialsKey;
    if (override.baseUrl !== undefined) this.baseUrl = override.baseUrl;
    if (override.webhookReceiverUrl !== undefined) this.webhookReceiverUrl = override.webhookReceiverUrl;

    if (override.config) {
      const parsed = this.configSchema.parse(override.config);
      this.currentConfig = { ...this.currentConfig, ...parsed };
    }
  }

  get vocabulary(): ProviderVocabulary {
    return {
      id: this.id,
      name: this.name,
      icon: this.icon,
      repository: this.repositoryName,
      repositoryPlural: this.repositoryNamePlural,
    };
  }

  // ============================================================================
  // Webhook events (Abstract - must be implemented by each provider)
  // ============================================================================

  /**
   * Whether the payload announces a release we should archive
   */
  abstract webhookIsCreateReleaseEvent(payload: unknown): boolean;

  /**
   * Normalize a create-release payload without extra API calls
   */
  abstract webhookEventToGeneric(payload: unknown): GenericReleaseEvent;

  /**
   * Check the provider's delivery signature or validation token
   */
  abstract verifyWebhookRequest(headers: IncomingHeaders, rawBody: string): boolean;

  // ============================================================================
  // URLs
  // ============================================================================

  urlForRepository(repositoryName: string): string {
    return `${this.baseUrl}/${repositoryName}`;
  }

  urlForRelease(repositoryName: string, _releaseId: string, tagName: string): string {
    return this.urlForTag(repositoryName, tagName);
  }

  urlForNewRepo(): string {
    return `${this.baseUrl}/new`;
  }

  abstract urlForTag(repositoryName: string, tagName: string): string;
  abstract urlForNewRelease(repositoryName: string): string;
  abstract urlForNewFile(repositoryName: string, branchName: string, fileName: string): string;

  // ============================================================================
  // Binding
  // ============================================================================

  abstract forUser(userId: string): RepositoryProvider;
  abstract forAccessToken(userId: string, accessToken: string): RepositoryProvider;
}

// ============================================================================
// Provider
// ============================================================================

export abstract class RepositoryProvider {
  abstract readonly factory: RepositoryProviderFactory;

  private remoteAccount: Promise<RemoteAccount | null> | null = null;
  private accessToken: Promise<string | null> | null = null;

  constructor(
    readonly userId: string,
    private readonly explicitAccessToken?: string
  ) {}

  /**
   * The user's OAuth account for this provider (cached per instance)
   */
  getRemoteAccount(): Promise<RemoteAccount | null> {
    if (!this.remoteAccount) {
      this.remoteAccount = this.factory.accounts.getRemoteAccount(this.userId, this.factory.id);
    }
    return this.remoteAccount;
  }

  /**
   * Token given at construction, else the stored one
   */
  getAccessToken(): Promise<string | null> {
    if (!this.accessToken) {
      this.accessToken = this.explicitAccessToken !== undefined
        ? Promise.resolve(this.explicitAccessToken)
        : this.factory.accounts.getAccessToken(this.userId, this.factory.id);
    }
    return this.accessToken;
  }

  /**
   * Receiver URL carrying this user's webhook token
   */
  async webhookUrl(): Promise<string> {
    const account = await this.getRemoteAccount();
    const tokenId = account?.extraData.tokens?.webhook;
    if (!tokenId) {
      throw new RemoteAccountDataNotSet(this.userId, 'Webhook token not set for user.');
    }
    const token = createWebhookToken({ userId: this.userId, provider: this.factory.id, tokenId });
    return this.factory.webhookReceiverUrl.replace('{token}', encodeURIComponent(token));
  }

  /**
   * A hook is ours when it points at the same host as the receiver
   */
  isValidWebhook(url: string | null | undefined): boolean {
    const configuredHost = hostOf(this.factory.webhookReceiverUrl);
    const urlHost = hostOf(url);
    if (!configuredHost || !urlHost) {
      return false;
    }
    return configuredHost === urlHost;
  }

  async getFirstValidWebhook(repositoryId: string): Promise<GenericWebhook | null> {
    const hooks = await this.listRepositoryWebhooks(repositoryId);
    if (!hooks) {
      return null;
    }
    return hooks.find((hook) => this.isValidWebhook(hook.url)) ?? null;
  }

  /**
   * Stream a release archive into `consume`. The download is aborted after
   * `timeoutSeconds` and always released when `consume` settles.
   */
  async withReleaseZipball<T>(
    url: string,
    timeoutSeconds: number,
    consume: (body: ReadableStream<Uint8Array>) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new ReleaseZipballFetchError(`Timed out after ${timeoutSeconds}s fetching ${url}`));
    }, timeoutSeconds * 1000);

    try {
      const response = await this.openReleaseZipball(url, controller.signal);
      if (!response.ok || !response.body) {
        throw new ReleaseZipballFetchError(`Archive download answered ${response.status}`);
      }
      return await consume(response.body);
    } catch (error) {
      if (controller.signal.aborted && controller.signal.reason instanceof ReleaseZipballFetchError) {
        throw controller.signal.reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
      controller.abort();
    }
  }

  // ============================================================================
  // Remote operations (Abstract - must be implemented by each provider)
  // ============================================================================

  /**
   * Repositories the user administers, keyed by provider id.
   * null when no API client can be built (no token).
   */
  abstract listRepositories(): Promise<Map<string, GenericRepository> | null>;
  abstract getRepository(repositoryId: string): Promise<GenericRepository | null>;
  abstract getRepositoryOwner(repositoryId: string): Promise<GenericOwner | null>;
  abstract listRepositoryContributors(repositoryId: string, max: number): Promise<GenericContributor[] | null>;
  abstract listRepositoryWebhooks(repositoryId: string): Promise<GenericWebhook[] | null>;
  /** Provider user ids with admin rights on the repository */
  abstract listRepositoryUserIds(repositoryId: string): Promise<string[] | null>;

  /**
   * Install the release hook, updating an existing one with our URL in place.
   * @returns the hook id, or null when the repository is gone
   */
  abstract createWebhook(repositoryId: string): Promise<string | null>;

  /**
   * Remove a hook. Without hookId, the first hook pointing at our receiver.
   * A hook that is already gone counts as deleted.
   */
  abstract deleteWebhook(repositoryId: string, hookId?: string): Promise<boolean>;

  abstract getOwnUser(): Promise<GenericUser | null>;
  abstract resolveReleaseZipballUrl(url: string): Promise<string>;
  abstract retrieveRemoteFile(repositoryId: string, ref: string, path: string): Promise<string | null>;

  /**
   * Best effort. Providers without a revocation API do nothing.
   */
  abstract revokeToken(accessToken: string): Promise<void>;

  protected abstract openReleaseZipball(url: string, signal: AbortSignal): Promise<Response>;
}

/**
 * First value of a header, whatever shape Node gave it
 */
export function headerValue(headers: IncomingHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

function hostOf(url: string | null | undefined): string | null {
  if (!url) {
    return null;
  }
  try {
    const host = new URL(url).host;
    return host || null;
  } catch {
    return null;
  }
}
