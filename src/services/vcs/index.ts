/**
 * VCS Provider Registry
 *
 * Process-wide map of provider id → factory, filled once at startup.
 * Ids are part of webhook receiver URLs, so lookups by id come from our own
 * routing, never from free user input.
 */

import { RepositoryProviderFactory } from './base.provider';
import { ProviderNotRegisteredError } from './errors';

// ============================================================================
// Provider Registry
// ============================================================================

const providers = new Map<string, RepositoryProviderFactory>();

/**
 * Register a provider factory
 * @throws Error if the id is already taken
 */
export function registerProvider(factory: RepositoryProviderFactory): void {
  if (providers.has(factory.id)) {
    throw new Error(`A VCS provider is already registered with id: ${factory.id}`);
  }
  providers.set(factory.id, factory);
}

/**
 * Get a provider factory by id
 * @throws ProviderNotRegisteredError (configuration error, not retryable)
 */
export function getProvider(id: string): RepositoryProviderFactory {
  const factory = providers.get(id);
  if (!factory) {
    throw new ProviderNotRegisteredError(id);
  }
  return factory;
}

export function hasProvider(id: string): boolean {
  return providers.has(id);
}

export function getRegisteredProviders(): RepositoryProviderFactory[] {
  return Array.from(providers.values());
}

/**
 * Clear the registry. Startup and tests only.
 */
export function resetProviders(): void {
  providers.clear();
}

// ============================================================================
// Re-exports
// ============================================================================

export type {
  ForgeType,
  GenericContributor,
  GenericOwner,
  GenericOwnerType,
  GenericRelease,
  GenericReleaseEvent,
  GenericRepository,
  GenericUser,
  GenericWebhook,
  IncomingHeaders,
  ProviderConfigOverride,
  ProviderDescriptor,
  ProviderVocabulary,
} from './types';

export { RepositoryProvider, RepositoryProviderFactory, headerValue } from './base.provider';
export * from './errors';

export { GitHubProvider, GitHubProviderFactory } from './github/github.provider';
export { GitHubApiClient } from './github/github.api-client';
export { GitLabProvider, GitLabProviderFactory } from './gitlab/gitlab.provider';
export { GitLabApiClient } from './gitlab/gitlab.api-client';
