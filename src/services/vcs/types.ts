/**
 * VCS Provider Types
 *
 * Provider-neutral models shared by every forge integration (GitHub, GitLab, ...).
 * Nothing provider-specific crosses the provider boundary except these shapes.
 */

// ============================================================================
// Core Types
// ============================================================================

/**
 * Built-in provider ids. Ids are baked into webhook URLs and must never be renamed.
 */
export type ForgeType = 'github' | 'gitlab';

export type GenericOwnerType = 'person' | 'organization';

/**
 * Raw HTTP headers as Node hands them to us
 */
export type IncomingHeaders = Record<string, string | string[] | undefined>;

// ============================================================================
// Repository Types
// ============================================================================

export interface GenericRepository {
  id: string; // Native id as string for all forges
  fullName: string;
  defaultBranch: string;
  htmlUrl: string | null;
  description: string | null;
  licenseSpdx: string | null;
}

export interface GenericWebhook {
  id: string;
  repositoryId: string;
  url: string;
}

// ============================================================================
// Release Types
// ============================================================================

export interface GenericRelease {
  id: string;
  tagName: string;
  createdAt: Date;
  htmlUrl: string;
  name: string | null;
  body: string | null;
  tarballUrl: string | null;
  zipballUrl: string | null;
  /**
   * May differ from createdAt, and may lie in the future for scheduled releases.
   */
  publishedAt: Date | null;
}

/**
 * A create-release webhook payload normalized to the generic model
 */
export interface GenericReleaseEvent {
  release: GenericRelease;
  repository: GenericRepository;
}

// ============================================================================
// User Types
// ============================================================================

export interface GenericUser {
  id: string;
  username: string;
  displayName: string | null;
}

export interface GenericOwner {
  id: string;
  pathName: string;
  type: GenericOwnerType;
  displayName: string | null;
}

export interface GenericContributor {
  id: string;
  username: string;
  displayName: string | null;
  company: string | null;
  contributionsCount: number | null;
}

// ============================================================================
// Factory Descriptor Types
// ============================================================================

export interface ProviderDescriptor {
  id: string;
  name: string;
  description: string;
  icon: string;
  credentialsKey: string;
  baseUrl: string;
  webhookReceiverUrl: string;
  repositoryName: string;
  repositoryNamePlural: string;
}

/**
 * Deploy-time override of a factory's descriptor and provider-specific settings
 */
export type ProviderConfigOverride = Partial<
  Pick<ProviderDescriptor, 'name' | 'description' | 'icon' | 'credentialsKey' | 'baseUrl' | 'webhookReceiverUrl'>
> & {
  config?: Record<string, unknown>;
};

/**
 * Labels the UI uses to talk about a provider
 */
export interface ProviderVocabulary {
  id: string;
  name: string;
  icon: string;
  repository: string;
  repositoryPlural: string;
}
