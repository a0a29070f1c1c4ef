import { z } from 'zod';
import { config } from './index';
import type { RemoteAccountStore } from '../services/store';
import type { RepositoryProviderFactory } from '../services/vcs/base.provider';
import { GitHubProviderFactory } from '../services/vcs/github/github.provider';
import { GitLabProviderFactory } from '../services/vcs/gitlab/gitlab.provider';
import type { ProviderConfigOverride } from '../services/vcs/types';

/**
 * Shape of VCS_PROVIDER_OVERRIDES: { "<provider id>": { name?, baseUrl?, ..., config? } }
 */
export const providerOverridesSchema = z.record(
  z
    .object({
      name: z.string().optional(),
      description: z.string().optional(),
      icon: z.string().optional(),
      credentialsKey: z.string().optional(),
      baseUrl: z.string().url().optional(),
      webhookReceiverUrl: z.string().url().optional(),
      config: z.record(z.unknown()).optional(),
    })
    .strict()
);

export type ProviderOverrides = Record<string, ProviderConfigOverride>;

export function parseProviderOverrides(raw: string | undefined): ProviderOverrides {
  if (!raw) {
    return {};
  }
  return providerOverridesSchema.parse(JSON.parse(raw));
}

type FactoryBuilder = (accounts: RemoteAccountStore) => RepositoryProviderFactory;

const builders = new Map<string, FactoryBuilder>([
  ['github', (accounts) =>
    new GitHubProviderFactory(accounts, {
      baseUrl: config.github.baseUrl,
      webhookReceiverUrl: config.github.webhookReceiverUrl,
      config: {
        apiBaseUrl: config.github.apiBaseUrl,
        sharedSecret: config.github.sharedSecret,
        insecureSsl: config.github.insecureSsl,
        clientId: config.github.clientId,
        clientSecret: config.github.clientSecret,
      },
    })],
  ['gitlab', (accounts) =>
    new GitLabProviderFactory(accounts, {
      baseUrl: config.gitlab.baseUrl,
      webhookReceiverUrl: config.gitlab.webhookReceiverUrl,
      config: {
        sharedValidationToken: config.gitlab.sharedValidationToken,
        skipUpcomingReleases: config.gitlab.skipUpcomingReleases,
        siteName: config.server.siteName,
      },
    })],
]);

/**
 * Factories for every enabled provider, with deploy-time overrides applied
 * @throws Error on an unknown provider id
 */
export function createProviderFactories(
  accounts: RemoteAccountStore,
  enabled: readonly string[] = config.vcs.enabledProviders,
  overrides: ProviderOverrides = parseProviderOverrides(config.vcs.providerOverrides)
): RepositoryProviderFactory[] {
  return enabled.map((id) => {
    const build = builders.get(id);
    if (!build) {
      throw new Error(`Unknown VCS provider in VCS_ENABLED_PROVIDERS: ${id}`);
    }
    const factory = build(accounts);
    const override = overrides[id];
    if (override) {
      factory.updateConfigOverride(override);
    }
    return factory;
  });
}
