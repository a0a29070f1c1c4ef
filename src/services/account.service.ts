/**
 * Account Service
 *
 * What happens around the OAuth flow: first-time setup once a provider
 * account is connected, and unwinding everything when it is disconnected.
 */

import type { RemoteAccountExtraData } from '../db/schema';
import type { RepositoryHook } from '../tasks/types';
import { VersionControlService, type VcsServiceDeps } from './vcs.service';
import { RemoteAccountNotFound } from './vcs/errors';
import { getEncryptionService } from '../utils/encryption';
import { logger } from '../utils/sharedLogger';
import { captureError } from '../utils/sentry';
import { AnalyticsEvents, trackEvent } from '../utils/analytics';

export interface ConnectedAccount {
  accountId: string;
  /** false when setup failed; the account stays connected and can be synced later */
  initialized: boolean;
}

/**
 * Connect a provider account: store the token, then initialize and sync
 */
export async function connectAccount(
  providerId: string,
  userId: string,
  accessToken: string,
  deps: VcsServiceDeps
): Promise<ConnectedAccount> {
  const account = await deps.accounts.saveRemoteAccount(userId, providerId, accessToken);
  const initialized = await accountSetupHandler(providerId, userId, deps);
  return { accountId: account.id, initialized };
}

/**
 * Initialize the remote account and run a first sync. Failures are logged and
 * reported, never thrown: the OAuth flow has already succeeded by now.
 */
export async function accountSetupHandler(providerId: string, userId: string, deps: VcsServiceDeps): Promise<boolean> {
  try {
    const svc = VersionControlService.forProviderAndUser(providerId, userId, deps);
    await svc.initAccount();
    await svc.sync();
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ provider: providerId, userId, err: message }, 'Account setup failed');
    if (error instanceof Error) {
      captureError(error, { userId, extra: { provider: providerId } });
    }
    return false;
  }
}

/**
 * Disconnect a provider account.
 *
 * Local state is unwound right away; the remote side (hook removal, token
 * revocation) is handed to the queue together with the encrypted token,
 * since the account row is gone by the time the job runs.
 */
export async function disconnectHandler(providerId: string, userId: string, deps: VcsServiceDeps): Promise<void> {
  const svc = VersionControlService.forProviderAndUser(providerId, userId, deps);
  const account = await svc.provider.getRemoteAccount();
  if (!account) {
    throw new RemoteAccountNotFound(userId);
  }

  const accessToken = await svc.provider.getAccessToken();

  await deps.accounts.unlinkExternalId(userId, providerId);

  // Outstanding hook URLs stop authenticating from here on
  const extraData: RemoteAccountExtraData = { ...account.extraData };
  delete extraData.tokens;
  await deps.accounts.updateExtraData(account.id, extraData);
  account.extraData = extraData;

  const repoHooks: RepositoryHook[] = [];
  for (const repo of await svc.userEnabledRepositories()) {
    if (repo.providerId && repo.hook) {
      repoHooks.push({ repositoryId: repo.providerId, hookId: repo.hook });
    }
    await svc.markRepoDisabled(repo);
  }

  if (accessToken) {
    await deps.dispatcher.disconnectProvider({
      provider: providerId,
      userId,
      accessToken: await getEncryptionService().encrypt(accessToken),
      repoHooks,
    });
  } else {
    logger.warn({ provider: providerId, userId }, 'No access token stored, skipping remote cleanup');
  }

  await deps.accounts.deleteRemoteAccount(account.id);

  trackEvent(userId, AnalyticsEvents.ACCOUNT_DISCONNECTED, {
    provider: providerId,
    repositories: repoHooks.length,
  });
  logger.info({ provider: providerId, userId, hooks: repoHooks.length }, 'Provider account disconnected');
}
