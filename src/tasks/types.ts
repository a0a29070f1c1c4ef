/**
 * Background job payloads and the producer seam services depend on.
 * Payloads are JSON: ids as strings, tokens only in encrypted form.
 */

import type { EncryptedData } from '../utils/encryption';

export interface SyncHooksJob {
  provider: string;
  userId: string;
  repositoryIds: string[];
}

export interface ProcessReleaseJob {
  provider: string;
  /** Provider-native release id */
  releaseId: string;
}

export interface RepositoryHook {
  repositoryId: string;
  hookId: string;
}

export interface DisconnectProviderJob {
  provider: string;
  userId: string;
  accessToken: EncryptedData;
  repoHooks: RepositoryHook[];
}

export interface RefreshAccountsJob {
  provider: string;
  thresholdDays?: number;
}

export interface SyncAccountJob {
  provider: string;
  userId: string;
}

export interface TaskDispatcher {
  syncHooks(job: SyncHooksJob): Promise<void>;
  processRelease(job: ProcessReleaseJob): Promise<void>;
  disconnectProvider(job: DisconnectProviderJob): Promise<void>;
  refreshAccounts(job: RefreshAccountsJob): Promise<void>;
  syncAccount(job: SyncAccountJob): Promise<void>;
}
