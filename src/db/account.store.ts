import { and, eq, inArray, lt } from 'drizzle-orm';
import { remoteAccounts, userIdentities, type RemoteAccount, type RemoteAccountExtraData } from './schema';
import type { Executor } from './vcs.store';
import type { RemoteAccountStore } from '../services/store';
import type { IEncryptionService } from '../utils/encryption';

/**
 * Remote accounts with their access tokens encrypted at rest
 */
export class DrizzleRemoteAccountStore implements RemoteAccountStore {
  constructor(
    private readonly executor: Executor,
    private readonly encryption: IEncryptionService
  ) {}

  async getRemoteAccount(userId: string, provider: string): Promise<RemoteAccount | null> {
    const [account] = await this.executor
      .select()
      .from(remoteAccounts)
      .where(and(eq(remoteAccounts.userId, userId), eq(remoteAccounts.provider, provider)))
      .limit(1);
    return account ?? null;
  }

  async saveRemoteAccount(userId: string, provider: string, accessToken: string): Promise<RemoteAccount> {
    const encrypted = await this.encryption.encrypt(accessToken);
    const tokenFields = {
      encryptedAccessToken: encrypted.encryptedContent,
      accessTokenIv: encrypted.iv,
      accessTokenAuthTag: encrypted.authTag,
    };

    const [account] = await this.executor
      .insert(remoteAccounts)
      .values({ userId, provider, ...tokenFields })
      .onConflictDoUpdate({
        target: [remoteAccounts.userId, remoteAccounts.provider],
        set: { ...tokenFields, updatedAt: new Date() },
      })
      .returning();
    return account;
  }

  async getAccessToken(userId: string, provider: string): Promise<string | null> {
    const account = await this.getRemoteAccount(userId, provider);
    if (!account?.encryptedAccessToken || !account.accessTokenIv || !account.accessTokenAuthTag) {
      return null;
    }
    return this.encryption.decrypt({
      encryptedContent: account.encryptedAccessToken,
      iv: account.accessTokenIv,
      authTag: account.accessTokenAuthTag,
    });
  }

  async updateExtraData(accountId: string, extraData: RemoteAccountExtraData): Promise<void> {
    await this.executor
      .update(remoteAccounts)
      .set({ extraData, updatedAt: new Date() })
      .where(eq(remoteAccounts.id, accountId));
  }

  async deleteRemoteAccount(accountId: string): Promise<void> {
    await this.executor.delete(remoteAccounts).where(eq(remoteAccounts.id, accountId));
  }

  async listStaleAccounts(provider: string, updatedBefore: Date): Promise<RemoteAccount[]> {
    return this.executor
      .select()
      .from(remoteAccounts)
      .where(and(eq(remoteAccounts.provider, provider), lt(remoteAccounts.updatedAt, updatedBefore)));
  }

  // ============================================================================
  // External identities
  // ============================================================================

  async linkExternalId(userId: string, method: string, externalId: string): Promise<void> {
    await this.executor.insert(userIdentities).values({ userId, method, externalId }).onConflictDoNothing();
  }

  async unlinkExternalId(userId: string, method: string): Promise<void> {
    await this.executor
      .delete(userIdentities)
      .where(and(eq(userIdentities.userId, userId), eq(userIdentities.method, method)));
  }

  async findUserIdsByExternalIds(method: string, externalIds: string[]): Promise<string[]> {
    if (externalIds.length === 0) {
      return [];
    }
    const rows = await this.executor
      .select({ userId: userIdentities.userId })
      .from(userIdentities)
      .where(and(eq(userIdentities.method, method), inArray(userIdentities.externalId, externalIds)));
    return rows.map((row) => row.userId);
  }
}
