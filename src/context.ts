/**
 * Wires storage, providers and the queue producer once per process.
 * The HTTP server and the worker both start from here.
 */

import { db } from './db';
import { DrizzleVcsStore } from './db/vcs.store';
import { DrizzleRemoteAccountStore } from './db/account.store';
import { createProviderFactories } from './config/providers';
import { hasProvider, registerProvider } from './services/vcs';
import { createDepositService } from './services/deposit.service';
import { WebhookReceiver } from './services/receiver.service';
import { BullTaskDispatcher } from './tasks/queues';
import type { TaskDeps } from './tasks/handlers';
import { getEncryptionService } from './utils/encryption';
import { logger } from './utils/sharedLogger';

export interface AppContext extends TaskDeps {
  receiver: WebhookReceiver;
}

/**
 * Register every enabled provider factory that is not registered yet
 */
export function registerProviders(deps: Pick<TaskDeps, 'accounts'>): string[] {
  const registered: string[] = [];
  for (const factory of createProviderFactories(deps.accounts)) {
    if (!hasProvider(factory.id)) {
      registerProvider(factory);
      registered.push(factory.id);
    }
  }
  return registered;
}

let appContext: AppContext | null = null;

export function getAppContext(): AppContext {
  if (!appContext) {
    const store = new DrizzleVcsStore(db);
    const accounts = new DrizzleRemoteAccountStore(db, getEncryptionService());
    const dispatcher = new BullTaskDispatcher();
    const deps: TaskDeps = { store, accounts, dispatcher, deposit: createDepositService() };

    const providers = registerProviders(deps);
    logger.info({ providers }, 'VCS providers registered');

    appContext = { ...deps, receiver: new WebhookReceiver(deps) };
  }
  return appContext;
}
