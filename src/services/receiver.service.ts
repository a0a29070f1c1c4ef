/**
 * Webhook Receiver
 *
 * Authenticates inbound deliveries, stores them, and turns create-release
 * events into RECEIVED releases. Processing continues on the queue.
 *
 * Response codes: 200 ignored event, 202 release accepted, 403 bad token,
 * signature or sender, 404 unknown repository, 409 duplicate release or
 * disabled repository, 500 anything else.
 */

import type { WebhookEvent, WebhookResponseBody } from '../db/schema';
import type { RemoteAccountStore, VcsStore } from './store';
import type { TaskDispatcher } from '../tasks/types';
import type { IncomingHeaders } from './vcs/types';
import type { RepositoryProviderFactory } from './vcs/base.provider';
import { getProvider, hasProvider } from './vcs';
import {
  InvalidSenderError,
  ReleaseAlreadyReceivedError,
  RepositoryDisabledError,
  RepositoryNotFoundError,
  isVcsError,
  type VcsErrorKind,
} from './vcs/errors';
import { verifyWebhookToken, type WebhookTokenPayload } from '../utils/jwt';
import { logger } from '../utils/sharedLogger';
import { captureError } from '../utils/sentry';
import { AnalyticsEvents, trackEvent } from '../utils/analytics';

export interface ReceiverDeps {
  store: VcsStore;
  accounts: RemoteAccountStore;
  dispatcher: TaskDispatcher;
}

export interface IncomingWebhook {
  receiverId: string;
  accessToken: string | undefined;
  payload: unknown;
  rawBody: string;
  headers: IncomingHeaders;
}

export interface WebhookOutcome {
  status: number;
  body: WebhookResponseBody;
  eventId?: string;
}

const RECEIVER_STATUS: Partial<Record<VcsErrorKind, number>> = {
  'release-already-received': 409,
  'repository-disabled': 409,
  'repository-access': 403,
  'invalid-sender': 403,
  'repository-not-found': 404,
};

function reject(status: number, message: string): WebhookOutcome {
  return { status, body: { message, status } };
}

function isPayloadObject(payload: unknown): payload is Record<string, unknown> {
  return typeof payload === 'object' && payload !== null && !Array.isArray(payload);
}

export class WebhookReceiver {
  private readonly store: VcsStore;
  private readonly accounts: RemoteAccountStore;
  private readonly dispatcher: TaskDispatcher;

  constructor(deps: ReceiverDeps) {
    this.store = deps.store;
    this.accounts = deps.accounts;
    this.dispatcher = deps.dispatcher;
  }

  /**
   * Resolve the user a webhook token was issued to, or null when the token
   * is invalid, for another provider, or no longer the account's current one
   */
  async authenticate(factory: RepositoryProviderFactory, accessToken: string | undefined): Promise<string | null> {
    if (!accessToken) {
      return null;
    }

    let claims: WebhookTokenPayload;
    try {
      claims = verifyWebhookToken(accessToken);
    } catch {
      return null;
    }

    if (claims.provider !== factory.id) {
      return null;
    }

    const account = await this.accounts.getRemoteAccount(claims.userId, factory.id);
    if (!account || account.extraData.tokens?.webhook !== claims.tokenId) {
      return null;
    }
    return claims.userId;
  }

  /**
   * Full inbound flow: authenticate, persist the event, process it and
   * record the response on the event
   */
  async receive(incoming: IncomingWebhook): Promise<WebhookOutcome> {
    if (!hasProvider(incoming.receiverId)) {
      return reject(404, `Unknown receiver: ${incoming.receiverId}`);
    }
    const factory = getProvider(incoming.receiverId);

    const userId = await this.authenticate(factory, incoming.accessToken);
    if (!userId) {
      logger.warn({ receiverId: factory.id }, 'Webhook rejected: invalid access token');
      return reject(403, 'Invalid webhook access token');
    }

    if (!factory.verifyWebhookRequest(incoming.headers, incoming.rawBody)) {
      logger.warn({ receiverId: factory.id, userId }, 'Webhook rejected: signature mismatch');
      return reject(403, 'Invalid webhook signature');
    }

    if (!isPayloadObject(incoming.payload)) {
      return reject(400, 'Webhook payload must be a JSON object');
    }

    const event = await this.store.createWebhookEvent({
      receiverId: factory.id,
      userId,
      payload: incoming.payload,
    });

    const outcome = await this.process(factory, event);
    await this.store.setWebhookEventResponse(event.id, outcome.status, outcome.body);
    return { ...outcome, eventId: event.id };
  }

  /**
   * Release state machine entry point. Never throws: every failure becomes
   * a response code.
   */
  async process(factory: RepositoryProviderFactory, event: WebhookEvent): Promise<WebhookOutcome> {
    try {
      if (!factory.webhookIsCreateReleaseEvent(event.payload)) {
        return { status: 200, body: {} };
      }

      const { release, repository } = factory.webhookEventToGeneric(event.payload);

      const duplicate = await this.store.getRelease(factory.id, release.id);
      if (duplicate) {
        // A release still RECEIVED may have missed its first dispatch; the
        // queue drops the job if it is already waiting
        if (duplicate.status === 'received') {
          await this.dispatcher.processRelease({ provider: factory.id, releaseId: duplicate.providerId });
        }
        throw new ReleaseAlreadyReceivedError(release.id);
      }

      const created = await this.store.transaction(async (tx) => {
        if (await tx.getRelease(factory.id, release.id)) {
          throw new ReleaseAlreadyReceivedError(release.id);
        }

        const repo =
          (await tx.getRepository(factory.id, { providerId: repository.id })) ??
          (await tx.getRepository(factory.id, { fullName: repository.fullName }));
        if (!repo) {
          throw new RepositoryNotFoundError(repository.fullName);
        }
        if (!repo.hook) {
          throw new RepositoryDisabledError(repository.fullName);
        }
        if (event.userId && repo.enabledByUserId !== event.userId) {
          throw new InvalidSenderError(`The hook for ${repository.fullName} belongs to another user`);
        }

        return tx.createRelease({
          provider: factory.id,
          providerId: release.id,
          tag: release.tagName,
          status: 'received',
          repositoryId: repo.id,
          eventId: event.id,
        });
      });

      await this.dispatcher.processRelease({ provider: factory.id, releaseId: created.providerId });

      if (event.userId) {
        trackEvent(event.userId, AnalyticsEvents.RELEASE_RECEIVED, { provider: factory.id });
      }
      logger.info({ provider: factory.id, releaseId: created.providerId, tag: created.tag }, 'Release received');
      return { status: 202, body: {} };
    } catch (error) {
      return this.errorOutcome(factory, event, error);
    }
  }

  private errorOutcome(factory: RepositoryProviderFactory, event: WebhookEvent, error: unknown): WebhookOutcome {
    const message = error instanceof Error ? error.message : String(error);

    const status = isVcsError(error) ? RECEIVER_STATUS[error.kind] : undefined;
    if (status) {
      logger.info({ provider: factory.id, eventId: event.id, status, message }, 'Webhook event refused');
      return reject(status, message);
    }

    logger.error({ provider: factory.id, eventId: event.id, err: message }, 'Webhook event processing failed');
    if (error instanceof Error) {
      captureError(error, { userId: event.userId ?? undefined, extra: { eventId: event.id, receiverId: factory.id } });
    }
    return reject(500, message);
  }
}
