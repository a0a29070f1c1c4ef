/**
 * Deposit Service
 *
 * Turns a processed release into a published record on the records API:
 * create draft → register file → upload archive → commit → publish.
 */

import type { VcsRelease } from './release.service';
import type { GenericContributor, GenericOwner } from './vcs/types';
import { ReleaseMetadataError } from './vcs/errors';
import { ApiError, InternalError } from '../lib/errors';
import { config } from '../config';
import { logger } from '../utils/sharedLogger';

export interface DepositResult {
  recordId: string;
}

export interface DepositService {
  publish(release: VcsRelease): Promise<DepositResult>;
}

/**
 * The records API answered with a failure
 */
export class DepositRequestError extends ApiError {
  constructor(readonly responseStatus: number, readonly path: string) {
    super({
      type: 'deposit-request-failed',
      title: 'Bad Gateway',
      status: 502,
      detail: `Records API answered ${responseStatus} for ${path}`,
    });
    this.name = 'DepositRequestError';
  }
}

type Metadata = Record<string, unknown>;

interface RecordResponse {
  id: string;
}

interface Creator {
  person_or_org: {
    type: 'personal' | 'organizational';
    name: string;
  };
  affiliations?: Array<{ name: string }>;
}

// ============================================================================
// Metadata
// ============================================================================

function isPlainObject(value: unknown): value is Metadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the repository's metadata file. Missing file → empty object.
 * @throws ReleaseMetadataError when the file is not a JSON object
 */
export function parseMetadataFile(fileName: string, content: string | null): Metadata {
  if (content === null) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    throw new ReleaseMetadataError(fileName, `The metadata file is not valid JSON: ${reason}`);
  }

  if (!isPlainObject(parsed)) {
    throw new ReleaseMetadataError(fileName, 'The metadata file must contain a JSON object.');
  }
  return parsed;
}

export function buildCreators(contributors: GenericContributor[] | null, owner: GenericOwner | null): Creator[] {
  if (contributors && contributors.length > 0) {
    return contributors.map((contributor) => ({
      person_or_org: { type: 'personal', name: contributor.displayName ?? contributor.username },
      ...(contributor.company ? { affiliations: [{ name: contributor.company }] } : {}),
    }));
  }
  if (owner) {
    return [
      {
        person_or_org: {
          type: owner.type === 'person' ? 'personal' : 'organizational',
          name: owner.displayName ?? owner.pathName,
        },
      },
    ];
  }
  return [];
}

/**
 * Metadata derived from the release, overridden key by key by the file
 */
export async function buildRecordMetadata(release: VcsRelease, fileMetadata: Metadata): Promise<Metadata> {
  const { generic, genericRepository } = release;
  const contributors = await release.contributors();
  const owner = contributors && contributors.length > 0 ? null : await release.owner();
  const publishedAt = generic.publishedAt ?? generic.createdAt;

  return {
    resource_type: { id: 'software' },
    title: `${genericRepository.fullName}: ${generic.name ?? generic.tagName}`,
    description: generic.body ?? genericRepository.description ?? undefined,
    version: generic.tagName,
    publication_date: publishedAt.toISOString().slice(0, 10),
    creators: buildCreators(contributors, owner),
    rights: genericRepository.licenseSpdx ? [{ id: genericRepository.licenseSpdx.toLowerCase() }] : undefined,
    related_identifiers: [
      {
        identifier: generic.htmlUrl,
        scheme: 'url',
        relation_type: { id: 'issupplementto' },
      },
    ],
    ...fileMetadata,
  };
}

// ============================================================================
// Records API client
// ============================================================================

export interface RecordsApiOptions {
  apiUrl: string;
  apiToken: string;
  metadataFile: string;
}

export class RecordsApiDepositService implements DepositService {
  constructor(private readonly options: RecordsApiOptions) {}

  private async call<T>(method: string, path: string, init: RequestInit = {}): Promise<T | null> {
    const response = await fetch(`${this.options.apiUrl}${path}`, {
      ...init,
      method,
      headers: {
        Authorization: `Bearer ${this.options.apiToken}`,
        Accept: 'application/json',
        ...init.headers,
      },
    });

    if (!response.ok) {
      const errorBody = await response.text();
      logger.debug({ status: response.status, path, errorBody: errorBody.substring(0, 500) }, 'Records API request failed');
      throw new DepositRequestError(response.status, path);
    }

    if (response.status === 204) {
      return null;
    }
    return response.json() as Promise<T>;
  }

  private json(body: unknown): RequestInit {
    return {
      body: JSON.stringify(body),
      headers: { 'Content-Type': 'application/json' },
    };
  }

  async loadFileMetadata(release: VcsRelease): Promise<Metadata> {
    const { providerId } = release.repository;
    if (!providerId) {
      return {};
    }
    const content = await release.provider.retrieveRemoteFile(
      providerId,
      release.generic.tagName,
      this.options.metadataFile
    );
    return parseMetadataFile(this.options.metadataFile, content);
  }

  async publish(release: VcsRelease): Promise<DepositResult> {
    const fileMetadata = await this.loadFileMetadata(release);
    const metadata = await buildRecordMetadata(release, fileMetadata);

    const draft = await this.call<RecordResponse>('POST', '/api/records', this.json({ metadata, files: { enabled: true } }));
    if (!draft) {
      throw new DepositRequestError(204, '/api/records');
    }

    const key = encodeURIComponent(release.releaseFileName);
    const filesPath = `/api/records/${draft.id}/draft/files`;

    await this.call('POST', filesPath, this.json([{ key: release.releaseFileName }]));

    await release.withZipball((body) =>
      this.call('PUT', `${filesPath}/${key}/content`, {
        body,
        duplex: 'half',
        headers: { 'Content-Type': 'application/octet-stream' },
      })
    );

    await this.call('POST', `${filesPath}/${key}/commit`);

    const published = await this.call<RecordResponse>('POST', `/api/records/${draft.id}/draft/actions/publish`);
    return { recordId: published?.id ?? draft.id };
  }
}

/**
 * Stand-in when no records API is configured; every publish fails and the
 * release is marked FAILED by the error handlers.
 */
export class UnconfiguredDepositService implements DepositService {
  async publish(): Promise<DepositResult> {
    throw new InternalError('No records API is configured (DEPOSIT_API_URL, DEPOSIT_API_TOKEN)');
  }
}

export function createDepositService(): DepositService {
  const { apiUrl, apiToken } = config.deposit;
  if (!apiUrl || !apiToken) {
    return new UnconfiguredDepositService();
  }
  return new RecordsApiDepositService({ apiUrl, apiToken, metadataFile: config.vcs.metadataFile });
}
