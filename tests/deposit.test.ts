import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  DepositRequestError,
  RecordsApiDepositService,
  UnconfiguredDepositService,
  buildCreators,
  buildRecordMetadata,
  createDepositService,
  parseMetadataFile,
} from '../src/services/deposit.service';
import { VcsRelease } from '../src/services/release.service';
import { ReleaseMetadataError } from '../src/services/vcs/errors';
import { createTestContext, fakeReleasePayload, mockUser, seedConnectedUser, type TestContext } from './helpers/mocks';
import { FAKE_PROVIDER } from './helpers/fakeProvider';

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

const METADATA_FILE = '.release-metadata.json';

describe('parseMetadataFile', () => {
  it('should treat a missing file as empty metadata', () => {
    expect(parseMetadataFile(METADATA_FILE, null)).toEqual({});
  });

  it('should return the parsed object', () => {
    expect(parseMetadataFile(METADATA_FILE, '{"title": "Custom", "keywords": ["a"]}')).toEqual({
      title: 'Custom',
      keywords: ['a'],
    });
  });

  it('should reject invalid JSON', () => {
    expect(() => parseMetadataFile(METADATA_FILE, '{title')).toThrow(ReleaseMetadataError);
    expect(() => parseMetadataFile(METADATA_FILE, '{title')).toThrow(/^The metadata file is not valid JSON: /);
  });

  it('should reject JSON that is not an object', () => {
    expect(() => parseMetadataFile(METADATA_FILE, '[1, 2]')).toThrow('The metadata file must contain a JSON object.');
    expect(() => parseMetadataFile(METADATA_FILE, '"text"')).toThrow('The metadata file must contain a JSON object.');
  });
});

describe('buildCreators', () => {
  it('should list contributors as people with their company', () => {
    expect(
      buildCreators(
        [
          { id: '1', username: 'alice', displayName: 'Alice', company: 'ACME', contributionsCount: 3 },
          { id: '2', username: 'bob', displayName: null, company: null, contributionsCount: 1 },
        ],
        null
      )
    ).toEqual([
      { person_or_org: { type: 'personal', name: 'Alice' }, affiliations: [{ name: 'ACME' }] },
      { person_or_org: { type: 'personal', name: 'bob' } },
    ]);
  });

  it('should fall back to the owner', () => {
    expect(buildCreators([], { id: '7', pathName: 'team', displayName: null, type: 'organization' })).toEqual([
      { person_or_org: { type: 'organizational', name: 'team' } },
    ]);
  });

  it('should be empty without contributors or owner', () => {
    expect(buildCreators(null, null)).toEqual([]);
  });
});

describe('deposit', () => {
  let ctx: TestContext;
  let release: VcsRelease;

  beforeEach(async () => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);

    ctx = createTestContext();
    seedConnectedUser(ctx);
    ctx.remote.addRepository({ id: '42', fullName: 'testuser/project' });
    ctx.remote.zipballs.set('https://forge.test/archive/v1.0.0.zip', 'zip-bytes');
    const repo = await ctx.store.createRepository({
      provider: FAKE_PROVIDER,
      providerId: '42',
      fullName: 'testuser/project',
      defaultBranch: 'main',
      hook: '100',
      enabledByUserId: mockUser.id,
    });
    const event = await ctx.store.createWebhookEvent({
      receiverId: FAKE_PROVIDER,
      userId: mockUser.id,
      payload: fakeReleasePayload(),
    });
    const stored = await ctx.store.createRelease({
      provider: FAKE_PROVIDER,
      providerId: 'rel-1',
      tag: 'v1.0.0',
      repositoryId: repo.id,
      eventId: event.id,
    });
    release = await VcsRelease.load(stored, ctx.factory.forUser(mockUser.id), ctx.store, {
      zipballTimeoutSeconds: 5,
      maxContributors: 30,
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('buildRecordMetadata', () => {
    it('should describe the release and credit the contributors', async () => {
      ctx.remote.contributors.set('42', [
        { id: '1', username: 'alice', displayName: 'Alice', company: null, contributionsCount: 3 },
      ]);

      expect(await buildRecordMetadata(release, {})).toEqual({
        resource_type: { id: 'software' },
        title: 'testuser/project: First release',
        description: 'Release notes',
        version: 'v1.0.0',
        publication_date: '2024-03-01',
        creators: [{ person_or_org: { type: 'personal', name: 'Alice' } }],
        rights: [{ id: 'mit' }],
        related_identifiers: [
          {
            identifier: 'https://forge.test/testuser/project/releases/v1.0.0',
            scheme: 'url',
            relation_type: { id: 'issupplementto' },
          },
        ],
      });
    });

    it('should credit the owner when there are no contributors', async () => {
      ctx.remote.owners.set('42', { id: '5001', pathName: 'testuser', displayName: 'Test User', type: 'person' });

      const metadata = await buildRecordMetadata(release, {});

      expect(metadata.creators).toEqual([{ person_or_org: { type: 'personal', name: 'Test User' } }]);
    });

    it('should let the metadata file override derived keys', async () => {
      const metadata = await buildRecordMetadata(release, { title: 'Custom title', keywords: ['archive'] });

      expect(metadata.title).toBe('Custom title');
      expect(metadata.keywords).toEqual(['archive']);
      expect(metadata.version).toBe('v1.0.0');
    });
  });

  describe('RecordsApiDepositService', () => {
    const service = new RecordsApiDepositService({
      apiUrl: 'https://records.test',
      apiToken: 'test-token',
      metadataFile: METADATA_FILE,
    });

    it('should create, upload, commit and publish the record', async () => {
      ctx.remote.files.set(`42:v1.0.0:${METADATA_FILE}`, '{"keywords": ["archive"]}');
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ id: 'rec-1' }, 201))
        .mockResolvedValueOnce(jsonResponse([{ key: 'testuser/project-v1.0.0.zip' }], 201))
        .mockResolvedValueOnce(jsonResponse({ key: 'testuser/project-v1.0.0.zip' }))
        .mockResolvedValueOnce(jsonResponse({ key: 'testuser/project-v1.0.0.zip' }))
        .mockResolvedValueOnce(jsonResponse({ id: 'rec-1' }, 202));

      expect(await service.publish(release)).toEqual({ recordId: 'rec-1' });

      expect(mockFetch.mock.calls.map(([url, init]) => `${init.method} ${url}`)).toEqual([
        'POST https://records.test/api/records',
        'POST https://records.test/api/records/rec-1/draft/files',
        'PUT https://records.test/api/records/rec-1/draft/files/testuser%2Fproject-v1.0.0.zip/content',
        'POST https://records.test/api/records/rec-1/draft/files/testuser%2Fproject-v1.0.0.zip/commit',
        'POST https://records.test/api/records/rec-1/draft/actions/publish',
      ]);

      const [, createInit] = mockFetch.mock.calls[0];
      expect(createInit.headers.Authorization).toBe('Bearer test-token');
      const draft = JSON.parse(createInit.body);
      expect(draft.files).toEqual({ enabled: true });
      expect(draft.metadata.keywords).toEqual(['archive']);

      const [, uploadInit] = mockFetch.mock.calls[2];
      expect(uploadInit.headers['Content-Type']).toBe('application/octet-stream');
      expect(uploadInit.duplex).toBe('half');
    });

    it('should raise DepositRequestError when the API refuses', async () => {
      mockFetch.mockResolvedValueOnce(new Response('unavailable', { status: 503 }));

      await expect(service.publish(release)).rejects.toThrow(DepositRequestError);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should name the failing call', async () => {
      mockFetch.mockResolvedValueOnce(new Response('unavailable', { status: 503 }));

      await expect(service.publish(release)).rejects.toThrow('Records API answered 503 for /api/records');
    });

    it('should stop before any call on a broken metadata file', async () => {
      ctx.remote.files.set(`42:v1.0.0:${METADATA_FILE}`, '[]');

      await expect(service.publish(release)).rejects.toThrow(ReleaseMetadataError);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('without a records API', () => {
    it('should fail every publish', async () => {
      const service = createDepositService();

      expect(service).toBeInstanceOf(UnconfiguredDepositService);
      await expect(service.publish(release)).rejects.toThrow(
        'No records API is configured (DEPOSIT_API_URL, DEPOSIT_API_TOKEN)'
      );
    });
  });
});
