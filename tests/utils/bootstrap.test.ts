import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  bootstrapEnvironment,
  ensureKmsKey,
  ensureStateBucket,
  parseGcpKmsUrl,
} from '../../src/utils/bootstrap';
import type { GcpKmsKey, KmsKeyClient, StateBucketClient } from '../../src/utils/bootstrap';
import { Project } from '../../src/core/project';
import { ConfigError } from '../../src/core/config';

class FakeBuckets implements StateBucketClient {
  readonly created: { bucket: string; location: string }[] = [];

  constructor(private readonly existing: Set<string> = new Set()) {}

  async bucketExists(bucket: string) {
    return this.existing.has(bucket);
  }

  async createBucket(bucket: string, opts: { location: string }) {
    this.created.push({ bucket, location: opts.location });
    this.existing.add(bucket);
  }
}

class FakeKms implements KmsKeyClient {
  readonly calls: string[] = [];

  constructor(private ring = false, private key = false) {}

  async keyRingExists() {
    this.calls.push('keyRingExists');
    return this.ring;
  }

  async createKeyRing() {
    this.calls.push('createKeyRing');
    this.ring = true;
  }

  async cryptoKeyExists() {
    this.calls.push('cryptoKeyExists');
    return this.key;
  }

  async createCryptoKey() {
    this.calls.push('createCryptoKey');
    this.key = true;
  }
}

const KMS_URL = 'gcpkms://projects/acme-ops/locations/global/keyRings/pulumi/cryptoKeys/state';
const KEY: GcpKmsKey = { projectId: 'acme-ops', location: 'global', keyRingId: 'pulumi', cryptoKeyId: 'state' };

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseGcpKmsUrl', () => {
  it('splits the key resource path', () => {
    expect(parseGcpKmsUrl(KMS_URL)).toEqual(KEY);
  });

  it('rejects malformed URLs', () => {
    expect(() => parseGcpKmsUrl('gcpkms://projects/acme-ops/keyRings/pulumi')).toThrow(ConfigError);
    expect(() => parseGcpKmsUrl('awskms://alias/state')).toThrow("Invalid configuration at 'secretsProvider': invalid gcpkms URL: awskms://alias/state");
  });
});

describe('ensureStateBucket', () => {
  it('creates a missing bucket in the given location', async () => {
    const buckets = new FakeBuckets();
    expect(await ensureStateBucket(buckets, 'acme-state', { location: 'europe-west1' })).toBe(true);
    expect(buckets.created).toEqual([{ bucket: 'acme-state', location: 'europe-west1' }]);
  });

  it('leaves an existing bucket alone', async () => {
    const buckets = new FakeBuckets(new Set(['acme-state']));
    expect(await ensureStateBucket(buckets, 'acme-state', { location: 'europe-west1' })).toBe(false);
    expect(buckets.created).toEqual([]);
  });
});

describe('ensureKmsKey', () => {
  it('creates ring and key without probing a fresh ring', async () => {
    const kms = new FakeKms();
    expect(await ensureKmsKey(kms, KEY)).toEqual({ keyRingCreated: true, cryptoKeyCreated: true });
    expect(kms.calls).toEqual(['keyRingExists', 'createKeyRing', 'createCryptoKey']);
  });

  it('creates only the key when the ring exists', async () => {
    const kms = new FakeKms(true, false);
    expect(await ensureKmsKey(kms, KEY)).toEqual({ keyRingCreated: false, cryptoKeyCreated: true });
    expect(kms.calls).toEqual(['keyRingExists', 'cryptoKeyExists', 'createCryptoKey']);
  });

  it('is a no-op when both exist', async () => {
    const kms = new FakeKms(true, true);
    expect(await ensureKmsKey(kms, KEY)).toEqual({ keyRingCreated: false, cryptoKeyCreated: false });
    expect(kms.calls).toEqual(['keyRingExists', 'cryptoKeyExists']);
  });
});

describe('bootstrapEnvironment', () => {
  const project = new Project('gke-foundation', {
    dev: { settings: { config: { 'gcp:project': 'acme-dev', 'gcp:region': 'europe-west1' } } },
    prod: { settings: { backend: { bucket: 'acme-prod-state', location: 'EU' }, config: { 'gcp:project': 'acme-prod' } } },
  }, { backend: { bucket: 'acme-state', prefix: 'gke-foundation' }, secretsProvider: KMS_URL });

  it('creates the bucket in the environment region and the KMS key', async () => {
    const storage = new FakeBuckets();
    const kms = new FakeKms();
    const result = await bootstrapEnvironment(project.env('dev'), { storage, kms });
    expect(storage.created).toEqual([{ bucket: 'acme-state', location: 'europe-west1' }]);
    expect(result).toEqual({
      bucket: 'acme-state',
      bucketCreated: true,
      kmsKey: KEY,
      keyRingCreated: true,
      cryptoKeyCreated: true,
    });
  });

  it('prefers the configured bucket location', async () => {
    const storage = new FakeBuckets();
    await bootstrapEnvironment(project.env('prod'), { storage, kms: new FakeKms(true, true) });
    expect(storage.created).toEqual([{ bucket: 'acme-prod-state', location: 'EU' }]);
  });

  it('falls back to the default region and skips KMS without a gcpkms provider', async () => {
    const plain = new Project('gke-foundation', { qa: {} }, { backend: { bucket: 'acme-state' } });
    const storage = new FakeBuckets();
    const kms = new FakeKms();
    const result = await bootstrapEnvironment(plain.env('qa'), { storage, kms });
    expect(storage.created).toEqual([{ bucket: 'acme-state', location: 'us-central1' }]);
    expect(kms.calls).toEqual([]);
    expect(result).toEqual({ bucket: 'acme-state', bucketCreated: true, keyRingCreated: false, cryptoKeyCreated: false });
  });
});
