/**
 * Bootstrap of what must exist before the first stack operation: the state bucket
 * and, for gcpkms:// secrets providers, the key ring and crypto key. Idempotent.
 */
import { Storage } from '@google-cloud/storage';
import { KeyManagementServiceClient } from '@google-cloud/kms';
import type { Environment } from '../core/environment';
import { ConfigError } from '../core/config';
import { DEFAULT_REGION } from '../components/infra/gcp/defaults';

export interface StateBucketClient {
  bucketExists(bucket: string): Promise<boolean>;
  /** Creates a versioned bucket with uniform bucket-level access */
  createBucket(bucket: string, opts: { location: string }): Promise<void>;
}

export interface GcpKmsKey {
  projectId: string;
  location: string;
  keyRingId: string;
  cryptoKeyId: string;
}

export interface KmsKeyClient {
  keyRingExists(key: GcpKmsKey): Promise<boolean>;
  createKeyRing(key: GcpKmsKey): Promise<void>;
  cryptoKeyExists(key: GcpKmsKey): Promise<boolean>;
  createCryptoKey(key: GcpKmsKey): Promise<void>;
}

export interface BootstrapClients {
  storage: StateBucketClient;
  kms: KmsKeyClient;
}

export interface BootstrapResult {
  bucket: string;
  bucketCreated: boolean;
  kmsKey?: GcpKmsKey;
  keyRingCreated: boolean;
  cryptoKeyCreated: boolean;
}

const KMS_URL = /^gcpkms:\/\/projects\/([^/]+)\/locations\/([^/]+)\/keyRings\/([^/]+)\/cryptoKeys\/([^/?]+)$/;

/** Split a gcpkms://projects/P/locations/L/keyRings/R/cryptoKeys/K URL */
export function parseGcpKmsUrl(providerUrl: string): GcpKmsKey {
  const match = KMS_URL.exec(providerUrl);
  const [, projectId, location, keyRingId, cryptoKeyId] = match ?? [];
  if (!projectId || !location || !keyRingId || !cryptoKeyId) {
    throw new ConfigError('secretsProvider', `invalid gcpkms URL: ${providerUrl}`);
  }
  return { projectId, location, keyRingId, cryptoKeyId };
}

function isNotFound(error: unknown): boolean {
  // gRPC status 5 = NOT_FOUND
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 5;
}

export function gcsStateBucketClient(projectId?: string): StateBucketClient {
  const keyFilename = process.env['GOOGLE_APPLICATION_CREDENTIALS'];
  const storage = new Storage({
    ...(projectId ? { projectId } : {}),
    ...(keyFilename ? { keyFilename } : {}),
  });
  return {
    async bucketExists(bucket) {
      const [exists] = await storage.bucket(bucket).exists();
      return exists;
    },
    async createBucket(bucket, opts) {
      await storage.createBucket(bucket, {
        location: opts.location,
        versioning: { enabled: true },
        iamConfiguration: { uniformBucketLevelAccess: { enabled: true } },
      });
    },
  };
}

export function cloudKmsKeyClient(): KmsKeyClient {
  const keyFilename = process.env['GOOGLE_APPLICATION_CREDENTIALS'];
  const kmsClient = new KeyManagementServiceClient(keyFilename ? { keyFilename } : {});
  const exists = async (get: () => Promise<unknown>): Promise<boolean> => {
    try {
      await get();
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  };
  return {
    keyRingExists: (k) => exists(() => kmsClient.getKeyRing({ name: kmsClient.keyRingPath(k.projectId, k.location, k.keyRingId) })),
    async createKeyRing(k) {
      await kmsClient.createKeyRing({ parent: kmsClient.locationPath(k.projectId, k.location), keyRingId: k.keyRingId });
    },
    cryptoKeyExists: (k) => exists(() => kmsClient.getCryptoKey({
      name: kmsClient.cryptoKeyPath(k.projectId, k.location, k.keyRingId, k.cryptoKeyId),
    })),
    async createCryptoKey(k) {
      await kmsClient.createCryptoKey({
        parent: kmsClient.keyRingPath(k.projectId, k.location, k.keyRingId),
        cryptoKeyId: k.cryptoKeyId,
        cryptoKey: { purpose: 'ENCRYPT_DECRYPT' },
      });
    },
  };
}

export async function ensureStateBucket(
  client: StateBucketClient,
  bucket: string,
  opts: { location: string },
): Promise<boolean> {
  if (await client.bucketExists(bucket)) {
    console.log(`  ✅ GCS bucket ${bucket} already exists`);
    return false;
  }
  console.log(`  📦 Creating GCS bucket: ${bucket}`);
  await client.createBucket(bucket, opts);
  console.log(`  ✅ GCS bucket ${bucket} created successfully`);
  return true;
}

export async function ensureKmsKey(client: KmsKeyClient, key: GcpKmsKey): Promise<{ keyRingCreated: boolean; cryptoKeyCreated: boolean }> {
  const ring = `projects/${key.projectId}/locations/${key.location}/keyRings/${key.keyRingId}`;
  let keyRingCreated = false;
  if (await client.keyRingExists(key)) {
    console.log(`  ✅ Key ring ${ring} already exists`);
  } else {
    console.log(`  🔐 Creating key ring: ${ring}`);
    await client.createKeyRing(key);
    keyRingCreated = true;
  }

  // A freshly created ring has no keys
  let cryptoKeyCreated = false;
  if (!keyRingCreated && await client.cryptoKeyExists(key)) {
    console.log(`  ✅ Crypto key ${ring}/cryptoKeys/${key.cryptoKeyId} already exists`);
  } else {
    console.log(`  🔐 Creating crypto key: ${ring}/cryptoKeys/${key.cryptoKeyId}`);
    await client.createCryptoKey(key);
    cryptoKeyCreated = true;
  }
  return { keyRingCreated, cryptoKeyCreated };
}

/**
 * Bootstrap backend storage and the secrets provider for one environment.
 */
export async function bootstrapEnvironment(env: Environment, clients?: Partial<BootstrapClients>): Promise<BootstrapResult> {
  const backend = env.backend;
  const projectId = env.gcpProject;
  const storage = clients?.storage ?? gcsStateBucketClient(projectId);
  const bucketCreated = await ensureStateBucket(storage, backend.bucket, {
    location: backend.location ?? env.gcpRegion ?? DEFAULT_REGION,
  });

  const provider = env.secretsProvider;
  if (!provider || !provider.startsWith('gcpkms://')) {
    return { bucket: backend.bucket, bucketCreated, keyRingCreated: false, cryptoKeyCreated: false };
  }
  const kmsKey = parseGcpKmsUrl(provider);
  const created = await ensureKmsKey(clients?.kms ?? cloudKmsKeyClient(), kmsKey);
  return { bucket: backend.bucket, bucketCreated, kmsKey, ...created };
}
