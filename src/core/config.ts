/**
 * Project configuration - where stack state lives and how secrets in it are encrypted.
 *
 * @example
 * ```typescript
 * const config: ProjectConfig = {
 *   backend: { bucket: 'acme-platform-state', prefix: 'gke-foundation' },
 *   secretsProvider: 'gcpkms://projects/acme-platform/locations/global/keyRings/pulumi/cryptoKeys/state',
 * };
 * ```
 */

/** Remote state backend: an object-storage bucket and the key prefix stacks are written under */
export interface BackendConfig {
  bucket: string;
  prefix?: string;
  /** Bucket location used when bootstrap creates it (defaults to the environment region) */
  location?: string;
}

export interface ProjectConfig {
  backend: BackendConfig;
  /** Secrets provider URL (e.g., gcpkms://...); the engine's passphrase provider is used when unset */
  secretsProvider?: string;
}

/** Raised when configuration is missing or invalid; `path` names the offending setting */
export class ConfigError extends Error {
  constructor(public readonly path: string, detail: string) {
    super(`Invalid configuration at '${path}': ${detail}`);
    this.name = 'ConfigError';
  }
}

const BUCKET_PATTERN = /^[a-z0-9][a-z0-9._-]{1,61}[a-z0-9]$/;

/** Backend URL understood by the engine: gs://<bucket>[/<prefix>] */
export function backendUrlFor(backend: BackendConfig): string {
  if (!BUCKET_PATTERN.test(backend.bucket)) {
    throw new ConfigError('backend.bucket', `'${backend.bucket}' is not a valid bucket name`);
  }
  const prefix = (backend.prefix ?? '').replace(/^\/+|\/+$/g, '');
  return prefix ? `gs://${backend.bucket}/${prefix}` : `gs://${backend.bucket}`;
}

/** Inverse of backendUrlFor; only gs:// backends are supported */
export function parseBackendUrl(url: string): { bucket: string; prefix?: string } {
  const parsed = new URL(url);
  if (parsed.protocol !== 'gs:') {
    throw new ConfigError('backend', `unsupported backend URL '${url}', expected gs://<bucket>/<prefix>`);
  }
  const prefix = parsed.pathname.replace(/^\/+|\/+$/g, '');
  return prefix ? { bucket: parsed.hostname, prefix } : { bucket: parsed.hostname };
}
