import { describe, expect, it } from 'vitest';
import { backendUrlFor, ConfigError, parseBackendUrl } from '../../src/core/config';

describe('backendUrlFor', () => {
  it('joins bucket and prefix', () => {
    expect(backendUrlFor({ bucket: 'acme-state', prefix: 'gke-foundation' })).toBe('gs://acme-state/gke-foundation');
  });

  it('strips surrounding slashes from the prefix', () => {
    expect(backendUrlFor({ bucket: 'acme-state', prefix: '/platform/gke/' })).toBe('gs://acme-state/platform/gke');
  });

  it('omits an empty prefix', () => {
    expect(backendUrlFor({ bucket: 'acme-state' })).toBe('gs://acme-state');
    expect(backendUrlFor({ bucket: 'acme-state', prefix: '/' })).toBe('gs://acme-state');
  });

  it('rejects invalid bucket names', () => {
    expect(() => backendUrlFor({ bucket: 'Acme_State' })).toThrow(ConfigError);
    expect(() => backendUrlFor({ bucket: 'ab' })).toThrow(
      "Invalid configuration at 'backend.bucket': 'ab' is not a valid bucket name",
    );
  });
});

describe('parseBackendUrl', () => {
  it('splits a gs URL', () => {
    expect(parseBackendUrl('gs://acme-state/platform/gke')).toEqual({ bucket: 'acme-state', prefix: 'platform/gke' });
    expect(parseBackendUrl('gs://acme-state')).toEqual({ bucket: 'acme-state' });
  });

  it('rejects other schemes', () => {
    expect(() => parseBackendUrl('s3://acme-state/gke')).toThrow(ConfigError);
  });
});

describe('ConfigError', () => {
  it('carries the offending path', () => {
    const error = new ConfigError('registry.readers[0]', "unknown service account 'ci'");
    expect(error.name).toBe('ConfigError');
    expect(error.path).toBe('registry.readers[0]');
    expect(error.message).toBe("Invalid configuration at 'registry.readers[0]': unknown service account 'ci'");
  });
});
