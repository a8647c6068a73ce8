import { describe, expect, it } from 'vitest';
import { assertCidrs, validateCidr, validateNodeBounds, validateRole } from '../../src/utils/validation';
import { ConfigError } from '../../src/core/config';

describe('validateCidr', () => {
  it('accepts a well-formed range', () => {
    expect(validateCidr('10.10.0.0/20')).toEqual({ valid: true });
    expect(validateCidr('0.0.0.0/0')).toEqual({ valid: true });
  });

  it('rejects a missing prefix', () => {
    expect(validateCidr('10.10.0.0')).toEqual({
      valid: false,
      error: 'Invalid CIDR format: 10.10.0.0. Expected format: x.x.x.x/y',
    });
  });

  it('rejects an octet above 255', () => {
    expect(validateCidr('10.256.0.0/16')).toEqual({ valid: false, error: 'Invalid IP octet in CIDR: 10.256.0.0/16' });
  });

  it('rejects a prefix above 32', () => {
    expect(validateCidr('10.0.0.0/33')).toEqual({
      valid: false,
      error: 'Invalid prefix length in CIDR: 10.0.0.0/33. Must be 0-32',
    });
  });
});

describe('assertCidrs', () => {
  it('names the path without an index for a single range', () => {
    expect(() => assertCidrs('network.cidr', ['bad'])).toThrow(
      "Invalid configuration at 'network.cidr': Invalid CIDR format: bad. Expected format: x.x.x.x/y",
    );
  });

  it('names the offending index in a list', () => {
    expect(() => assertCidrs('firewall.iapRanges', ['35.235.240.0/20', '1.2.3.4/40'])).toThrow(
      "Invalid configuration at 'firewall.iapRanges[1]': Invalid prefix length in CIDR: 1.2.3.4/40. Must be 0-32",
    );
  });

  it('rejects an empty list', () => {
    expect(() => assertCidrs('firewall.healthCheckRanges', [])).toThrow(ConfigError);
  });
});

describe('validateNodeBounds', () => {
  it('accepts autoscaling and fixed bounds', () => {
    expect(validateNodeBounds(0, 5)).toEqual({ valid: true });
    expect(validateNodeBounds(2, 2)).toEqual({ valid: true });
  });

  it('rejects inverted bounds', () => {
    expect(validateNodeBounds(4, 2)).toEqual({ valid: false, error: 'minNodes (4) must not exceed maxNodes (2)' });
  });

  it('rejects a zero maximum', () => {
    expect(validateNodeBounds(0, 0)).toEqual({ valid: false, error: 'maxNodes must be >= 1 (got 0)' });
  });

  it('rejects fractional and negative counts', () => {
    expect(validateNodeBounds(1.5, 3).valid).toBe(false);
    expect(validateNodeBounds(-1, 3)).toEqual({ valid: false, error: 'minNodes must be >= 0 (got -1)' });
  });
});

describe('validateRole', () => {
  it('accepts predefined and custom roles', () => {
    expect(validateRole('roles/container.developer').valid).toBe(true);
    expect(validateRole('projects/acme-dev/roles/customDeployer').valid).toBe(true);
    expect(validateRole('organizations/123456/roles/auditor').valid).toBe(true);
  });

  it('rejects anything else', () => {
    expect(validateRole('container.developer')).toEqual({ valid: false, error: 'Invalid IAM role: container.developer' });
  });
});
