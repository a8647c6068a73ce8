/**
 * Input validation for platform settings. Runs before any resource is declared so a
 * bad override fails the preview instead of surfacing as a provider error mid-apply.
 */
import { ConfigError } from '../core/config';

export interface ValidationResult {
  readonly valid: boolean;
  readonly error?: string;
}

export function validateCidr(cidr: string): ValidationResult {
  const match = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/.exec(cidr);
  if (!match) {
    return { valid: false, error: `Invalid CIDR format: ${cidr}. Expected format: x.x.x.x/y` };
  }
  const octets = match.slice(1, 5).map(Number);
  if (octets.some(o => o > 255)) {
    return { valid: false, error: `Invalid IP octet in CIDR: ${cidr}` };
  }
  const prefix = Number(match[5]);
  if (prefix > 32) {
    return { valid: false, error: `Invalid prefix length in CIDR: ${cidr}. Must be 0-32` };
  }
  return { valid: true };
}

/** Throws ConfigError for the first invalid CIDR, naming its config path */
export function assertCidrs(path: string, cidrs: string[]): void {
  if (cidrs.length === 0) {
    throw new ConfigError(path, 'at least one CIDR must be provided');
  }
  cidrs.forEach((cidr, idx) => {
    const result = validateCidr(cidr);
    if (!result.valid) {
      throw new ConfigError(cidrs.length > 1 ? `${path}[${idx}]` : path, result.error ?? 'invalid CIDR');
    }
  });
}

export function validateNodeBounds(minNodes: number, maxNodes: number): ValidationResult {
  if (!Number.isInteger(minNodes) || !Number.isInteger(maxNodes)) {
    return { valid: false, error: `Node counts must be integers (got min=${minNodes}, max=${maxNodes})` };
  }
  if (minNodes < 0) {
    return { valid: false, error: `minNodes must be >= 0 (got ${minNodes})` };
  }
  if (maxNodes < 1) {
    return { valid: false, error: `maxNodes must be >= 1 (got ${maxNodes})` };
  }
  if (minNodes > maxNodes) {
    return { valid: false, error: `minNodes (${minNodes}) must not exceed maxNodes (${maxNodes})` };
  }
  return { valid: true };
}

const ROLE_PATTERN = /^(roles|projects\/[^/]+\/roles|organizations\/\d+\/roles)\/[A-Za-z0-9_.]+$/;

export function validateRole(role: string): ValidationResult {
  return ROLE_PATTERN.test(role)
    ? { valid: true }
    : { valid: false, error: `Invalid IAM role: ${role}` };
}
