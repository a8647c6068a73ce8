import type { ConfigMap } from '@pulumi/pulumi/automation';

/** A stack config value; `{ value, secret: true }` is stored encrypted by the secrets provider. */
export type StackConfigValue = string | number | boolean | { value: string; secret: true };
export type StackConfigValues = Record<string, StackConfigValue>;

/**
 * Helper class providing utility methods shared by components, the automation layer and the CLI
 */
export class Helpers {
  /** Deterministic 32-bit FNV-1a, rendered as 8 hex chars */
  public static stableShortHash(input: string): string {
    let hash = 0x811c9dc5;
    for (let i = 0; i < input.length; i++) {
      hash ^= input.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193) >>> 0;
    }
    return ('0000000' + hash.toString(16)).slice(-8);
  }

  /**
   * Coerce a name into a valid service account id: 6-30 chars, lowercase letters,
   * digits and hyphens, starting with a letter and not ending with a hyphen.
   */
  public static normalizeAccountId(raw: string): string {
    let s = raw.toLowerCase().replace(/[^a-z0-9-]/g, '-');
    if (!/^[a-z]/.test(s)) s = `a-${s}`;
    if (s.length < 6) s = (s + '-aaaaaa').slice(0, 6);
    if (s.length > 30) s = `${s.slice(0, 21)}-${Helpers.stableShortHash(s)}`;
    if (s.endsWith('-')) s = `${s.slice(0, -1)}a`;
    return s;
  }

  /** Convert plain stack values into the Automation API's ConfigMap */
  public static convertPulumiConfigToWorkspace(values: StackConfigValues | undefined): ConfigMap {
    const out: ConfigMap = {};
    for (const [key, raw] of Object.entries(values ?? {})) {
      out[key] = typeof raw === 'object'
        ? { value: raw.value, secret: true }
        : { value: String(raw) };
    }
    return out;
  }

  /** Set debug environment variables read by the engine and the bridged provider */
  public static setupDebugFlags(debugLevel?: 'debug' | 'trace'): void {
    if (!debugLevel) return;
    process.env['PULUMI_LOG_LEVEL'] = debugLevel;
    process.env['PULUMI_LOG_FLOW'] = 'true';
    process.env['TF_LOG'] = debugLevel;
  }

  public static isDebug(): boolean {
    const level = process.env['PULUMI_LOG_LEVEL'];
    return level === 'debug' || level === 'trace';
  }
}
