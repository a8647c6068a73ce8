/**
 * Declared platform values and the merge of per-environment overrides onto them.
 *
 * Sections merge field by field. Keyed maps (service accounts, node pools) merge per
 * key, and lists (roles, ranges, taints) are replaced rather than concatenated.
 */
import { serviceAccountId } from './iam';
import type { ServiceAccountConfig } from './iam';
import type { AuthorizedNetwork, NodePoolConfig, ReleaseChannel } from './gke';
import { ConfigError } from '../../../core/config';
import { assertCidrs, validateNodeBounds, validateRole } from '../../../utils/validation';

export interface NetworkSettings {
  cidr: string;
  podsSecondaryCidr: string;
  servicesSecondaryCidr: string;
  nat: boolean;
}

export interface FirewallSettings {
  iapRanges: string[];
  healthCheckRanges: string[];
  nodeTag: string;
}

export interface ClusterSettings {
  releaseChannel: ReleaseChannel;
  deletionProtection: boolean;
  privateNodes: boolean;
  masterCidr: string;
  masterAuthorizedNetworks: AuthorizedNetwork[];
}

export interface RegistrySettings {
  repositoryId: string;
  /** Service account keys granted pull access */
  readers: string[];
  /** Service account keys granted push access */
  writers: string[];
  untaggedRetentionDays: number;
}

export interface PlatformSettings {
  network: NetworkSettings;
  firewall: FirewallSettings;
  cluster: ClusterSettings;
  serviceAccounts: Record<string, ServiceAccountConfig>;
  nodePools: Record<string, NodePoolConfig>;
  registry: RegistrySettings;
}

/** Per-environment overrides; anything left out keeps its declared value */
export interface PlatformOverrides {
  network?: Partial<NetworkSettings>;
  firewall?: Partial<FirewallSettings>;
  cluster?: Partial<ClusterSettings>;
  serviceAccounts?: Record<string, ServiceAccountConfig>;
  nodePools?: Record<string, NodePoolConfig>;
  registry?: Partial<RegistrySettings>;
}

/** The account the node pools run as; must always be present */
export const NODE_SERVICE_ACCOUNT = 'nodes';

export const DEFAULT_REGION = 'us-central1';

export const DEFAULT_NETWORK: NetworkSettings = {
  cidr: '10.10.0.0/20',
  podsSecondaryCidr: '10.20.0.0/14',
  servicesSecondaryCidr: '10.24.0.0/20',
  nat: true,
};

export const DEFAULT_FIREWALL: FirewallSettings = {
  iapRanges: ['35.235.240.0/20'],
  healthCheckRanges: ['130.211.0.0/22', '35.191.0.0/16'],
  nodeTag: 'gke-node',
};

export const DEFAULT_CLUSTER: Omit<ClusterSettings, 'deletionProtection'> = {
  releaseChannel: 'REGULAR',
  privateNodes: true,
  masterCidr: '172.16.0.0/28',
  masterAuthorizedNetworks: [],
};

export const DEFAULT_SERVICE_ACCOUNTS: Record<string, ServiceAccountConfig> = {
  [NODE_SERVICE_ACCOUNT]: {
    displayName: 'GKE nodes',
    roles: [
      'roles/logging.logWriter',
      'roles/monitoring.metricWriter',
      'roles/monitoring.viewer',
      'roles/stackdriver.resourceMetadata.writer',
    ],
  },
  deployer: {
    displayName: 'CI deployer',
    roles: ['roles/container.developer'],
  },
  workload: {
    displayName: 'Application workloads',
    roles: ['roles/secretmanager.secretAccessor', 'roles/cloudtrace.agent'],
    workloadIdentity: { namespace: 'default', ksaName: 'app' },
  },
  telemetry: {
    displayName: 'Telemetry collector',
    roles: ['roles/monitoring.metricWriter', 'roles/cloudtrace.agent', 'roles/logging.logWriter'],
    workloadIdentity: { namespace: 'observability', ksaName: 'otel-collector' },
  },
};

export const DEFAULT_NODE_POOLS: Record<string, NodePoolConfig> = {
  general: {
    minNodes: 1,
    maxNodes: 3,
    machineType: 'e2-standard-4',
    diskSizeGb: 50,
    diskType: 'pd-balanced',
  },
  spot: {
    minNodes: 0,
    maxNodes: 5,
    machineType: 'e2-standard-4',
    diskSizeGb: 50,
    diskType: 'pd-balanced',
    spot: true,
    taints: [{ key: 'cloud.google.com/gke-spot', value: 'true', effect: 'NO_SCHEDULE' }],
  },
};

export const DEFAULT_REGISTRY: Omit<RegistrySettings, 'repositoryId'> = {
  readers: [NODE_SERVICE_ACCOUNT],
  writers: ['deployer'],
  untaggedRetentionDays: 30,
};

function mergeKeyed<T extends object>(base: Record<string, T>, overrides: Record<string, T> | undefined): Record<string, T> {
  const out: Record<string, T> = { ...base };
  for (const [key, value] of Object.entries(overrides ?? {})) {
    out[key] = { ...(out[key] ?? {}), ...value };
  }
  return out;
}

/**
 * Merge overrides onto the declared values for one environment.
 * Deletion protection defaults to on for `prod` only.
 */
export function resolvePlatformSettings(name: string, environment: string, overrides: PlatformOverrides = {}): PlatformSettings {
  return {
    network: { ...DEFAULT_NETWORK, ...overrides.network },
    firewall: { ...DEFAULT_FIREWALL, ...overrides.firewall },
    cluster: {
      ...DEFAULT_CLUSTER,
      deletionProtection: environment.toLowerCase() === 'prod',
      ...overrides.cluster,
    },
    serviceAccounts: mergeKeyed(DEFAULT_SERVICE_ACCOUNTS, overrides.serviceAccounts),
    nodePools: mergeKeyed(DEFAULT_NODE_POOLS, overrides.nodePools),
    registry: {
      repositoryId: `${name}-containers`,
      ...DEFAULT_REGISTRY,
      ...overrides.registry,
    },
  };
}

/**
 * Throws ConfigError naming the first invalid setting.
 * `name` is the platform name the service account ids are derived from.
 */
export function validatePlatformSettings(settings: PlatformSettings, name: string): void {
  assertCidrs('network.cidr', [settings.network.cidr]);
  assertCidrs('network.podsSecondaryCidr', [settings.network.podsSecondaryCidr]);
  assertCidrs('network.servicesSecondaryCidr', [settings.network.servicesSecondaryCidr]);
  assertCidrs('firewall.iapRanges', settings.firewall.iapRanges);
  assertCidrs('firewall.healthCheckRanges', settings.firewall.healthCheckRanges);
  if (!/^[a-z][a-z0-9-]{0,62}$/.test(settings.firewall.nodeTag)) {
    throw new ConfigError('firewall.nodeTag', `'${settings.firewall.nodeTag}' is not a valid network tag`);
  }
  if (settings.cluster.privateNodes) {
    assertCidrs('cluster.masterCidr', [settings.cluster.masterCidr]);
    if (!settings.cluster.masterCidr.endsWith('/28')) {
      throw new ConfigError('cluster.masterCidr', `control plane range must be a /28 (got ${settings.cluster.masterCidr})`);
    }
  }
  settings.cluster.masterAuthorizedNetworks.forEach((n, idx) => {
    assertCidrs(`cluster.masterAuthorizedNetworks[${idx}].cidrBlock`, [n.cidrBlock]);
  });

  const enabledPools = Object.entries(settings.nodePools).filter(([, p]) => p.enabled !== false);
  if (enabledPools.length === 0) {
    throw new ConfigError('nodePools', 'at least one node pool must be enabled');
  }
  for (const [key, pool] of enabledPools) {
    const minNodes = pool.minNodes ?? 1;
    const bounds = validateNodeBounds(minNodes, pool.maxNodes ?? minNodes);
    if (!bounds.valid) throw new ConfigError(`nodePools.${key}`, bounds.error ?? 'invalid node bounds');
    if (pool.machineType !== undefined && pool.machineType.trim() === '') {
      throw new ConfigError(`nodePools.${key}.machineType`, 'machine type must not be empty');
    }
  }

  const accounts = Object.entries(settings.serviceAccounts).filter(([, a]) => a.enabled !== false);
  if (!accounts.some(([key]) => key === NODE_SERVICE_ACCOUNT)) {
    throw new ConfigError(`serviceAccounts.${NODE_SERVICE_ACCOUNT}`, 'the node service account cannot be disabled');
  }
  const accountIds = new Map<string, string>();
  for (const [key, account] of accounts) {
    (account.roles ?? []).forEach((role, idx) => {
      const result = validateRole(role);
      if (!result.valid) throw new ConfigError(`serviceAccounts.${key}.roles[${idx}]`, result.error ?? 'invalid role');
    });
    const accountId = serviceAccountId(name, key, account);
    const clash = accountIds.get(accountId);
    if (clash) {
      throw new ConfigError(`serviceAccounts.${key}.accountId`, `'${accountId}' is already used by '${clash}'`);
    }
    accountIds.set(accountId, key);
  }

  const accountKeys = new Set(accounts.map(([key]) => key));
  for (const kind of ['readers', 'writers'] as const) {
    settings.registry[kind].forEach((key, idx) => {
      if (!accountKeys.has(key)) {
        throw new ConfigError(`registry.${kind}[${idx}]`, `unknown service account '${key}'`);
      }
    });
  }
  if (!/^[a-z]([a-z0-9-]*[a-z0-9])?$/.test(settings.registry.repositoryId)) {
    throw new ConfigError('registry.repositoryId', `'${settings.registry.repositoryId}' is not a valid repository id`);
  }
  if (!Number.isInteger(settings.registry.untaggedRetentionDays) || settings.registry.untaggedRetentionDays < 0) {
    throw new ConfigError('registry.untaggedRetentionDays', 'must be a non-negative integer');
  }
}
