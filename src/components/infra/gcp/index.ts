import * as pulumi from '@pulumi/pulumi';
import { Network } from './network';
import { Firewall } from './firewall';
import { Iam, WorkloadIdentity } from './iam';
import type { WorkloadIdentityBinding } from './iam';
import { Gke } from './gke';
import { Registry } from './registry';
import {
  DEFAULT_REGION,
  NODE_SERVICE_ACCOUNT,
  resolvePlatformSettings,
  validatePlatformSettings,
} from './defaults';
import type { PlatformOverrides, PlatformSettings } from './defaults';
import { ConfigError } from '../../../core/config';

export type GcpConfig = PlatformOverrides & {
  /** GCP project; falls back to the `gcp:project` stack config */
  projectId?: string;
  /** Region for the subnet, cluster and registry; falls back to `gcp:region` */
  region?: string;
  /** Environment id; drives per-environment defaults such as deletion protection */
  environment?: string;
};

export interface GcpOutput {
  networkName: pulumi.Output<string>;
  networkSelfLink: pulumi.Output<string>;
  subnetworkName: pulumi.Output<string>;
  subnetworkSelfLink: pulumi.Output<string>;
  podsRangeName: string;
  servicesRangeName: string;
  clusterName: pulumi.Output<string>;
  clusterEndpoint: pulumi.Output<string>;
  clusterLocation: string;
  nodePools: Record<string, pulumi.Output<string>>;
  serviceAccounts: Record<string, pulumi.Output<string>>;
  registryId: pulumi.Output<string>;
  registryUrl: pulumi.Output<string>;
  kubeconfig: pulumi.Output<string>;
}

/**
 * The whole platform for one environment: network, firewall, service accounts,
 * cluster and registry, declared in that order with each feeding the next.
 */
export class Gcp extends pulumi.ComponentResource {
  public readonly settings: PlatformSettings;
  public readonly projectId: string;
  public readonly region: string;
  public readonly network: Network;
  public readonly firewall: Firewall;
  public readonly iam: Iam;
  public readonly workloadIdentity: WorkloadIdentity;
  public readonly gke: Gke;
  public readonly registry: Registry;
  public readonly outputs: GcpOutput;

  constructor(name: string, args: GcpConfig = {}, opts?: pulumi.ComponentResourceOptions) {
    super('foundation:infra:gcp', name, {}, opts);

    const cfg = new pulumi.Config('gcp');
    this.projectId = args.projectId ?? cfg.get('project') ?? '';
    if (!this.projectId) {
      throw new ConfigError('gcp:project', 'set projectId or the gcp:project stack config');
    }
    this.region = args.region ?? cfg.get('region') ?? DEFAULT_REGION;

    this.settings = resolvePlatformSettings(name, args.environment ?? name, args);
    validatePlatformSettings(this.settings, name);
    const s = this.settings;
    pulumi.log.info(`Declaring GKE platform '${name}' in ${this.projectId}/${this.region}`, this);

    this.network = new Network(name, {
      region: this.region,
      ...s.network,
    }, { parent: this });

    this.firewall = new Firewall(name, {
      networkId: this.network.network.id,
      internalRanges: this.network.internalRanges,
      ...s.firewall,
    }, { parent: this });

    this.iam = new Iam(name, {
      projectId: this.projectId,
      serviceAccounts: s.serviceAccounts,
    }, { parent: this });

    const nodeAccount = this.iam.accounts[NODE_SERVICE_ACCOUNT];
    if (!nodeAccount) {
      throw new ConfigError(`serviceAccounts.${NODE_SERVICE_ACCOUNT}`, 'the node service account is required');
    }

    this.gke = new Gke(name, {
      name: `${name}-gke`,
      projectId: this.projectId,
      location: this.region,
      network: this.network,
      nodeServiceAccount: nodeAccount,
      nodeServiceAccountBindings: this.iam.roleBindings[NODE_SERVICE_ACCOUNT] ?? [],
      nodeTag: s.firewall.nodeTag,
      releaseChannel: s.cluster.releaseChannel,
      deletionProtection: s.cluster.deletionProtection,
      privateNodes: s.cluster.privateNodes,
      masterCidr: s.cluster.masterCidr,
      masterAuthorizedNetworks: s.cluster.masterAuthorizedNetworks,
      nodePools: s.nodePools,
    }, { parent: this, dependsOn: [this.firewall] });

    const bindings: Record<string, WorkloadIdentityBinding> = {};
    for (const [key, account] of Object.entries(s.serviceAccounts)) {
      if (account.enabled !== false && account.workloadIdentity) bindings[key] = account.workloadIdentity;
    }
    this.workloadIdentity = new WorkloadIdentity(name, {
      projectId: this.projectId,
      accounts: this.iam.accounts,
      bindings,
    }, { parent: this, dependsOn: [this.gke.cluster] });

    const memberFor = (key: string): pulumi.Output<string> => {
      const email = this.iam.emails[key];
      if (!email) throw new ConfigError(`serviceAccounts.${key}`, 'no such service account');
      return pulumi.interpolate`serviceAccount:${email}`;
    };
    this.registry = new Registry(`${name}-registry`, {
      projectId: this.projectId,
      location: this.region,
      repositoryId: s.registry.repositoryId,
      description: `Container images for the ${name} GKE platform`,
      readers: s.registry.readers.map(memberFor),
      writers: s.registry.writers.map(memberFor),
      untaggedRetentionDays: s.registry.untaggedRetentionDays,
    }, { parent: this, dependsOn: [this.gke.cluster] });

    const nodePools: Record<string, pulumi.Output<string>> = {};
    for (const [key, pool] of Object.entries(this.gke.nodePools)) nodePools[key] = pool.name;

    this.outputs = {
      networkName: this.network.network.name,
      networkSelfLink: this.network.network.selfLink,
      subnetworkName: this.network.subnetwork.name,
      subnetworkSelfLink: this.network.subnetwork.selfLink,
      podsRangeName: this.network.podsRangeName,
      servicesRangeName: this.network.servicesRangeName,
      clusterName: this.gke.cluster.name,
      clusterEndpoint: this.gke.cluster.endpoint,
      clusterLocation: this.region,
      nodePools,
      serviceAccounts: { ...this.iam.emails },
      registryId: this.registry.repository.repositoryId,
      registryUrl: this.registry.url,
      kubeconfig: this.gke.kubeconfig,
    };

    this.registerOutputs({ ...this.outputs });
  }
}

export type { PlatformOverrides, PlatformSettings } from './defaults';
