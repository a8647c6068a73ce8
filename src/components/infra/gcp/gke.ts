import * as gcp from '@pulumi/gcp';
import * as pulumi from '@pulumi/pulumi';
import { Network } from './network';
import { Helpers } from '../../../utils/helpers';
import { renderKubeconfig } from '../../../utils/kubeconfig';

export type ReleaseChannel = 'RAPID' | 'REGULAR' | 'STABLE';

export interface NodeTaint {
  key: string;
  value?: string;
  effect: 'NO_SCHEDULE' | 'PREFER_NO_SCHEDULE' | 'NO_EXECUTE';
}

export interface NodePoolConfig {
  /** Set false to drop a pool inherited from the defaults */
  enabled?: boolean;
  /** Per-zone bounds; equal bounds mean a fixed-size pool */
  minNodes?: number;
  maxNodes?: number;
  machineType?: string;
  diskSizeGb?: number;
  diskType?: string;
  spot?: boolean;
  imageType?: string;
  labels?: Record<string, string>;
  /** Network tags added next to the platform node tag */
  tags?: string[];
  taints?: NodeTaint[];
}

export interface AuthorizedNetwork {
  cidrBlock: string;
  displayName: string;
}

export interface GkeConfig {
  name?: string;
  projectId: string;
  location: string; // region or zone
  network: Network;
  /** Account the nodes run as */
  nodeServiceAccount: gcp.serviceaccount.Account;
  /** Role bindings the node account needs before pools are created */
  nodeServiceAccountBindings?: pulumi.Resource[];
  /** Tag every node carries; firewall rules target it */
  nodeTag: string;
  releaseChannel?: ReleaseChannel;
  deletionProtection?: boolean;
  privateNodes?: boolean;
  masterCidr?: string;
  masterAuthorizedNetworks?: AuthorizedNetwork[];
  nodePools: Record<string, NodePoolConfig>;
}

const DEFAULT_MACHINE_TYPE = 'e2-standard-4';
const DEFAULT_DISK_SIZE_GB = 50;
const DEFAULT_DISK_TYPE = 'pd-balanced';

/** GCP-side pool name; the suffix changes with fields GKE cannot update in place */
export function nodePoolName(key: string, pool: NodePoolConfig): string {
  const immutablesKey = JSON.stringify({
    machineType: pool.machineType ?? DEFAULT_MACHINE_TYPE,
    diskSizeGb: pool.diskSizeGb ?? DEFAULT_DISK_SIZE_GB,
    diskType: pool.diskType ?? DEFAULT_DISK_TYPE,
    spot: pool.spot ?? false,
  });
  return `${key}-${Helpers.stableShortHash(immutablesKey)}`;
}

export class Gke extends pulumi.ComponentResource {
  public readonly cluster: gcp.container.Cluster;
  public readonly nodePools: Record<string, gcp.container.NodePool>;
  public readonly kubeconfig: pulumi.Output<string>;

  constructor(name: string, args: GkeConfig, opts?: pulumi.ComponentResourceOptions) {
    super('foundation:gcp:Gke', name, {}, opts);

    const clusterName = args.name ?? name;
    const network = args.network;
    const privateNodes = args.privateNodes !== false;

    this.cluster = new gcp.container.Cluster(
      clusterName,
      {
        name: clusterName,
        project: args.projectId,
        location: args.location,
        description: `${clusterName} GKE cluster`,
        networkingMode: 'VPC_NATIVE',
        network: network.network.selfLink,
        subnetwork: network.subnetwork.selfLink,
        ipAllocationPolicy: {
          clusterSecondaryRangeName: network.podsRangeName,
          servicesSecondaryRangeName: network.servicesRangeName,
        },
        removeDefaultNodePool: true,
        initialNodeCount: 1,
        ...(privateNodes ? {
          privateClusterConfig: {
            enablePrivateNodes: true,
            enablePrivateEndpoint: false,
            ...(args.masterCidr ? { masterIpv4CidrBlock: args.masterCidr } : {}),
          },
        } : {}),
        ...(args.masterAuthorizedNetworks && args.masterAuthorizedNetworks.length > 0 ? {
          masterAuthorizedNetworksConfig: { cidrBlocks: args.masterAuthorizedNetworks },
        } : {}),
        releaseChannel: { channel: args.releaseChannel ?? 'REGULAR' },
        workloadIdentityConfig: { workloadPool: `${args.projectId}.svc.id.goog` },
        loggingService: 'logging.googleapis.com/kubernetes',
        monitoringService: 'monitoring.googleapis.com/kubernetes',
        enableShieldedNodes: true,
        verticalPodAutoscaling: { enabled: true },
        addonsConfig: {
          httpLoadBalancing: { disabled: false },
          horizontalPodAutoscaling: { disabled: false },
        },
        deletionProtection: args.deletionProtection ?? false,
      },
      {
        parent: this,
        // Ensure cluster is destroyed before network resources
        dependsOn: [network.network, network.subnetwork],
      }
    );

    this.nodePools = {};
    const createNodePool = (key: string, pool: NodePoolConfig): gcp.container.NodePool => {
      const minNodes = pool.minNodes ?? 1;
      const maxNodes = pool.maxNodes ?? minNodes;
      const autoscaleEnabled = maxNodes > minNodes;

      return new gcp.container.NodePool(`${clusterName}-${key}`, {
        name: nodePoolName(key, pool),
        project: args.projectId,
        location: args.location,
        cluster: this.cluster.name,
        ...(autoscaleEnabled
          ? { autoscaling: { minNodeCount: minNodes, maxNodeCount: maxNodes } }
          : { nodeCount: minNodes }
        ),
        nodeConfig: {
          machineType: pool.machineType ?? DEFAULT_MACHINE_TYPE,
          diskSizeGb: pool.diskSizeGb ?? DEFAULT_DISK_SIZE_GB,
          diskType: pool.diskType ?? DEFAULT_DISK_TYPE,
          ...(pool.imageType ? { imageType: pool.imageType } : {}),
          ...(pool.spot ? { spot: true } : {}),
          labels: { 'node-pool': key, ...(pool.labels ?? {}) },
          serviceAccount: args.nodeServiceAccount.email,
          oauthScopes: ['https://www.googleapis.com/auth/cloud-platform'],
          workloadMetadataConfig: { mode: 'GKE_METADATA' },
          metadata: { 'disable-legacy-endpoints': 'true' },
          shieldedInstanceConfig: { enableSecureBoot: true, enableIntegrityMonitoring: true },
          tags: [args.nodeTag, ...(pool.tags ?? [])],
          ...(pool.taints && pool.taints.length > 0 ? {
            taints: pool.taints.map(t => ({ key: t.key, value: t.value ?? 'true', effect: t.effect })),
          } : {}),
        },
        management: { autoRepair: true, autoUpgrade: true },
      }, {
        parent: this,
        dependsOn: [this.cluster, args.nodeServiceAccount, ...(args.nodeServiceAccountBindings ?? [])],
        deleteBeforeReplace: true,
      });
    };

    for (const [key, pool] of Object.entries(args.nodePools)) {
      if (pool.enabled === false) continue;
      this.nodePools[key] = createNodePool(key, pool);
    }

    this.kubeconfig = pulumi.secret(pulumi.all([
      this.cluster.name,
      this.cluster.endpoint,
      this.cluster.masterAuth,
    ]).apply(([name, endpoint, auth]) => renderKubeconfig({
      projectId: args.projectId,
      location: args.location,
      clusterName: name,
      endpoint,
      clusterCaCertificate: auth.clusterCaCertificate,
    })));

    this.registerOutputs({
      clusterName: this.cluster.name,
      endpoint: this.cluster.endpoint,
      kubeconfig: this.kubeconfig,
    });
  }
}
