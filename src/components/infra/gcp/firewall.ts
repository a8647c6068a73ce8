import * as pulumi from '@pulumi/pulumi';
import * as gcp from '@pulumi/gcp';

export interface FirewallConfig {
  networkId: pulumi.Input<string>;
  /** Subnet, pods and services ranges */
  internalRanges: string[];
  /** Identity-Aware Proxy TCP forwarding range, admitted on tcp/22 */
  iapRanges: string[];
  /** Google load balancer health-check ranges */
  healthCheckRanges: string[];
  /** Network tag carried by the cluster nodes */
  nodeTag: string;
}

export class Firewall extends pulumi.ComponentResource {
  public readonly internal: gcp.compute.Firewall;
  public readonly iapSsh: gcp.compute.Firewall;
  public readonly healthChecks: gcp.compute.Firewall;

  constructor(name: string, args: FirewallConfig, opts?: pulumi.ComponentResourceOptions) {
    super('foundation:gcp:Firewall', name, {}, opts);

    this.internal = new gcp.compute.Firewall(`${name}-internal`, {
      name: `${name}-internal`,
      description: 'Traffic between nodes, pods and services inside the VPC',
      network: args.networkId,
      direction: 'INGRESS',
      sourceRanges: args.internalRanges,
      allows: [{ protocol: 'tcp' }, { protocol: 'udp' }, { protocol: 'icmp' }],
    }, { parent: this });

    this.iapSsh = new gcp.compute.Firewall(`${name}-iap-ssh`, {
      name: `${name}-iap-ssh`,
      description: 'SSH to nodes through Identity-Aware Proxy',
      network: args.networkId,
      direction: 'INGRESS',
      sourceRanges: args.iapRanges,
      allows: [{ protocol: 'tcp', ports: ['22'] }],
      targetTags: [args.nodeTag],
    }, { parent: this });

    this.healthChecks = new gcp.compute.Firewall(`${name}-health-checks`, {
      name: `${name}-health-checks`,
      description: 'Google Cloud load balancer health checks',
      network: args.networkId,
      direction: 'INGRESS',
      sourceRanges: args.healthCheckRanges,
      allows: [{ protocol: 'tcp' }],
      targetTags: [args.nodeTag],
    }, { parent: this });

    this.registerOutputs({
      internalRuleName: this.internal.name,
      iapSshRuleName: this.iapSsh.name,
      healthChecksRuleName: this.healthChecks.name,
    });
  }
}
