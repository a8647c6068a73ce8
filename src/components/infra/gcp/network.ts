import * as gcp from '@pulumi/gcp';
import * as pulumi from '@pulumi/pulumi';

export interface NetworkConfig {
  region: string;
  cidr: string; // e.g., "10.10.0.0/20"
  podsSecondaryCidr: string; // e.g., "10.20.0.0/14"
  servicesSecondaryCidr: string; // e.g., "10.24.0.0/20"
  podsRangeName?: string;     // defaults to <subnet>-pods
  servicesRangeName?: string; // defaults to <subnet>-services
  networkName?: string; // override GCP network name
  subnetName?: string;  // override GCP subnet name
  /** Cloud Router + NAT so nodes without external IPs can reach the internet */
  nat?: boolean;
}

export class Network extends pulumi.ComponentResource {
  public readonly network: gcp.compute.Network;
  public readonly subnetwork: gcp.compute.Subnetwork;
  public readonly router?: gcp.compute.Router;
  public readonly nat?: gcp.compute.RouterNat;
  public readonly podsRangeName: string;
  public readonly servicesRangeName: string;
  /** Primary and secondary ranges, in that order, for rules that admit in-VPC traffic */
  public readonly internalRanges: string[];

  constructor(name: string, args: NetworkConfig, opts?: pulumi.ComponentResourceOptions) {
    super('foundation:gcp:Network', name, {}, opts);

    const netName = args.networkName ?? `${name}-vpc`;
    this.network = new gcp.compute.Network(netName, {
      name: netName,
      autoCreateSubnetworks: false,
      routingMode: 'REGIONAL',
      description: `VPC for the ${name} GKE platform`,
    }, { parent: this });

    const subnetName = args.subnetName ?? `${name}-subnet`;
    this.podsRangeName = args.podsRangeName ?? `${subnetName}-pods`;
    this.servicesRangeName = args.servicesRangeName ?? `${subnetName}-services`;
    this.internalRanges = [args.cidr, args.podsSecondaryCidr, args.servicesSecondaryCidr];

    this.subnetwork = new gcp.compute.Subnetwork(subnetName, {
      name: subnetName,
      ipCidrRange: args.cidr,
      region: args.region,
      network: this.network.id,
      privateIpGoogleAccess: true,
      secondaryIpRanges: [
        { rangeName: this.podsRangeName, ipCidrRange: args.podsSecondaryCidr },
        { rangeName: this.servicesRangeName, ipCidrRange: args.servicesSecondaryCidr },
      ],
    }, { parent: this });

    if (args.nat !== false) {
      this.router = new gcp.compute.Router(`${name}-router`, {
        name: `${name}-router`,
        region: args.region,
        network: this.network.id,
      }, { parent: this });

      this.nat = new gcp.compute.RouterNat(`${name}-nat`, {
        name: `${name}-nat`,
        router: this.router.name,
        region: args.region,
        natIpAllocateOption: 'AUTO_ONLY',
        sourceSubnetworkIpRangesToNat: 'ALL_SUBNETWORKS_ALL_IP_RANGES',
        logConfig: { enable: true, filter: 'ERRORS_ONLY' },
      }, { parent: this });
    }

    this.registerOutputs({
      networkId: this.network.id,
      subnetworkId: this.subnetwork.id,
      networkSelfLink: this.network.selfLink,
      subnetworkSelfLink: this.subnetwork.selfLink,
      podsRangeName: this.podsRangeName,
      servicesRangeName: this.servicesRangeName,
    });
  }
}
