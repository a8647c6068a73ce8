import { Project } from './src';

export default new Project('gke-foundation', {
  dev: {
    settings: {
      config: {
        'gcp:project': 'acme-platform-dev',
        'gcp:region': 'europe-west1',
      },
    },
    infra: () => ({
      nodePools: {
        general: { minNodes: 1, maxNodes: 2 },
      },
    }),
  },
  prod: {
    settings: {
      config: {
        'gcp:project': 'acme-platform-prod',
        'gcp:region': 'europe-west1',
      },
    },
    infra: () => ({
      cluster: {
        masterAuthorizedNetworks: [{ cidrBlock: '203.0.113.0/24', displayName: 'office' }],
      },
    }),
  },
}, {
  backend: { bucket: 'acme-platform-tf-state', prefix: 'gke-foundation' },
  secretsProvider: 'gcpkms://projects/acme-platform-ops/locations/global/keyRings/pulumi/cryptoKeys/state',
});
