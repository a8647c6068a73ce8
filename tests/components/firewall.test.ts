import { beforeEach, describe, expect, it } from 'vitest';
import { clearTrackedResources, getResource, getResourcesByType, settle, setupPulumiMocks } from '../utils/pulumi-mocks';
import { Firewall } from '../../src/components/infra/gcp/firewall';

setupPulumiMocks();

const NETWORK_ID = 'projects/test-project/global/networks/dev-vpc';

describe('Firewall', () => {
  beforeEach(async () => {
    clearTrackedResources();
    const firewall = new Firewall('dev', {
      networkId: NETWORK_ID,
      internalRanges: ['10.10.0.0/20', '10.20.0.0/14', '10.24.0.0/20'],
      iapRanges: ['35.235.240.0/20'],
      healthCheckRanges: ['130.211.0.0/22', '35.191.0.0/16'],
      nodeTag: 'gke-node',
    });
    await settle([firewall.internal, firewall.iapSsh, firewall.healthChecks]);
  });

  it('declares exactly three ingress rules on the network', () => {
    const rules = getResourcesByType('gcp:compute/firewall:Firewall');
    expect(rules.map(r => r.name).sort()).toEqual(['dev-health-checks', 'dev-iap-ssh', 'dev-internal']);
    for (const rule of rules) {
      expect(rule.inputs['network']).toBe(NETWORK_ID);
      expect(rule.inputs['direction']).toBe('INGRESS');
    }
  });

  it('admits all internal traffic from the VPC ranges', () => {
    const rule = getResource('gcp:compute/firewall:Firewall', 'dev-internal');
    expect(rule?.inputs['sourceRanges']).toEqual(['10.10.0.0/20', '10.20.0.0/14', '10.24.0.0/20']);
    expect(rule?.inputs['allows']).toEqual([{ protocol: 'tcp' }, { protocol: 'udp' }, { protocol: 'icmp' }]);
    expect(rule?.inputs['targetTags']).toBeUndefined();
  });

  it('admits SSH from IAP to tagged nodes only', () => {
    const rule = getResource('gcp:compute/firewall:Firewall', 'dev-iap-ssh');
    expect(rule?.inputs['sourceRanges']).toEqual(['35.235.240.0/20']);
    expect(rule?.inputs['allows']).toEqual([{ protocol: 'tcp', ports: ['22'] }]);
    expect(rule?.inputs['targetTags']).toEqual(['gke-node']);
  });

  it('admits Google health checks to tagged nodes', () => {
    const rule = getResource('gcp:compute/firewall:Firewall', 'dev-health-checks');
    expect(rule?.inputs['sourceRanges']).toEqual(['130.211.0.0/22', '35.191.0.0/16']);
    expect(rule?.inputs['allows']).toEqual([{ protocol: 'tcp' }]);
    expect(rule?.inputs['targetTags']).toEqual(['gke-node']);
  });
});
