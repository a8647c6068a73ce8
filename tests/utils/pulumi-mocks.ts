/**
 * Pulumi runtime mocks for component tests.
 *
 * Resources are recorded with their inputs so tests can assert what would be sent
 * to the provider. Call setupPulumiMocks() before declaring any resource.
 */
import * as pulumi from '@pulumi/pulumi';

export const TEST_PROJECT = 'test-project';
export const TEST_REGION = 'us-central1';

export interface TrackedResource {
  type: string;
  name: string;
  inputs: Record<string, unknown>;
  custom: boolean;
}

const trackedResources: TrackedResource[] = [];

export function getTrackedResources(): TrackedResource[] {
  return trackedResources;
}

export function getResourcesByType(type: string): TrackedResource[] {
  return trackedResources.filter(r => r.type === type);
}

export function getResource(type: string, name: string): TrackedResource | undefined {
  return trackedResources.find(r => r.type === type && r.name === name);
}

export function clearTrackedResources(): void {
  trackedResources.length = 0;
}

/** Resolve an Output's value; under mocks every value is known */
export function outputValue<T>(output: pulumi.Output<T>): Promise<T> {
  return new Promise(resolve => {
    output.apply(value => {
      resolve(value);
      return value;
    });
  });
}

/** Wait until the given resources have been registered with the mock monitor */
export async function settle(resources: pulumi.Resource[]): Promise<void> {
  await Promise.all(resources.map(r => outputValue(r.urn)));
}

function mockState(args: pulumi.runtime.MockResourceArgs): Record<string, unknown> {
  const inputs: Record<string, unknown> = args.inputs;
  const name = typeof inputs['name'] === 'string' ? inputs['name'] : args.name;
  const state: Record<string, unknown> = { ...inputs, name };

  switch (args.type) {
    case 'gcp:compute/network:Network':
      state['selfLink'] = `https://www.googleapis.com/compute/v1/projects/${TEST_PROJECT}/global/networks/${name}`;
      break;
    case 'gcp:compute/subnetwork:Subnetwork':
      state['selfLink'] = `https://www.googleapis.com/compute/v1/projects/${TEST_PROJECT}/regions/${TEST_REGION}/subnetworks/${name}`;
      break;
    case 'gcp:serviceaccount/account:Account': {
      const email = `${String(inputs['accountId'])}@${TEST_PROJECT}.iam.gserviceaccount.com`;
      state['email'] = email;
      state['name'] = `projects/${TEST_PROJECT}/serviceAccounts/${email}`;
      break;
    }
    case 'gcp:container/cluster:Cluster':
      state['endpoint'] = '34.123.45.67';
      state['masterAuth'] = { clusterCaCertificate: 'dGVzdC1jYS1jZXJ0', clientCertificate: '', clientKey: '' };
      break;
  }
  return state;
}

export function setupPulumiMocks(project = 'gke-foundation', stack = 'test'): void {
  clearTrackedResources();
  process.env['PULUMI_CONFIG'] = JSON.stringify({
    'gcp:project': TEST_PROJECT,
    'gcp:region': TEST_REGION,
  });

  pulumi.runtime.setMocks({
    newResource: (args: pulumi.runtime.MockResourceArgs): pulumi.runtime.MockResourceResult => {
      trackedResources.push({ type: args.type, name: args.name, inputs: args.inputs, custom: args.custom === true });
      return { id: `${args.name}-id`, state: mockState(args) };
    },
    call: (args: pulumi.runtime.MockCallArgs): Record<string, unknown> => args.inputs,
  }, project, stack, false);

  pulumi.runtime.setAllConfig({
    'gcp:project': TEST_PROJECT,
    'gcp:region': TEST_REGION,
  });
}

/**
 * Records the `dependsOn` each resource is declared with. Pass `transformation` in the
 * top-level component's `transformations`; children inherit it.
 */
export function dependencyRecorder() {
  const recorded = new Map<string, unknown[]>();
  const transformation: pulumi.ResourceTransformation = (args) => {
    const deps = args.opts.dependsOn;
    recorded.set(`${args.type}::${args.name}`, deps === undefined ? [] : Array.isArray(deps) ? [...deps] : [deps]);
    return undefined;
  };
  return {
    transformation,
    dependsOn: (type: string, name: string): unknown[] => recorded.get(`${type}::${name}`) ?? [],
  };
}
