import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';

export interface KubeconfigParams {
  projectId: string;
  location: string;
  clusterName: string;
  endpoint: string;
  clusterCaCertificate: string;
}

/** Context name in the form gcloud writes it */
export function contextName(p: Pick<KubeconfigParams, 'projectId' | 'location' | 'clusterName'>): string {
  return `gke_${p.projectId}_${p.location}_${p.clusterName}`;
}

/** Kubeconfig that authenticates through gke-gcloud-auth-plugin */
export function renderKubeconfig(p: KubeconfigParams): string {
  const context = contextName(p);
  return YAML.stringify({
    apiVersion: 'v1',
    kind: 'Config',
    preferences: {},
    'current-context': context,
    clusters: [{
      name: context,
      cluster: {
        'certificate-authority-data': p.clusterCaCertificate,
        server: `https://${p.endpoint}`,
      },
    }],
    contexts: [{
      name: context,
      context: { cluster: context, user: context },
    }],
    users: [{
      name: context,
      user: {
        exec: {
          apiVersion: 'client.authentication.k8s.io/v1beta1',
          command: 'gke-gcloud-auth-plugin',
          installHint: 'Install gke-gcloud-auth-plugin for use with kubectl: gcloud components install gke-gcloud-auth-plugin',
          provideClusterInfo: true,
        },
      },
    }],
  });
}

/** Minimal structural check before a kubeconfig is written to disk */
export function isKubeconfig(content: string): boolean {
  try {
    const doc: unknown = YAML.parse(content);
    return typeof doc === 'object' && doc !== null
      && 'kind' in doc && doc.kind === 'Config'
      && 'clusters' in doc && Array.isArray(doc.clusters) && doc.clusters.length > 0;
  } catch {
    return false;
  }
}

/** File name for an environment's kubeconfig under `.config/` */
export function kubeconfigFileName(envId: string): string {
  return `kube-config-${envId.toLowerCase()}-gke`;
}

/** Write a kubeconfig to `<rootDir>/.config/kube-config-<env>-gke` and return its path */
export function writeKubeconfig(envId: string, content: string, rootDir: string = process.cwd()): string {
  if (!isKubeconfig(content)) {
    throw new Error(`Refusing to write kubeconfig for '${envId}': content is not a kubeconfig`);
  }
  const dir = path.resolve(rootDir, '.config');
  fs.mkdirSync(dir, { recursive: true });
  const file = path.resolve(dir, kubeconfigFileName(envId));
  fs.writeFileSync(file, content, { mode: 0o600 });
  return file;
}
