export { Project } from './core/project';
export { Environment, INFRA_COMPONENT } from './core/environment';
export type { EnvironmentConfig, InfraFactory } from './core/environment';
export { ConfigError, backendUrlFor, parseBackendUrl } from './core/config';
export type { BackendConfig, ProjectConfig } from './core/config';
export {
  StackManager,
  runOperation,
  runStack,
  formatChangeSummary,
  assertDestroyConfirmed,
  DestroyNotConfirmedError,
  DESTROY_CONFIRMATION,
  OPERATION_TO_STACK_OP,
} from './core/automation';
export type { Operation, StackOp, StackOperations, StackSource } from './core/automation';

export { Gcp } from './components/infra/gcp';
export type { GcpConfig, GcpOutput, PlatformOverrides, PlatformSettings } from './components/infra/gcp';
export { Network } from './components/infra/gcp/network';
export type { NetworkConfig } from './components/infra/gcp/network';
export { Firewall } from './components/infra/gcp/firewall';
export type { FirewallConfig } from './components/infra/gcp/firewall';
export { Iam, WorkloadIdentity } from './components/infra/gcp/iam';
export type { ServiceAccountConfig, WorkloadIdentityBinding } from './components/infra/gcp/iam';
export { Gke, nodePoolName } from './components/infra/gcp/gke';
export type { GkeConfig, NodePoolConfig, NodeTaint, ReleaseChannel, AuthorizedNetwork } from './components/infra/gcp/gke';
export { Registry, registryUrl } from './components/infra/gcp/registry';
export type { RegistryConfig } from './components/infra/gcp/registry';
export { resolvePlatformSettings, validatePlatformSettings } from './components/infra/gcp/defaults';

export { bootstrapEnvironment, ensureStateBucket, ensureKmsKey, parseGcpKmsUrl } from './utils/bootstrap';
export type { BootstrapClients, BootstrapResult, StateBucketClient, KmsKeyClient, GcpKmsKey } from './utils/bootstrap';
export { renderKubeconfig, writeKubeconfig } from './utils/kubeconfig';
export { Helpers } from './utils/helpers';
export type { StackConfigValue, StackConfigValues } from './utils/helpers';
