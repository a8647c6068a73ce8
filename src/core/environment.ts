import type { PulumiFn } from '@pulumi/pulumi/automation';
import { Gcp } from '../components/infra/gcp';
import type { GcpConfig } from '../components/infra/gcp';
import { backendUrlFor, ConfigError } from './config';
import type { BackendConfig, ProjectConfig } from './config';
import type { StackConfigValues } from '../utils/helpers';

/** The single stack of an environment is `<env>-<component>` */
export const INFRA_COMPONENT = 'infra';

export type InfraFactory = (env: Environment) => GcpConfig;

export interface EnvironmentConfig {
  /** Platform overrides for this environment; the declared values apply when omitted */
  infra?: InfraFactory;
  settings?: {
    /** Overrides the project's bucket and/or prefix */
    backend?: Partial<BackendConfig>;
    secretsProvider?: string;
    /** Stack config, e.g. { 'gcp:project': 'acme-dev', 'gcp:region': 'europe-west1' } */
    config?: StackConfigValues;
    workDir?: string;
  };
}

export class Environment {
  constructor(
    public readonly id: string,
    public readonly config: EnvironmentConfig,
    private readonly project: ProjectConfig,
  ) {}

  public get stackName(): string {
    return `${this.id.toLowerCase()}-${INFRA_COMPONENT}`;
  }

  public get backend(): BackendConfig {
    return { ...this.project.backend, ...this.config.settings?.backend };
  }

  public get backendUrl(): string {
    return backendUrlFor(this.backend);
  }

  public get secretsProvider(): string | undefined {
    return this.config.settings?.secretsProvider ?? this.project.secretsProvider;
  }

  public get stackConfig(): StackConfigValues {
    return this.config.settings?.config ?? {};
  }

  private plainConfig(key: string): string | undefined {
    const value = this.stackConfig[key];
    if (value === undefined) return undefined;
    return typeof value === 'object' ? value.value : String(value);
  }

  public get gcpProject(): string | undefined {
    return this.plainConfig('gcp:project');
  }

  public get gcpRegion(): string | undefined {
    return this.plainConfig('gcp:region');
  }

  /** Platform config for this environment, with project and region taken from stack config */
  public infraConfig(): GcpConfig {
    const overrides = this.config.infra ? this.config.infra(this) : {};
    const projectId = overrides.projectId ?? this.gcpProject;
    if (!projectId) {
      throw new ConfigError(`environments.${this.id}.settings.config['gcp:project']`, 'a GCP project is required');
    }
    const region = overrides.region ?? this.gcpRegion;
    return {
      ...overrides,
      projectId,
      ...(region ? { region } : {}),
      environment: overrides.environment ?? this.id,
    };
  }

  /** Inline program run by the Automation API; its return value becomes the stack outputs */
  public program(): PulumiFn {
    return async () => {
      const platform = new Gcp(this.id, this.infraConfig());
      return { ...platform.outputs };
    };
  }
}
