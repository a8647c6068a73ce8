import { Environment } from './environment';
import type { EnvironmentConfig } from './environment';
import { backendUrlFor, ConfigError } from './config';
import type { ProjectConfig } from './config';

type EnvironmentsInput = Record<string, EnvironmentConfig | undefined>;

export class Project {
  public readonly envs: Record<string, Environment> = {};

  constructor(
    public readonly id: string,
    public readonly environments: EnvironmentsInput,
    public readonly config: ProjectConfig,
  ) {
    if (!/^[A-Za-z0-9_.-]+$/.test(id)) {
      throw new ConfigError('project.id', `'${id}' may only contain letters, digits, '-', '_' and '.'`);
    }
    // Fail at load time rather than on the first operation
    backendUrlFor(config.backend);

    for (const [name, cfg] of Object.entries(this.environments)) {
      if (!cfg) continue;
      this.envs[name] = new Environment(name, cfg, config);
    }
  }

  /** Look an environment up by id, case-insensitively */
  public env(envId: string): Environment {
    const key = Object.keys(this.envs).find(k => k.toLowerCase() === envId.toLowerCase());
    const env = key ? this.envs[key] : undefined;
    if (!env) {
      throw new Error(`Environment '${envId}' not found in project '${this.id}' (known: ${Object.keys(this.envs).join(', ') || 'none'})`);
    }
    return env;
  }
}
