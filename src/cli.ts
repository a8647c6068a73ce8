import * as path from 'path';
import { Command } from 'commander';
import { pathToFileURL } from 'node:url';
import { StackManager, runOperation } from './core/automation';
import type { Operation, StackSource } from './core/automation';
import { Project } from './core/project';
import { Helpers } from './utils/helpers';
import { bootstrapEnvironment } from './utils/bootstrap';
import type { BootstrapResult } from './utils/bootstrap';
import { writeKubeconfig } from './utils/kubeconfig';
import type { Environment } from './core/environment';

export const DEFAULT_CONFIG_FILE = 'foundation.config.ts';

interface CommonOpts {
  config?: string;
  workdir?: string;
  env?: string;
  debug?: boolean;
  trace?: boolean;
}

/** Collaborators the commands run against; replaced in tests */
export interface CliDeps {
  loadProject(configPath?: string): Promise<Project>;
  stacks(project: Project, workDir?: string): StackSource & {
    outputs(envId: string, showSecrets?: boolean): Promise<Record<string, unknown>>;
  };
  bootstrap(env: Environment): Promise<BootstrapResult>;
  print(line: string): void;
}

function debugLevel(o: CommonOpts): 'debug' | 'trace' | undefined {
  if (o.trace) return 'trace';
  return o.debug ? 'debug' : undefined;
}

function hasProjectDefault(mod: unknown): mod is { default: Project } {
  return typeof mod === 'object' && mod !== null && 'default' in mod && mod.default instanceof Project;
}

/** Import the config file; it must `export default` a Project */
export async function loadProjectFromConfig(configPath?: string): Promise<Project> {
  const candidate = configPath ?? DEFAULT_CONFIG_FILE;
  const abs = path.resolve(process.cwd(), candidate);
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(abs).href);
  } catch (e) {
    throw new Error(`Failed to import config at ${candidate}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!hasProjectDefault(mod)) {
    throw new Error(`Config file ${candidate} must export a Project as its default export`);
  }
  return mod.default;
}

/** Pick the environment named by --env, or the only one when there is just one */
function resolveEnvId(project: Project, env?: string): string {
  if (env) return project.env(env).id;
  const ids = Object.keys(project.envs);
  const [only] = ids;
  if (ids.length === 1 && only) return only;
  throw new Error(`--env is required (available: ${ids.join(', ') || 'none'})`);
}

const defaultDeps: CliDeps = {
  loadProject: loadProjectFromConfig,
  stacks: (project, workDir) => new StackManager(project, workDir),
  bootstrap: (env) => bootstrapEnvironment(env),
  print: (line) => { console.log(line); },
};

export function createProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();
  program
    .name('gke-foundation')
    .description('Plan, apply and destroy the GKE platform stacks')
    .option('-c, --config <file>', `path to the project config file (default: ${DEFAULT_CONFIG_FILE})`)
    .option('-w, --workdir <dir>', 'working directory for the Pulumi workspace')
    .option('-e, --env <id>', 'environment id to run')
    .option('-d, --debug', 'enable debug logging for the engine and provider')
    .option('--trace', 'enable trace logging for the engine and provider');

  const context = async () => {
    const o = program.opts<CommonOpts>();
    Helpers.setupDebugFlags(debugLevel(o));
    const project = await deps.loadProject(o.config);
    const envId = resolveEnvId(project, o.env);
    return { project, envId, workDir: o.workdir };
  };

  const bootstrap = async (project: Project, envId: string) => {
    deps.print(`\n🚀 Bootstrapping ${project.id}/${envId}...\n`);
    const result = await deps.bootstrap(project.env(envId));
    deps.print(`\n✅ Bootstrap completed (state: gs://${result.bucket})\n`);
  };

  program
    .command('bootstrap')
    .description('Create the state bucket and secrets key if they are missing')
    .action(async () => {
      const { project, envId } = await context();
      await bootstrap(project, envId);
    });

  const addOp = (op: Exclude<Operation, 'destroy'>, desc: string) => {
    program
      .command(op)
      .description(desc)
      .option('-t, --target <urn...>', 'limit the operation to these resource URNs')
      .option('--target-dependents', 'include dependents of the targets')
      .action(async (cmdOpts: { target?: string[]; targetDependents?: boolean }) => {
        const { project, envId, workDir } = await context();
        // The backend bucket must exist before the stack can be selected
        await bootstrap(project, envId);
        await runOperation(deps.stacks(project, workDir), envId, op, {
          ...(cmdOpts.target ? { target: cmdOpts.target } : {}),
          ...(cmdOpts.targetDependents ? { targetDependents: true } : {}),
        });
      });
  };

  addOp('plan', 'Preview the changes an apply would make');
  addOp('apply', 'Create or update the platform');
  addOp('refresh', 'Reconcile stack state with the cloud');

  program
    .command('destroy')
    .description('Destroy every resource of the environment')
    .option('--confirm <text>', 'must be exactly DESTROY')
    .action(async (cmdOpts: { confirm?: string }) => {
      const { project, envId, workDir } = await context();
      await runOperation(deps.stacks(project, workDir), envId, 'destroy', {
        ...(cmdOpts.confirm !== undefined ? { confirm: cmdOpts.confirm } : {}),
      });
    });

  program
    .command('outputs')
    .description('Print the stack outputs as JSON')
    .option('--show-secrets', 'print secret outputs in plain text')
    .action(async (cmdOpts: { showSecrets?: boolean }) => {
      const { project, envId, workDir } = await context();
      const outputs = await deps.stacks(project, workDir).outputs(envId, cmdOpts.showSecrets === true);
      deps.print(JSON.stringify(outputs, null, 2));
    });

  program
    .command('kubeconfig')
    .description('Write the cluster kubeconfig to .config/kube-config-<env>-gke')
    .action(async () => {
      const { project, envId, workDir } = await context();
      const outputs = await deps.stacks(project, workDir).outputs(envId, true);
      const content = outputs['kubeconfig'];
      if (typeof content !== 'string') {
        throw new Error(`Stack for '${envId}' has no kubeconfig output; run apply first`);
      }
      const file = writeKubeconfig(envId, content);
      deps.print(`Kubeconfig written to: ${file}`);
      deps.print(`export KUBECONFIG='${file.replace(/'/g, "'\\''")}'`);
    });

  return program;
}

export async function runCli(argv: string[] = process.argv, deps?: CliDeps): Promise<void> {
  await createProgram(deps).parseAsync(argv);
}

const isMain = (() => {
  const entry = process.argv[1];
  return entry ? import.meta.url === pathToFileURL(path.resolve(entry)).href : false;
})();

if (isMain) {
  runCli(process.argv).catch((err: unknown) => {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
}
