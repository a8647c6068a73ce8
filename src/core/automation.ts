/**
 * Plan/apply/destroy/refresh of an environment's stack through the Automation API.
 * Resources are declared by the environment's inline program; this module only drives it.
 */
import { LocalWorkspace } from '@pulumi/pulumi/automation';
import type {
  DestroyOptions,
  LocalWorkspaceOptions,
  OutputMap,
  PreviewOptions,
  RefreshOptions,
  Stack,
  UpOptions,
} from '@pulumi/pulumi/automation';
import * as path from 'path';
import { Project } from './project';
import type { Environment } from './environment';
import { Helpers } from '../utils/helpers';

export type StackOp = 'preview' | 'up' | 'destroy' | 'refresh';

/** User-facing operation names, as the CI pipelines call them */
export type Operation = 'plan' | 'apply' | 'destroy' | 'refresh';

export const OPERATION_TO_STACK_OP: Record<Operation, StackOp> = {
  plan: 'preview',
  apply: 'up',
  destroy: 'destroy',
  refresh: 'refresh',
};

/** The exact text a caller must type to allow a destroy */
export const DESTROY_CONFIRMATION = 'DESTROY';

export class DestroyNotConfirmedError extends Error {
  constructor(stackName: string) {
    super(`Refusing to destroy '${stackName}': pass --confirm ${DESTROY_CONFIRMATION} to proceed`);
    this.name = 'DestroyNotConfirmedError';
  }
}

export function assertDestroyConfirmed(stackName: string, confirm: string | undefined): void {
  if (confirm !== DESTROY_CONFIRMATION) throw new DestroyNotConfirmedError(stackName);
}

/** The part of an Automation API Stack the operations use */
export interface StackOperations {
  readonly name: string;
  preview(opts?: PreviewOptions): Promise<{ changeSummary: Partial<Record<string, number>> }>;
  up(opts?: UpOptions): Promise<unknown>;
  destroy(opts?: DestroyOptions): Promise<unknown>;
  refresh(opts?: RefreshOptions): Promise<unknown>;
  cancel(): Promise<void>;
  outputs(): Promise<OutputMap>;
}

export interface StackSource {
  createOrSelectStack(envId: string): Promise<StackOperations>;
}

interface BaseOpts {
  onOutput?: (out: string) => void;
  color?: 'always' | 'never' | 'auto';
  target?: string[];
  /** Include dependent resources of the provided targets */
  targetDependents?: boolean;
}

/** e.g. "Plan: 3 to create, 1 to update, 0 to delete, 12 unchanged" */
export function formatChangeSummary(summary: Partial<Record<string, number>>): string {
  const n = (key: string) => summary[key] ?? 0;
  const replaced = n('replace') + n('create-replacement') + n('delete-replaced');
  return `Plan: ${n('create')} to create, ${n('update')} to update, ${replaced > 0 ? `${replaced} to replace, ` : ''}${n('delete')} to delete, ${n('same')} unchanged`;
}

export async function runStack(stack: StackOperations, op: StackOp, opts?: BaseOpts): Promise<void> {
  const color: NonNullable<BaseOpts['color']> = opts?.color ?? 'always';
  const base = {
    color,
    onOutput: opts?.onOutput ?? ((out: string) => { process.stdout.write(out); }),
    ...(opts?.target && opts.target.length > 0 ? { target: opts.target } : {}),
  };
  const targeting = opts?.targetDependents ? { targetDependents: true } : {};

  const runWithSignals = async <T>(fn: () => Promise<T>): Promise<T> => {
    let cancelled = false;
    const cancelFn = () => {
      if (cancelled) return;
      cancelled = true;
      process.stderr.write('\nSignal received. Cancelling current Pulumi operation...\n');
      stack.cancel().catch((error: unknown) => {
        process.stderr.write(`Cancel failed: ${error instanceof Error ? error.message : String(error)}\n`);
      });
    };
    process.once('SIGINT', cancelFn);
    process.once('SIGTERM', cancelFn);
    try { return await fn(); }
    finally {
      process.removeListener('SIGINT', cancelFn);
      process.removeListener('SIGTERM', cancelFn);
    }
  };

  switch (op) {
    case 'preview': {
      const result = await runWithSignals(() => stack.preview({ diff: true, ...base, ...targeting }));
      console.log(`\n${formatChangeSummary(result.changeSummary)}`);
      return;
    }
    case 'up':
      await runWithSignals(() => stack.up({ ...base, ...targeting }));
      return;
    case 'destroy':
      await runWithSignals(() => stack.destroy({ ...base, ...targeting }));
      return;
    case 'refresh':
      await runWithSignals(() => stack.refresh({ ...base }));
      return;
  }
}

/** Run a plan/apply/destroy/refresh for one environment; destroy is refused without the typed confirmation */
export async function runOperation(
  source: StackSource,
  envId: string,
  op: Operation,
  opts?: BaseOpts & { confirm?: string },
): Promise<void> {
  if (op === 'destroy') assertDestroyConfirmed(envId, opts?.confirm);
  const stack = await source.createOrSelectStack(envId);
  console.log(`\n▶️  ${op} ${stack.name}\n`);
  await runStack(stack, OPERATION_TO_STACK_OP[op], opts);
  console.log(`\n✅ ${op} ${stack.name} completed\n`);
}

/** Selects environment stacks on the gs:// backend with their config pushed in */
export class StackManager implements StackSource {
  constructor(private readonly project: Project, private readonly workDir?: string) {}

  /**
   * Create or select the stack of an environment and push its config.
   * Stack name format: "{envId}-infra"
   */
  async createOrSelectStack(envId: string): Promise<Stack> {
    const env = this.project.env(envId);
    const stack = await LocalWorkspace.createOrSelectStack(
      {
        stackName: env.stackName,
        projectName: this.project.id,
        program: env.program(),
      },
      this.buildWorkspaceOptions(env),
    );
    await stack.setAllConfig(Helpers.convertPulumiConfigToWorkspace(env.stackConfig));
    return stack;
  }

  /** Select an existing stack; fails when the environment was never applied */
  async selectStack(envId: string): Promise<Stack> {
    const env = this.project.env(envId);
    return LocalWorkspace.selectStack(
      {
        stackName: env.stackName,
        projectName: this.project.id,
        program: env.program(),
      },
      this.buildWorkspaceOptions(env),
    );
  }

  /** Stack outputs with secrets left masked unless asked for */
  async outputs(envId: string, showSecrets = false): Promise<Record<string, unknown>> {
    const stack = await this.selectStack(envId);
    const outputs = await stack.outputs();
    const out: Record<string, unknown> = {};
    for (const [key, output] of Object.entries(outputs)) {
      out[key] = output.secret && !showSecrets ? '[secret]' : output.value;
    }
    return out;
  }

  /**
   * Build workspace options for an environment's stack
   */
  buildWorkspaceOptions(env: Environment): LocalWorkspaceOptions {
    const workDir = env.config.settings?.workDir ?? this.workDir;
    const secretsProvider = env.secretsProvider;
    const forwarded = ['GOOGLE_APPLICATION_CREDENTIALS', 'PULUMI_CONFIG_PASSPHRASE', 'TF_LOG', 'TF_LOG_PROVIDER', 'PULUMI_LOG_LEVEL'];

    const envVars: Record<string, string> = {};
    for (const key of forwarded) {
      const value = process.env[key];
      if (value !== undefined) envVars[key] = value;
    }
    if (Helpers.isDebug()) {
      envVars['TF_LOG_PATH'] = process.env['TF_LOG_PATH'] ?? '/tmp/terraform.log';
      envVars['TF_APPEND_LOGS'] = '1';
      envVars['PULUMI_LOG_FLOW'] = 'true';
    }

    return {
      projectSettings: {
        name: this.project.id,
        runtime: 'nodejs',
        backend: { url: env.backendUrl },
      },
      ...(secretsProvider ? { secretsProvider } : {}),
      stackSettings: {
        [env.stackName]: secretsProvider ? { secretsProvider } : {},
      },
      envVars,
      ...(workDir ? { workDir: path.resolve(workDir) } : {}),
    };
  }
}
