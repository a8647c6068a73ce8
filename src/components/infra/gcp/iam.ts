import * as pulumi from '@pulumi/pulumi';
import * as gcp from '@pulumi/gcp';
import { Helpers } from '../../../utils/helpers';

export interface WorkloadIdentityBinding {
  namespace: string; // KSA namespace (e.g., observability)
  ksaName: string;   // KSA name (e.g., otel-collector)
}

export interface ServiceAccountConfig {
  /** Set false to drop an account inherited from the defaults */
  enabled?: boolean;
  accountId?: string;   // Desired accountId (without domain), defaults to <name>-<key>
  displayName?: string;
  roles?: string[];     // Project roles granted to the account
  workloadIdentity?: WorkloadIdentityBinding;
}

/** The id an account is created with: its own accountId, or `<name>-<key>`, normalized */
export function serviceAccountId(name: string, key: string, spec: ServiceAccountConfig): string {
  return Helpers.normalizeAccountId(spec.accountId ?? `${name}-${key}`);
}

export interface IamConfig {
  projectId: string;
  serviceAccounts: Record<string, ServiceAccountConfig>;
}

export class Iam extends pulumi.ComponentResource {
  public readonly accounts: Record<string, gcp.serviceaccount.Account> = {};
  public readonly emails: Record<string, pulumi.Output<string>> = {};
  /** Project role bindings per account key, in role order */
  public readonly roleBindings: Record<string, gcp.projects.IAMMember[]> = {};

  constructor(name: string, args: IamConfig, opts?: pulumi.ComponentResourceOptions) {
    super('foundation:gcp:Iam', name, {}, opts);

    for (const [key, spec] of Object.entries(args.serviceAccounts)) {
      if (spec.enabled === false) continue;
      const accountId = serviceAccountId(name, key, spec);

      const account = new gcp.serviceaccount.Account(`${name}-${key}`, {
        project: args.projectId,
        accountId,
        displayName: spec.displayName ?? `${name} ${key}`,
      }, { parent: this });

      this.accounts[key] = account;
      this.emails[key] = account.email;
      this.roleBindings[key] = (spec.roles ?? []).map((role, idx) => new gcp.projects.IAMMember(`${name}-${key}-role-${idx}`, {
        project: args.projectId,
        role,
        member: pulumi.interpolate`serviceAccount:${account.email}`,
      }, { parent: this }));
    }

    this.registerOutputs({ emails: this.emails });
  }
}

export interface WorkloadIdentityConfig {
  projectId: string;
  accounts: Record<string, gcp.serviceaccount.Account>;
  bindings: Record<string, WorkloadIdentityBinding>;
}

/**
 * Lets Kubernetes service accounts impersonate their Google service account.
 * The `<project>.svc.id.goog` pool only exists once a cluster enables it, so this
 * component is declared with a dependency on the cluster.
 */
export class WorkloadIdentity extends pulumi.ComponentResource {
  public readonly members: Record<string, gcp.serviceaccount.IAMMember> = {};

  constructor(name: string, args: WorkloadIdentityConfig, opts?: pulumi.ComponentResourceOptions) {
    super('foundation:gcp:WorkloadIdentity', name, {}, opts);

    for (const [key, binding] of Object.entries(args.bindings)) {
      const account = args.accounts[key];
      if (!account) {
        throw new Error(`Workload Identity binding '${key}' has no matching service account`);
      }
      this.members[key] = new gcp.serviceaccount.IAMMember(`${name}-${key}-wi`, {
        serviceAccountId: account.name,
        role: 'roles/iam.workloadIdentityUser',
        member: `serviceAccount:${args.projectId}.svc.id.goog[${binding.namespace}/${binding.ksaName}]`,
      }, { parent: this });
    }

    this.registerOutputs({});
  }
}
