import * as gcp from '@pulumi/gcp';
import * as pulumi from '@pulumi/pulumi';

export interface RegistryConfig {
  projectId: string;
  location: string;
  repositoryId: string;
  description?: string;
  /** IAM members (e.g., serviceAccount:...) allowed to pull */
  readers?: pulumi.Input<string>[];
  /** IAM members allowed to push */
  writers?: pulumi.Input<string>[];
  /** Delete untagged images older than this many days; 0 disables the policy */
  untaggedRetentionDays?: number;
}

/** Docker repository host path, e.g. europe-west1-docker.pkg.dev/my-project/containers */
export function registryUrl(location: string, projectId: string, repositoryId: string): string {
  return `${location}-docker.pkg.dev/${projectId}/${repositoryId}`;
}

export class Registry extends pulumi.ComponentResource {
  public readonly repository: gcp.artifactregistry.Repository;
  public readonly readerMembers: gcp.artifactregistry.RepositoryIamMember[];
  public readonly writerMembers: gcp.artifactregistry.RepositoryIamMember[];
  public readonly url: pulumi.Output<string>;

  constructor(name: string, args: RegistryConfig, opts?: pulumi.ComponentResourceOptions) {
    super('foundation:gcp:Registry', name, {}, opts);

    const retentionDays = args.untaggedRetentionDays ?? 0;
    this.repository = new gcp.artifactregistry.Repository(name, {
      project: args.projectId,
      location: args.location,
      repositoryId: args.repositoryId,
      format: 'DOCKER',
      description: args.description ?? `Container images for ${name}`,
      ...(retentionDays > 0 ? {
        cleanupPolicies: [{
          id: 'delete-untagged',
          action: 'DELETE',
          condition: {
            tagState: 'UNTAGGED',
            olderThan: `${retentionDays * 86400}s`,
          },
        }],
      } : {}),
    }, { parent: this });

    const bind = (kind: 'reader' | 'writer', members: pulumi.Input<string>[]) => members.map((member, idx) =>
      new gcp.artifactregistry.RepositoryIamMember(`${name}-${kind}-${idx}`, {
        project: args.projectId,
        location: args.location,
        repository: this.repository.repositoryId,
        role: `roles/artifactregistry.${kind}`,
        member,
      }, { parent: this }));

    this.readerMembers = bind('reader', args.readers ?? []);
    this.writerMembers = bind('writer', args.writers ?? []);
    this.url = pulumi.output(registryUrl(args.location, args.projectId, args.repositoryId));

    this.registerOutputs({
      repositoryId: this.repository.repositoryId,
      url: this.url,
    });
  }
}
