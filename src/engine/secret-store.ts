import type { CredentialScope } from './types';

export interface RegistrySecret {
  username: string;
  password: string;
  /** Registry host key for the docker config; Docker Hub when omitted. */
  server?: string;
}

export interface ClusterSecret {
  /** Plain kubeconfig YAML (already decoded). */
  kubeconfig: string;
}

export interface SecretMaterial {
  registry?: RegistrySecret;
  cluster?: ClusterSecret;
}

export const DOCKER_HUB_SERVER = 'https://index.docker.io/v1/';

const KUBECONFIG_SECRET_FIELD =
  /^\s*(?:token|password|client-key-data|client-certificate-data|id-token|refresh-token|access-token)\s*:\s*["']?([^"'\s]+)["']?\s*$/;

export function dockerAuthToken(secret: RegistrySecret): string {
  return Buffer.from(`${secret.username}:${secret.password}`, 'utf8').toString('base64');
}

/**
 * Secrets loaded once at startup and passed explicitly into each run.
 * Holds plain values in memory only; materialization to disk is the resolver's job.
 */
export class SecretStore {
  private readonly material: Readonly<SecretMaterial>;

  constructor(material: SecretMaterial) {
    this.material = Object.freeze({ ...material });
  }

  static empty(): SecretStore {
    return new SecretStore({});
  }

  has(scope: CredentialScope): boolean {
    return scope === 'registry-write'
      ? Boolean(this.material.registry?.password)
      : Boolean(this.material.cluster?.kubeconfig);
  }

  registry(): RegistrySecret | undefined {
    return this.material.registry;
  }

  cluster(): ClusterSecret | undefined {
    return this.material.cluster;
  }

  /** Every value that must never appear in stored output. */
  knownValues(): string[] {
    const values: string[] = [];
    const { registry, cluster } = this.material;

    if (registry?.password) {
      values.push(registry.password, dockerAuthToken(registry));
    }
    if (cluster?.kubeconfig) {
      values.push(
        cluster.kubeconfig,
        cluster.kubeconfig.trim(),
        Buffer.from(cluster.kubeconfig, 'utf8').toString('base64'),
      );
      for (const line of cluster.kubeconfig.split(/\r?\n/)) {
        const match = KUBECONFIG_SECRET_FIELD.exec(line);
        if (match) values.push(match[1]);
      }
    }
    return values.filter((value) => value.length > 0);
  }
}
