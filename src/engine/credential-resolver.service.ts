import { Injectable, Logger } from '@nestjs/common';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from './errors';
import { DOCKER_HUB_SERVER, dockerAuthToken, SecretStore } from './secret-store';
import type { CredentialScope, ScopedCredential } from './types';

const SECRET_FILE_MODE = 0o600;

/**
 * Materializes secrets into a private temp directory for the lifetime of one stage.
 * Tools find them through DOCKER_CONFIG / KUBECONFIG; nothing is written elsewhere.
 */
@Injectable()
export class CredentialResolver {
  private readonly logger = new Logger(CredentialResolver.name);
  private readonly held = new Map<string, ScopedCredential>();

  /** Fails fast when any scope has no secret configured. */
  assertAvailable(scopes: Iterable<CredentialScope>, store: SecretStore): void {
    const missing = [...scopes].filter((scope) => !store.has(scope));
    if (missing.length > 0) {
      throw new ConfigurationError(`No secret configured for scope(s): ${missing.join(', ')}`);
    }
  }

  async resolve(scope: CredentialScope, store: SecretStore): Promise<ScopedCredential> {
    this.assertAvailable([scope], store);

    const directory = await mkdtemp(join(tmpdir(), `pipeline-${scope}-`));
    try {
      const env = await this.materialize(scope, store, directory);
      const credential: ScopedCredential = Object.freeze({
        scope,
        directory,
        env: Object.freeze(env),
      });
      this.held.set(directory, credential);
      this.logger.debug(`Materialized ${scope} credential`);
      return credential;
    } catch (err) {
      await rm(directory, { recursive: true, force: true });
      throw err;
    }
  }

  /** Erase the materialized secret. Safe to call twice. */
  async release(credential: ScopedCredential): Promise<void> {
    if (!this.held.delete(credential.directory)) return;
    await rm(credential.directory, { recursive: true, force: true });
    this.logger.debug(`Released ${credential.scope} credential`);
  }

  /** Scoped acquisition: the credential is released however `fn` exits. */
  async withCredential<T>(
    scope: CredentialScope | null,
    store: SecretStore,
    fn: (credential: ScopedCredential | null) => Promise<T>,
  ): Promise<T> {
    if (!scope) return fn(null);
    const credential = await this.resolve(scope, store);
    try {
      return await fn(credential);
    } finally {
      await this.release(credential);
    }
  }

  /** Number of credentials currently materialized. */
  heldCount(): number {
    return this.held.size;
  }

  private async materialize(
    scope: CredentialScope,
    store: SecretStore,
    directory: string,
  ): Promise<Record<string, string>> {
    if (scope === 'registry-write') {
      const registry = store.registry();
      if (!registry) throw new ConfigurationError('No registry credential configured');
      const dockerConfig = {
        auths: { [registry.server ?? DOCKER_HUB_SERVER]: { auth: dockerAuthToken(registry) } },
      };
      await writeFile(join(directory, 'config.json'), JSON.stringify(dockerConfig), {
        mode: SECRET_FILE_MODE,
      });
      return { DOCKER_CONFIG: directory };
    }

    const cluster = store.cluster();
    if (!cluster) throw new ConfigurationError('No cluster credential configured');
    const kubeconfigPath = join(directory, 'kubeconfig');
    await writeFile(kubeconfigPath, cluster.kubeconfig, { mode: SECRET_FILE_MODE });
    return { KUBECONFIG: kubeconfigPath };
  }
}
