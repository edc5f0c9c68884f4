import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient } from 'pg';

const LOCK_PREFIX = 'deploy:';

/** The part of a pg client the lock needs. */
export interface LockConnection {
  query(sql: string, params: unknown[]): Promise<unknown>;
  release(err?: Error | boolean): void;
}

/**
 * Drops the visibility row and the advisory lock, then returns the connection.
 * If either query fails the connection is destroyed instead of pooled: closing it is
 * what makes Postgres let go of a lock it may still hold.
 */
export async function releaseDeployLock(client: LockConnection, target: string): Promise<void> {
  try {
    await client.query(`DELETE FROM deployment_locks WHERE target = $1`, [target]);
    await client.query(`SELECT pg_advisory_unlock(hashtext($1))`, [LOCK_PREFIX + target]);
  } catch (err) {
    client.release(err instanceof Error ? err : true);
    throw err;
  }
  client.release();
}

export interface AcquireResult {
  acquired: boolean;
  release: () => Promise<void>;
}

/**
 * One deploy per workload at a time, across every worker process.
 *
 * The lock is a PostgreSQL advisory lock held on a dedicated connection, keyed by the
 * deploy target ("namespace/workload"). If the worker dies the connection drops and
 * Postgres releases the lock; the deployment_locks row is only for visibility.
 */
@Injectable()
export class DeploymentLockService implements OnModuleDestroy {
  private readonly logger = new Logger(DeploymentLockService.name);
  private pool: Pool | null = null;

  constructor(private readonly configService: ConfigService) {}

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        connectionString: this.configService.getOrThrow<string>('DATABASE_URL'),
      });
    }
    return this.pool;
  }

  /**
   * Non-blocking: resolves with acquired=false when another run holds the target.
   * When acquired, release() must be called once the run is done.
   */
  async tryAcquire(target: string, pipelineRunId: string): Promise<AcquireResult> {
    const key = LOCK_PREFIX + target;
    const client: PoolClient = await this.getPool().connect();

    try {
      const result = await client.query<{ acquired: boolean }>(
        `SELECT pg_try_advisory_lock(hashtext($1)) AS "acquired"`,
        [key],
      );
      const acquired = Boolean(result.rows[0]?.acquired);

      if (!acquired) {
        client.release();
        return { acquired: false, release: async () => undefined };
      }

      await client.query(
        `INSERT INTO deployment_locks (target, locked_by, locked_at)
         VALUES ($1, $2, NOW())
         ON CONFLICT (target) DO UPDATE SET
           locked_by = EXCLUDED.locked_by,
           locked_at = EXCLUDED.locked_at`,
        [target, pipelineRunId],
      );

      let released = false;
      const release = async (): Promise<void> => {
        if (released) return;
        released = true;
        await releaseDeployLock(client, target);
      };

      this.logger.log(`Deploy lock for ${target} taken by run ${pipelineRunId}`);
      return { acquired: true, release };
    } catch (err) {
      // The lock may be held already; destroying the connection drops it.
      client.release(err instanceof Error ? err : true);
      throw err;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
