import { Pool, PoolClient } from "pg";

/** Mutual exclusion across keeper instances. */
export interface LockProvider {
  /** Resolves null when another holder owns the lock. */
  tryAcquire(name: string): Promise<LockHandle | null>;
}

export interface LockHandle {
  release(): Promise<void>;
}

/** Convert a lock name to a positive 32-bit advisory lock id. */
export function lockIdFor(name: string): number {
  let hash = 0;
  for (let i = 0; i < name.length; i++) {
    hash = (hash << 5) - hash + name.charCodeAt(i);
    hash = hash & hash;
  }
  return Math.abs(hash);
}

/**
 * PostgreSQL session advisory locks. The lock lives on one pooled client,
 * which is held until release so the unlock runs on the same session.
 */
export class PgAdvisoryLockProvider implements LockProvider {
  constructor(private readonly pool: Pool) {}

  async tryAcquire(name: string): Promise<LockHandle | null> {
    const lockId = lockIdFor(name);
    const client: PoolClient = await this.pool.connect();
    try {
      const { rows } = await client.query<{ locked: boolean }>(
        "SELECT pg_try_advisory_lock($1) AS locked",
        [lockId]
      );
      if (rows[0]?.locked !== true) {
        console.log(`⏳ Lock busy: ${name} (ID: ${lockId})`);
        client.release();
        return null;
      }
    } catch (error) {
      client.release();
      throw error;
    }

    console.log(`🔒 Lock acquired: ${name} (ID: ${lockId})`);
    return {
      release: async () => {
        try {
          await client.query("SELECT pg_advisory_unlock($1)", [lockId]);
          console.log(`🔓 Lock released: ${name} (ID: ${lockId})`);
        } finally {
          client.release();
        }
      },
    };
  }
}

/** Single-process stand-in, used when no database is configured. */
export class InProcessLockProvider implements LockProvider {
  private readonly held = new Set<string>();

  async tryAcquire(name: string): Promise<LockHandle | null> {
    if (this.held.has(name)) return null;
    this.held.add(name);
    return {
      release: async () => {
        this.held.delete(name);
      },
    };
  }
}

/**
 * Runs `fn` while holding `lockName`; resolves null without running it when
 * the lock is taken elsewhere.
 */
export async function withLock<T>(
  locks: LockProvider,
  lockName: string,
  fn: () => Promise<T>
): Promise<T | null> {
  const handle = await locks.tryAcquire(lockName);
  if (!handle) {
    console.warn(`⚠️ Could not acquire lock ${lockName}`);
    return null;
  }

  try {
    return await fn();
  } finally {
    await handle.release();
  }
}
