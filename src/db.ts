import pg, { type PoolClient, type PoolConfig } from "pg";
import { CredentialProvider, type Authenticator, type CredentialProviderOptions } from "./auth/credentialProvider";
import { ManagedIdentityAuthenticator } from "./auth/managedIdentity";
import type { DatabaseConfig } from "./config/env";
import { ConnectionError, TransactionError } from "./errors/AppError";
import { logError, logInfo, logWarn } from "./observability/logger";

export type Queryable = Pick<PoolClient, "query">;

/**
 * The part of a `pg` Pool the session manager drives.
 */
export interface SessionPool {
  connect(): Promise<PoolClient>;
  query(text: string): Promise<unknown>;
  end(): Promise<void>;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export type PoolFactory = (config: PoolConfig) => SessionPool;

export type SessionManagerOptions = {
  /** Overrides the credential source for managed-identity connections. */
  authenticator?: Authenticator;
  /** Shares an existing provider instead of building one from the config. */
  credentials?: CredentialProvider;
  poolFactory?: PoolFactory;
  now?: () => Date;
};

const defaultPoolFactory: PoolFactory = (config) => new pg.Pool(config);

function buildPoolConfig(config: DatabaseConfig, credentials: CredentialProvider | null): PoolConfig {
  const poolConfig: PoolConfig = {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  };
  if (config.maxConnections !== undefined) poolConfig.max = config.maxConnections;
  if (config.connectTimeoutMs !== undefined) poolConfig.connectionTimeoutMillis = config.connectTimeoutMs;
  if (config.statementTimeoutMs !== undefined) poolConfig.statement_timeout = config.statementTimeoutMs;

  if (config.mode === "password") {
    poolConfig.password = config.password;
  } else if (credentials) {
    // Units of work renew before connecting; the connection reuses that token.
    poolConfig.password = () => credentials.currentToken();
  }
  return poolConfig;
}

function buildCredentials(config: DatabaseConfig, options: SessionManagerOptions): CredentialProvider | null {
  if (config.mode !== "managed_identity") {
    return null;
  }
  if (options.credentials) {
    return options.credentials;
  }
  const authenticator = options.authenticator ?? new ManagedIdentityAuthenticator(config.clientId);
  const providerOptions: CredentialProviderOptions = {};
  if (config.credentialTimeoutMs !== undefined) providerOptions.timeoutMs = config.credentialTimeoutMs;
  if (options.now) providerOptions.now = options.now;
  return new CredentialProvider(authenticator, providerOptions);
}

/**
 * Owns one connection pool and hands out transactional units of work on it.
 *
 * A unit of work takes its own client, so sessions are never shared between callers.
 * Writes that must be atomic together belong in a single {@link SessionManager.withUnitOfWork} call.
 */
export class SessionManager {
  private disposed = false;

  private constructor(
    private readonly pool: SessionPool,
    private readonly credentials: CredentialProvider | null,
    readonly mode: DatabaseConfig["mode"]
  ) {}

  /**
   * Resolves the connection target, creates the pool and verifies connectivity with `select 1`.
   *
   * Credential failures surface as AuthRenewalError. Pool or connectivity failures end the pool
   * and surface as ConnectionError. Nothing is retried.
   */
  static async create(config: DatabaseConfig, options: SessionManagerOptions = {}): Promise<SessionManager> {
    const credentials = buildCredentials(config, options);
    if (credentials) {
      await credentials.ensureValid();
    }

    let pool: SessionPool;
    try {
      pool = (options.poolFactory ?? defaultPoolFactory)(buildPoolConfig(config, credentials));
    } catch (error) {
      throw new ConnectionError("Database pool could not be created.", { cause: error });
    }
    pool.on("error", (error) => {
      logError("db_pool_client_error", { error: error.message });
    });

    try {
      await pool.query("select 1 as ok");
    } catch (error) {
      await pool.end().catch((endError: unknown) => {
        logWarn("db_pool_end_failed", {
          error: endError instanceof Error ? endError.message : "unknown_error",
        });
      });
      throw new ConnectionError(`Database at ${config.host}/${config.database} is unreachable.`, {
        cause: error,
      });
    }

    logInfo("db_pool_created", { mode: config.mode, host: config.host, database: config.database });
    return new SessionManager(pool, credentials, config.mode);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Runs `body` inside one transaction on one client.
   *
   * Commits when `body` resolves. When it throws, rolls back and rethrows the same error.
   * The client goes back to the pool on every path, and is destroyed if rollback itself failed.
   */
  async withUnitOfWork<T>(body: (client: PoolClient) => Promise<T>): Promise<T> {
    if (this.disposed) {
      throw new ConnectionError("Session manager has been disposed.");
    }
    if (this.credentials) {
      await this.credentials.ensureValid();
    }

    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new ConnectionError("Could not acquire a database session.", { cause: error });
    }

    let broken = false;
    try {
      try {
        await client.query("begin");
      } catch (error) {
        broken = true;
        throw new TransactionError("Could not begin transaction.", { cause: error });
      }

      let result: T;
      try {
        result = await body(client);
      } catch (error) {
        broken = !(await this.rollback(client, error));
        throw error;
      }

      try {
        await client.query("commit");
      } catch (error) {
        broken = !(await this.rollback(client, error));
        throw new TransactionError("Could not commit transaction.", { cause: error });
      }
      return result;
    } finally {
      client.release(broken);
    }
  }

  /**
   * Ends the pool. Calling it again is a no-op.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      logWarn("db_pool_dispose_repeated");
      return;
    }
    this.disposed = true;
    await this.pool.end();
    logInfo("db_pool_disposed", { mode: this.mode });
  }

  private async rollback(client: PoolClient, cause: unknown): Promise<boolean> {
    logWarn("transaction_rollback", {
      error: cause instanceof Error ? cause.message : "unknown_error",
    });
    try {
      await client.query("rollback");
      return true;
    } catch (error) {
      logError("transaction_rollback_failed", {
        error: error instanceof Error ? error.message : "unknown_error",
      });
      return false;
    }
  }
}

/**
 * Creates a session manager, runs `fn` with it and disposes it exactly once, whatever `fn` does.
 */
export async function withSessionManager<T>(
  config: DatabaseConfig,
  fn: (sessions: SessionManager) => Promise<T>,
  options: SessionManagerOptions = {}
): Promise<T> {
  const sessions = await SessionManager.create(config, options);
  let result: T;
  try {
    result = await fn(sessions);
  } catch (error) {
    await sessions.dispose().catch((disposeError: unknown) => {
      logError("db_pool_dispose_failed", {
        error: disposeError instanceof Error ? disposeError.message : "unknown_error",
      });
    });
    throw error;
  }
  await sessions.dispose();
  return result;
}
