// backend/services/employee/src/db.ts
import fs from "node:fs";
import path from "node:path";
import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";
import type { Logger } from "pino";
import type { DbConfig } from "./config";

const SCHEMA_FILE = path.join(__dirname, "sql", "schema.sql");

/** A pooled connection scoped to one unit of work. Release exactly once. */
export interface Session {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
  release(): void;
}

export interface DatabaseOptions {
  pool: Pool;
  logger: Logger;
  /** Redacted connection string, for logs only. */
  label?: string;
}

export function redactConnection(cfg: DbConfig): string {
  return `postgresql://${cfg.user}:***@${cfg.host}:${cfg.port}/${cfg.database}`;
}

/** Statements of a .sql file, comments dropped. */
export function splitSqlStatements(sql: string): string[] {
  return sql
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Process-scoped owner of the connection pool.
 * Constructed once at start and handed to the app and the readiness loop.
 */
export class Database {
  private readonly pool: Pool;
  private readonly log: Logger;
  private readonly label: string;
  private ready = false;
  private closing: Promise<void> | undefined;

  constructor(opts: DatabaseOptions) {
    this.pool = opts.pool;
    this.log = opts.logger;
    this.label = opts.label ?? "postgresql";
  }

  /** Pool of poolSize warm connections plus maxOverflow transient ones. */
  static fromConfig(cfg: DbConfig, logger: Logger): Database {
    const pool = new Pool({
      host: cfg.host,
      port: cfg.port,
      user: cfg.user,
      password: cfg.password,
      database: cfg.database,
      max: cfg.poolSize + cfg.maxOverflow,
      idleTimeoutMillis: cfg.idleTimeoutMs,
      connectionTimeoutMillis: cfg.connectTimeoutMs,
    });

    // Idle clients dropped by the server surface here, not on a request.
    pool.on("error", (err) => {
      logger.warn({ err }, "[employee.db] idle client error");
    });

    const label = redactConnection(cfg);
    logger.info(
      { msg: "pg:pool", uri: label, max: cfg.poolSize + cfg.maxOverflow },
      "[employee.db] pool created"
    );
    return new Database({ pool, logger, label });
  }

  get dbReady(): boolean {
    return this.ready;
  }

  markReady(ready: boolean): void {
    this.ready = ready;
  }

  /**
   * Hands out a connection that just answered SELECT 1.
   * A dead connection is destroyed and one replacement is tried.
   */
  async acquireSession(): Promise<Session> {
    let client = await this.pool.connect();
    try {
      await client.query("SELECT 1");
    } catch (err) {
      client.release(toError(err));
      this.log.warn(
        { err, uri: this.label },
        "[employee.db] discarded dead connection"
      );
      client = await this.pool.connect();
      try {
        await client.query("SELECT 1");
      } catch (retryErr) {
        client.release(toError(retryErr));
        throw retryErr;
      }
    }
    return this.wrap(client);
  }

  async withSession<T>(fn: (session: Session) => Promise<T>): Promise<T> {
    const session = await this.acquireSession();
    try {
      return await fn(session);
    } finally {
      session.release();
    }
  }

  /** BEGIN … COMMIT; ROLLBACK and rethrow on any error. */
  async withTransaction<T>(fn: (session: Session) => Promise<T>): Promise<T> {
    return this.withSession(async (session) => {
      await session.query("BEGIN");
      try {
        const out = await fn(session);
        await session.query("COMMIT");
        return out;
      } catch (err) {
        try {
          await session.query("ROLLBACK");
        } catch (rollbackErr) {
          this.log.error({ err: rollbackErr }, "[employee.db] rollback failed");
        }
        throw err;
      }
    });
  }

  /** SELECT 1 on a fresh session. False on any error; never throws. */
  async ping(): Promise<boolean> {
    try {
      await this.assertAlive();
      return true;
    } catch (err) {
      this.log.warn({ err, uri: this.label }, "[employee.db] ping failed");
      return false;
    }
  }

  /** Like ping(), but the failure propagates. */
  async assertAlive(): Promise<void> {
    await this.withSession((s) => s.query("SELECT 1"));
  }

  /** Creates missing tables and indexes; existing rows are untouched. */
  async ensureSchema(): Promise<void> {
    const statements = splitSqlStatements(
      fs.readFileSync(SCHEMA_FILE, "utf8")
    );
    await this.withTransaction(async (s) => {
      for (const stmt of statements) {
        await s.query(stmt);
      }
    });
  }

  close(): Promise<void> {
    this.closing ??= this.pool.end().then(() => {
      this.ready = false;
      this.log.info({ uri: this.label }, "[employee.db] pool closed");
    });
    return this.closing;
  }

  private wrap(client: PoolClient): Session {
    let released = false;
    return {
      query: <R extends QueryResultRow = QueryResultRow>(
        text: string,
        values?: unknown[]
      ) => client.query<R>(text, values),
      release: () => {
        if (released) return;
        released = true;
        client.release();
      },
    };
  }
}
