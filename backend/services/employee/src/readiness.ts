// backend/services/employee/src/readiness.ts
/**
 * Startup database readiness.
 *
 * Each attempt ensures the schema and then checks liveness. Attempt n that
 * fails waits min(2^n, cap) seconds before the next one. When every attempt
 * fails the service keeps running with dbReady=false and /health reports
 * the database as down.
 */
import type { Logger } from "pino";

/** The part of Database the loop drives. */
export interface ReadinessTarget {
  ensureSchema(): Promise<void>;
  assertAlive(): Promise<void>;
  markReady(ready: boolean): void;
}

export type StartupReadinessOpts = {
  maxAttempts?: number;
  maxBackoffSec?: number;
  sleep?: (ms: number) => Promise<void>;
  logger: Logger;
};

export function backoffSeconds(attempt: number, capSec = 10): number {
  return Math.min(2 ** attempt, capSec);
}

const realSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export class StartupReadiness {
  private readonly target: ReadinessTarget;
  private readonly log: Logger;
  private readonly maxAttempts: number;
  private readonly maxBackoffSec: number;
  private readonly sleep: (ms: number) => Promise<void>;

  public constructor(target: ReadinessTarget, opts: StartupReadinessOpts) {
    this.target = target;
    this.log = opts.logger;
    this.maxAttempts = opts.maxAttempts ?? 10;
    this.maxBackoffSec = opts.maxBackoffSec ?? 10;
    this.sleep = opts.sleep ?? realSleep;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts <= 0) {
      throw new Error(
        `STARTUP_READINESS_INVALID: maxAttempts must be a positive integer, got ${this.maxAttempts}.`
      );
    }
    if (this.maxBackoffSec < 0) {
      throw new Error(
        `STARTUP_READINESS_INVALID: maxBackoffSec must be >= 0, got ${this.maxBackoffSec}.`
      );
    }
  }

  /** Resolves true once ready, false when attempts ran out. Never rejects. */
  public async run(): Promise<boolean> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await this.target.ensureSchema();
        await this.target.assertAlive();
        this.target.markReady(true);
        this.log.info(
          { event: "db_ready", attempt },
          "DB connected and tables ensured"
        );
        return true;
      } catch (err) {
        this.target.markReady(false);
        const waitSec = backoffSeconds(attempt, this.maxBackoffSec);
        this.log.warn(
          {
            event: "db_not_ready",
            attempt,
            maxAttempts: this.maxAttempts,
            waitSec,
            err,
          },
          `DB not ready (attempt ${attempt}/${this.maxAttempts}); retrying in ${waitSec}s`
        );
        await this.sleep(waitSec * 1000);
      }
    }

    this.log.error(
      { event: "db_unavailable", attempts: this.maxAttempts },
      "Could not connect to DB after retries; service stays up and /health reports db down"
    );
    return false;
  }
}
