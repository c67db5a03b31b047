// backend/services/shared/bootstrap/startHttpService.ts
import type { Express } from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  host: string;
  port: number; // allow 0 in tests for ephemeral port
  serviceName: string;
  logger: Logger;
  /** Runs after the server stops accepting connections (e.g. close the pool). */
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  boundPort: number;
  stop: () => Promise<void>;
}

function isAddressInfo(a: string | AddressInfo | null): a is AddressInfo {
  return typeof a === "object" && a !== null;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, host, port, serviceName, logger, onShutdown } = opts;

  return new Promise<StartedService>((resolve) => {
    const server = app.listen(port, host, () => {
      const addr = server.address();
      const boundPort = isAddressInfo(addr) ? addr.port : port;
      logger.info(
        { service: serviceName, host, port: boundPort },
        "service listening"
      );

      let stopping: Promise<void> | undefined;
      const stop = () => {
        stopping ??= new Promise<void>((done, fail) => {
          server.close((err) => (err ? fail(err) : done()));
        }).then(() => onShutdown?.());
        return stopping;
      };

      const shutdown = (signal: string) => {
        logger.info({ signal, service: serviceName }, "shutting down service");
        stop().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error({ err, service: serviceName }, "shutdown failed");
            process.exit(1);
          }
        );
      };

      process.once("SIGTERM", () => shutdown("SIGTERM"));
      process.once("SIGINT", () => shutdown("SIGINT"));

      resolve({ server, boundPort, stop });
    });

    server.on("error", (err) => {
      logger.error({ err, service: serviceName }, "http server error");
      process.exit(1);
    });
  });
}
