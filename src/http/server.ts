// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * HTTP(S) listener lifecycle: bind, log the bound port, close on SIGINT/SIGTERM.
 */

import { readFile } from "node:fs/promises";
import { type Server as HttpServer, createServer as createHttpServer } from "node:http";
import { createServer as createHttpsServer } from "node:https";
import type { Express } from "express";
import { type AppLogger, normalizeError } from "../observability/logger.js";

export interface TlsFiles {
  certPath: string;
  keyPath: string;
}

export interface StartServerOptions {
  app: Express;
  /** 0 binds an ephemeral port. */
  port: number;
  tls?: TlsFiles;
  logger: AppLogger;
  /** Install SIGINT/SIGTERM handlers. Off in tests. */
  handleSignals?: boolean;
}

export interface StartedServer {
  server: HttpServer;
  port: number;
  stop: () => Promise<void>;
}

const SHUTDOWN_GRACE_MS = 10_000;

export async function startServer(options: StartServerOptions): Promise<StartedServer> {
  const { app, port, tls, logger } = options;

  const server: HttpServer = tls
    ? createHttpsServer(
        {
          cert: await readFile(tls.certPath),
          key: await readFile(tls.keyPath),
        },
        app,
      )
    : createHttpServer(app);

  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => {
      reject(error);
    };
    server.once("error", onError);
    server.listen(port, () => {
      server.off("error", onError);
      resolve();
    });
  });

  const address = server.address();
  const boundPort = typeof address === "object" && address !== null ? address.port : port;
  logger.info({ port: boundPort, tls: tls !== undefined }, "server listening");

  server.on("error", (error) => {
    logger.error({ err: normalizeError(error) }, "http server error");
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });

  if (options.handleSignals ?? true) {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, "shutting down");
      setTimeout(() => process.exit(1), SHUTDOWN_GRACE_MS).unref();
      void stop().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: normalizeError(error) }, "shutdown failed");
          process.exit(1);
        },
      );
    };
    process.once("SIGTERM", shutdown);
    process.once("SIGINT", shutdown);
  }

  return { server, port: boundPort, stop };
}
