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
 * HTTP surface of the provider.
 *
 *   GET  /                       service banner
 *   GET  /healthz                liveness
 *   GET  /api/v1/config          bundle for the caller's metadata (ETag / If-None-Match)
 *   GET  /api/v1/config/stats    provider statistics
 *   GET|POST /api/v1/config/reload  rebuild the index
 *
 * Every /api/v1/config route resolves the caller's source first and checks the
 * credentials that source requires.
 */

import { randomUUID } from "node:crypto";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import type { ConfigBundle } from "../bundle/types.js";
import { IndexConsistencyError } from "../provider/errors.js";
import type { ConfigProvider } from "../provider/provider.js";
import type { ResolvedConfig } from "../provider/types.js";
import { type AppLogger, SERVICE_NAME, appLogger, normalizeError } from "../observability/logger.js";
import { authenticate, readCredentials } from "./auth.js";
import { mapError, respondWithError } from "./errors.js";
import { extractMetadata } from "./metadata.js";

export interface AppOptions {
  provider: ConfigProvider;
  metaHeaderPrefix: string;
  logger?: AppLogger;
}

export interface WireBundle {
  version: string;
  routes: ConfigBundle["routes"];
  middlewares: ConfigBundle["middlewares"];
  metadata: ConfigBundle["metadata"];
  checksum: string;
  timestamp: string;
}

export function toWireBundle(bundle: ConfigBundle): WireBundle {
  return {
    version: bundle.version,
    routes: bundle.routes,
    middlewares: bundle.middlewares,
    metadata: bundle.metadata,
    checksum: bundle.fingerprint,
    timestamp: bundle.loadedAt.toISOString(),
  };
}

/**
 * True when an If-None-Match header names the fingerprint (quoted, weak or bare) or is "*".
 */
export function matchesEtag(ifNoneMatch: string | undefined, fingerprint: string): boolean {
  if (!ifNoneMatch) return false;
  return ifNoneMatch
    .split(",")
    .map((tag) => tag.trim().replace(/^W\//, "").replace(/^"(.*)"$/, "$1"))
    .some((tag) => tag === "*" || tag === fingerprint);
}

export function createApp(options: AppOptions): Express {
  const { provider, metaHeaderPrefix } = options;
  const logger = (options.logger ?? appLogger).child({ subsystem: "http" });
  const app = express();

  app.disable("x-powered-by");
  app.set("etag", false);

  app.use((req: Request, res: Response, next: NextFunction) => {
    const headerRequestId = req.header("x-request-id")?.trim();
    const requestId = headerRequestId ? headerRequestId : randomUUID();
    res.locals.requestId = requestId;
    res.setHeader("x-request-id", requestId);

    const start = Date.now();
    res.on("finish", () => {
      logger.info(
        {
          requestId,
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - start,
        },
        "request completed",
      );
    });
    next();
  });

  /**
   * Resolve the caller's source and check its credentials. Sends the 401 itself
   * and returns undefined when the credentials do not match.
   */
  function resolveAuthorized(req: Request, res: Response): ResolvedConfig | undefined {
    const metadata = extractMetadata({ url: req.originalUrl, headers: req.headers }, metaHeaderPrefix);
    const resolved = provider.resolve(metadata);
    const requirement = resolved.source.authRequirement;
    if (!authenticate(readCredentials(req.headers), requirement)) {
      if (requirement?.basicAuth) {
        res.setHeader("WWW-Authenticate", `Basic realm="${SERVICE_NAME}"`);
      }
      logger.warn({ sourceId: resolved.source.id }, "authentication failed");
      respondWithError(res, 401, { code: "unauthorized", message: "Unauthorized" });
      return undefined;
    }
    return resolved;
  }

  app.get("/", (_req: Request, res: Response) => {
    res.json({ service: SERVICE_NAME });
  });

  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      service: SERVICE_NAME,
      uptime: process.uptime(),
    });
  });

  const configRouter = express.Router();

  configRouter.get("/", (req: Request, res: Response) => {
    const resolved = resolveAuthorized(req, res);
    if (!resolved) return;

    const { bundle } = resolved;
    res.setHeader("ETag", `"${bundle.fingerprint}"`);
    res.setHeader("Cache-Control", "no-cache");
    if (matchesEtag(req.header("if-none-match"), bundle.fingerprint)) {
      res.status(304).end();
      return;
    }
    res.json(toWireBundle(bundle));
  });

  configRouter.get("/stats", (req: Request, res: Response) => {
    if (!resolveAuthorized(req, res)) return;
    res.json(provider.stats());
  });

  const reloadHandler = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      if (!resolveAuthorized(req, res)) return;
      const index = await provider.reload();
      res.json({
        status: "reloaded",
        timestamp: index.lastReloadAt.toISOString(),
        generation: index.generation,
      });
    } catch (error) {
      next(error);
    }
  };
  configRouter.get("/reload", reloadHandler);
  configRouter.post("/reload", reloadHandler);

  app.use("/api/v1/config", configRouter);

  app.use((_req: Request, res: Response) => {
    respondWithError(res, 404, { code: "not_found", message: "Route not found" });
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const mapped = mapError(error);
    if (error instanceof IndexConsistencyError) {
      logger.error({ err: normalizeError(error) }, "configuration index is inconsistent");
    } else if (mapped.status >= 500) {
      logger.error({ err: normalizeError(error) }, "request failed");
    }
    respondWithError(res, mapped.status, mapped.body);
  });

  return app;
}
