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

import { join } from "node:path";
import type { Express } from "express";
import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { loadProviderConfig } from "../../src/config/provider-config.js";
import { createApp } from "../../src/http/app.js";
import { createLogger } from "../../src/observability/logger.js";
import { ConfigProvider } from "../../src/provider/provider.js";
import type { SourceDefinition } from "../../src/provider/types.js";
import { MemoryFileSystem } from "../support/memory-file-system.js";

const PROVIDER_FILE = join(import.meta.dirname, "../fixtures/valid/provider.yaml");
const PREFIX = "X-Gateway-Meta-";
const logger = createLogger({ level: "silent" });

async function fixtureApp(): Promise<Express> {
  const config = await loadProviderConfig(PROVIDER_FILE, { env: {} });
  const provider = await ConfigProvider.create(config.sources, { logger });
  return createApp({ provider, logger, metaHeaderPrefix: PREFIX });
}

describe("HTTP API (integration)", () => {
  let app: Express;

  beforeEach(async () => {
    app = await fixtureApp();
  });

  describe("GET /", () => {
    it("names the service", async () => {
      const res = await request(app).get("/");
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ service: "gateway-config-provider" });
    });
  });

  describe("GET /healthz", () => {
    it("reports healthy", async () => {
      const res = await request(app).get("/healthz");
      expect(res.status).toBe(200);
      expect(res.body.status).toBe("healthy");
      expect(res.body.service).toBe("gateway-config-provider");
      expect(typeof res.body.uptime).toBe("number");
    });
  });

  describe("GET /api/v1/config", () => {
    it("serves the bundle matched by header metadata", async () => {
      const res = await request(app)
        .get("/api/v1/config")
        .set("X-Gateway-Meta-Environment", "production")
        .set("X-Gateway-Meta-Region", "us-east")
        .set("X-API-Key", "test-api-key");

      expect(res.status).toBe(200);
      expect(res.body.version).toBe("2.1");
      expect(res.body.routes.map((route: { name: string }) => route.name)).toEqual(["api", "status"]);
      expect(res.body.middlewares).toHaveLength(1);
      expect(res.body.metadata).toEqual({
        team: "core",
        environment: "production",
        region: "us-east",
      });
      expect(res.body.checksum).toMatch(/^[a-f0-9]{64}$/);
      expect(res.headers.etag).toBe(`"${res.body.checksum}"`);
      expect(new Date(res.body.timestamp).toISOString()).toBe(res.body.timestamp);
    });

    it("serves the default bundle to unmatched callers without credentials", async () => {
      const res = await request(app).get("/api/v1/config?environment=qa");
      expect(res.status).toBe(200);
      expect(res.body.version).toBe("1.0");
      expect(res.body.routes).toEqual([
        { name: "fallback", path: "/", backends: [{ endpoint: "http://fallback.internal:8080" }] },
      ]);
    });

    it("lets header metadata override query metadata", async () => {
      const res = await request(app)
        .get("/api/v1/config?environment=production")
        .set("X-Gateway-Meta-Environment", "qa");
      expect(res.status).toBe(200);
      expect(res.body.version).toBe("1.0");
    });

    it("answers 304 when If-None-Match carries the current fingerprint", async () => {
      const first = await request(app).get("/api/v1/config");
      const etag = first.headers.etag;
      expect(typeof etag).toBe("string");

      const second = await request(app).get("/api/v1/config").set("If-None-Match", String(etag));
      expect(second.status).toBe(304);
      expect(second.headers.etag).toBe(etag);
    });

    it("serves the bundle again for a stale If-None-Match", async () => {
      const res = await request(app).get("/api/v1/config").set("If-None-Match", '"stale"');
      expect(res.status).toBe(200);
    });

    it("requires the API key of the matched source", async () => {
      const res = await request(app)
        .get("/api/v1/config")
        .set("X-Gateway-Meta-Environment", "production")
        .set("X-Request-Id", "req-123");

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ code: "unauthorized", message: "Unauthorized", requestId: "req-123" });
      expect(res.headers["www-authenticate"]).toBeUndefined();
      expect(res.headers["x-request-id"]).toBe("req-123");
    });

    it("rejects a wrong API key", async () => {
      const res = await request(app)
        .get("/api/v1/config")
        .set("X-Gateway-Meta-Environment", "production")
        .set("X-API-Key", "wrong-key");
      expect(res.status).toBe(401);
    });

    it("challenges for basic auth when the source uses it", async () => {
      const res = await request(app)
        .get("/api/v1/config")
        .set("X-Gateway-Meta-Environment", "staging")
        .auth("deployer", "wrong");

      expect(res.status).toBe(401);
      expect(res.headers["www-authenticate"]).toBe('Basic realm="gateway-config-provider"');
    });

    it("accepts valid basic auth credentials", async () => {
      const res = await request(app)
        .get("/api/v1/config")
        .set("X-Gateway-Meta-Environment", "staging")
        .auth("deployer", "test-secret");

      expect(res.status).toBe(200);
      expect(res.body.version).toBe("1.5");
    });

    it("generates a request id when none is sent", async () => {
      const res = await request(app).get("/api/v1/config");
      expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
    });
  });

  describe("GET /api/v1/config/stats", () => {
    it("reports provider statistics", async () => {
      const res = await request(app).get("/api/v1/config/stats");

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        configsLoaded: 3,
        sourceCount: 3,
        generation: 1,
        cacheHits: 1,
        cacheMisses: 0,
        reloading: false,
      });
      expect(typeof res.body.uptime).toBe("string");
    });
  });

  describe("/api/v1/config/reload", () => {
    it("reloads on POST", async () => {
      const res = await request(app).post("/api/v1/config/reload");

      expect(res.status).toBe(200);
      expect(res.body.status).toBe("reloaded");
      expect(res.body.generation).toBe(2);
      expect(typeof res.body.timestamp).toBe("string");
    });

    it("reloads on GET", async () => {
      await request(app).get("/api/v1/config/reload");
      const res = await request(app).get("/api/v1/config/reload");
      expect(res.body.generation).toBe(3);
    });

    it("requires the credentials of the matched source", async () => {
      const res = await request(app)
        .post("/api/v1/config/reload")
        .set("X-Gateway-Meta-Environment", "production");
      expect(res.status).toBe(401);
    });
  });

  it("answers unknown routes with 404", async () => {
    const res = await request(app).get("/api/v2/config");
    expect(res.status).toBe(404);
    expect(res.body.code).toBe("not_found");
  });
});

describe("HTTP API without a default configuration", () => {
  const definitions: SourceDefinition[] = [
    { directory: "/configs/prod", declaredMetadata: { environment: "production" }, isDefault: false },
  ];
  let fs: MemoryFileSystem;
  let app: Express;

  beforeEach(async () => {
    fs = new MemoryFileSystem({ "/configs/prod/routes.yaml": "routes:\n  - name: api\n" });
    const provider = await ConfigProvider.create(definitions, { fs, logger });
    app = createApp({ provider, logger, metaHeaderPrefix: PREFIX });
  });

  it("answers 404 when nothing matches", async () => {
    const res = await request(app).get("/api/v1/config?environment=qa");
    expect(res.status).toBe(404);
    expect(res.body.code).toBe("config_not_found");
    expect(res.body.message).toBe("No matching configuration");
    expect(typeof res.body.requestId).toBe("string");
  });

  it("reports a failed reload and keeps serving the previous bundle", async () => {
    fs.writeFile("/configs/prod/broken.yaml", "routes: [\n");

    const failed = await request(app).post("/api/v1/config/reload?environment=production");
    expect(failed.status).toBe(500);
    expect(failed.body.code).toBe("reload_failed");
    expect(failed.body.message.startsWith("Reload failed: Failed to parse YAML: ")).toBe(true);

    const res = await request(app).get("/api/v1/config?environment=production");
    expect(res.status).toBe(200);
    expect(res.body.routes).toEqual([{ name: "api" }]);

    const stats = await request(app).get("/api/v1/config/stats?environment=production");
    expect(stats.body.generation).toBe(1);
  });
});
