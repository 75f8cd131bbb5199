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

import { beforeEach, describe, expect, it } from "vitest";
import { ConfigLoadError } from "../../../src/config/errors.js";
import { createLogger } from "../../../src/observability/logger.js";
import { ReloadCoordinator } from "../../../src/provider/reload.js";
import { ConfigResolver } from "../../../src/provider/resolver.js";
import { IndexStore } from "../../../src/provider/store.js";
import type { SourceDefinition } from "../../../src/provider/types.js";
import { GatedFileSystem } from "../../support/gated-file-system.js";

const logger = createLogger({ level: "silent" });

const definitions: SourceDefinition[] = [
  { directory: "/configs/prod", declaredMetadata: { env: "prod" }, isDefault: false },
  { directory: "/configs/shared", declaredMetadata: {}, isDefault: true },
];

describe("ReloadCoordinator", () => {
  let fs: GatedFileSystem;
  let store: IndexStore;
  let coordinator: ReloadCoordinator;

  beforeEach(() => {
    fs = new GatedFileSystem({
      "/configs/prod/routes.yaml": "routes:\n  - name: prod-v1\n",
      "/configs/shared/routes.yaml": "routes:\n  - name: shared\n",
    });
    store = new IndexStore();
    coordinator = new ReloadCoordinator({ definitions, store, fs, logger });
  });

  it("publishes increasing generations", async () => {
    const first = await coordinator.reload();
    const second = await coordinator.reload();

    expect(first.generation).toBe(1);
    expect(second.generation).toBe(2);
    expect(store.current()).toBe(second);
  });

  it("keeps the previous index when a rebuild fails", async () => {
    const initial = await coordinator.reload();
    fs.writeFile("/configs/prod/broken.yaml", "routes: [\n");

    await expect(coordinator.reload()).rejects.toBeInstanceOf(ConfigLoadError);
    expect(store.current()).toBe(initial);
    expect(coordinator.inProgress).toBe(false);

    fs.removeFile("/configs/prod/broken.yaml");
    const recovered = await coordinator.reload();
    expect(recovered.generation).toBe(2);
  });

  it("does not publish anything when the first load fails", async () => {
    fs.writeFile("/configs/shared/broken.yaml", "routes: [\n");
    await expect(coordinator.reload()).rejects.toBeInstanceOf(ConfigLoadError);
    expect(store.current()).toBeNull();
  });

  it("serializes concurrent reloads while readers keep the old generation", async () => {
    const initial = await coordinator.reload();
    const resolver = new ConfigResolver(store, logger);
    fs.writeFile("/configs/prod/routes.yaml", "routes:\n  - name: prod-v2\n");

    const release = fs.hold();
    const first = coordinator.reload();
    const second = coordinator.reload();
    expect(coordinator.inProgress).toBe(true);

    await new Promise((resolve) => setTimeout(resolve, 10));
    const during = resolver.resolve({ env: "prod" });
    expect(during.generation).toBe(1);
    expect(during.bundle.routes).toEqual([{ name: "prod-v1" }]);
    expect(store.current()).toBe(initial);

    release();
    const [a, b] = await Promise.all([first, second]);

    expect(a.generation).toBe(2);
    expect(b.generation).toBe(3);
    expect(store.current()).toBe(b);
    expect(coordinator.inProgress).toBe(false);

    const after = resolver.resolve({ env: "prod" });
    expect(after.generation).toBe(3);
    expect(after.bundle.routes).toEqual([{ name: "prod-v2" }]);
  });

  it("accepts new reloads after a failed one", async () => {
    await coordinator.reload();
    fs.writeFile("/configs/prod/broken.yaml", "routes: [\n");

    const release = fs.hold();
    const failing = coordinator.reload();
    const failingSettled = failing.then(
      () => "resolved",
      (error: unknown) => (error instanceof ConfigLoadError ? "load-error" : "other"),
    );
    release();
    expect(await failingSettled).toBe("load-error");

    fs.removeFile("/configs/prod/broken.yaml");
    const next = await coordinator.reload();
    expect(next.generation).toBe(2);
  });
});
