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
 * Serialized, all-or-nothing index rebuilds.
 *
 * Reloads queue behind one another on a promise chain. Each one builds a new
 * index without touching the store and publishes it with a single reference
 * swap. A failed build leaves the previous generation in place.
 */

import type { BundleFileSystem } from "../bundle/file-system.js";
import { type AppLogger, normalizeError } from "../observability/logger.js";
import { buildProviderIndex } from "./index-builder.js";
import type { IndexStore } from "./store.js";
import type { ProviderIndex, SourceDefinition } from "./types.js";

export interface ReloadCoordinatorOptions {
  definitions: readonly SourceDefinition[];
  store: IndexStore;
  fs: BundleFileSystem;
  logger: AppLogger;
  cacheTtlMs?: number;
  now?: () => Date;
}

export class ReloadCoordinator {
  private readonly options: ReloadCoordinatorOptions;
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(options: ReloadCoordinatorOptions) {
    this.options = options;
  }

  /** True while a reload is running or queued. */
  get inProgress(): boolean {
    return this.pending > 0;
  }

  /**
   * Queue a full rebuild. Resolves with the published index, or rejects with
   * the load/validation error while the previous index keeps serving.
   * The rebuild runs to completion even if the caller stops waiting.
   */
  reload(): Promise<ProviderIndex> {
    this.pending++;
    const run = this.tail.then(() => this.rebuild());
    // The chain only orders reloads; each caller gets its own outcome from `run`.
    this.tail = run.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return run;
  }

  private async rebuild(): Promise<ProviderIndex> {
    const { definitions, store, fs, logger, cacheTtlMs, now } = this.options;
    const previous = store.current();
    const generation = (previous?.generation ?? 0) + 1;
    const startedAt = Date.now();

    logger.info({ generation, sources: definitions.length }, "reloading configurations");
    try {
      const index = await buildProviderIndex(definitions, { fs, generation, cacheTtlMs, now });
      store.publish(index);
      logger.info(
        {
          generation,
          sources: index.sources.length,
          defaultId: index.defaultId,
          durationMs: Date.now() - startedAt,
        },
        "configurations reloaded",
      );
      return index;
    } catch (error) {
      logger.error(
        { generation, keptGeneration: previous?.generation ?? null, err: normalizeError(error) },
        "configuration reload failed",
      );
      throw error;
    }
  }
}
