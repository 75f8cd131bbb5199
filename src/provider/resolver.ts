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
 * Picks the configuration source that best matches request metadata.
 * Score = number of declared metadata pairs the request repeats exactly.
 * Highest positive score wins; ties go to the first source in declaration order.
 * With no positive score the default source is used, when there is one.
 */

import type { AppLogger } from "../observability/logger.js";
import { ConfigNotFoundError, IndexConsistencyError } from "./errors.js";
import type { IndexStore } from "./store.js";
import type { ConfigurationSource, Metadata, ProviderIndex, ResolvedConfig } from "./types.js";

export function scoreSource(source: ConfigurationSource, requestMetadata: Metadata): number {
  let score = 0;
  for (const [key, value] of Object.entries(source.declaredMetadata)) {
    if (Object.hasOwn(requestMetadata, key) && requestMetadata[key] === value) {
      score++;
    }
  }
  return score;
}

/**
 * Select a source from one index generation. Returns null when nothing matches
 * and there is no default.
 */
export function matchSource(
  index: ProviderIndex,
  requestMetadata: Metadata,
): ConfigurationSource | null {
  let best: ConfigurationSource | null = null;
  let bestScore = 0;

  for (const source of index.sources) {
    const score = scoreSource(source, requestMetadata);
    if (score > bestScore) {
      bestScore = score;
      best = source;
    }
  }

  if (best) {
    return best;
  }

  if (index.defaultId !== null) {
    return index.sources.find((source) => source.id === index.defaultId) ?? null;
  }
  return null;
}

export class ConfigResolver {
  private readonly store: IndexStore;
  private readonly logger: AppLogger;

  constructor(store: IndexStore, logger: AppLogger) {
    this.store = store;
    this.logger = logger;
  }

  /**
   * Resolve request metadata to a cached bundle and its source.
   * Reads the published index exactly once, so the pair always comes from one generation.
   * @throws ConfigNotFoundError when no source matches and there is no default
   * @throws IndexConsistencyError when the matched source has no cache entry
   */
  resolve(requestMetadata: Metadata): ResolvedConfig {
    const index = this.store.current();
    if (!index) {
      throw new IndexConsistencyError("Configuration index has not been loaded");
    }

    const source = matchSource(index, requestMetadata);
    if (!source) {
      this.logger.debug({ metadata: requestMetadata }, "no configuration matched metadata");
      throw new ConfigNotFoundError();
    }

    const entry = index.cache.get(source.id);
    if (!entry) {
      this.logger.error(
        { sourceId: source.id, generation: index.generation },
        "matched configuration has no cache entry",
      );
      throw new IndexConsistencyError(`Config ${source.id} not loaded`, source.id);
    }

    this.logger.debug(
      { sourceId: source.id, generation: index.generation },
      "cached configuration matched metadata",
    );
    return { bundle: entry.bundle, source, generation: index.generation };
  }

  sourceFor(id: string): ConfigurationSource | undefined {
    return this.store.current()?.sources.find((source) => source.id === id);
  }
}
