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
 * Builds a complete ProviderIndex off to the side.
 * Orchestrates: derive keys → validate → load → merge metadata → fingerprint → freeze.
 * Nothing here touches the published index.
 */

import type { BundleFileSystem } from "../bundle/file-system.js";
import { computeFingerprint } from "../bundle/fingerprint.js";
import { loadBundle } from "../bundle/loader.js";
import type { BundleContent, ConfigBundle } from "../bundle/types.js";
import { deriveCacheKey } from "./cache-key.js";
import type {
  CacheEntry,
  ConfigurationSource,
  ProviderIndex,
  SourceDefinition,
} from "./types.js";
import { validateIndex } from "./validator.js";

export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

export interface BuildIndexOptions {
  fs: BundleFileSystem;
  generation: number;
  cacheTtlMs?: number;
  now?: () => Date;
}

export function toConfigurationSource(definition: SourceDefinition): ConfigurationSource {
  return Object.freeze({
    ...definition,
    declaredMetadata: Object.freeze({ ...definition.declaredMetadata }),
    id: deriveCacheKey(definition.declaredMetadata),
  });
}

/**
 * Freeze a loaded bundle after merging the source's declared metadata over
 * the fragment metadata. Declared metadata wins on conflict.
 */
export function finalizeBundle(
  content: BundleContent,
  source: ConfigurationSource,
  loadedAt: Date,
): ConfigBundle {
  const merged: BundleContent = {
    version: content.version,
    routes: Object.freeze([...content.routes]),
    middlewares: Object.freeze([...content.middlewares]),
    metadata: Object.freeze({ ...content.metadata, ...source.declaredMetadata }),
  };
  return Object.freeze({
    ...merged,
    fingerprint: computeFingerprint(merged),
    loadedAt,
  });
}

export async function buildProviderIndex(
  definitions: readonly SourceDefinition[],
  options: BuildIndexOptions,
): Promise<ProviderIndex> {
  const now = options.now ?? (() => new Date());
  const ttlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;

  // 1. Derive ids and validate the whole set before loading anything
  const sources = definitions.map(toConfigurationSource);
  await validateIndex(sources, options.fs);

  // 2. Load, merge and fingerprint each bundle
  const cache = new Map<string, CacheEntry>();
  for (const source of sources) {
    const content = await loadBundle(source.directory, options.fs);
    const loadedAt = now();
    const bundle = finalizeBundle(content, source, loadedAt);
    cache.set(
      source.id,
      Object.freeze({
        bundle,
        fingerprint: bundle.fingerprint,
        expiresAt: new Date(loadedAt.getTime() + ttlMs),
      }),
    );
  }

  const defaultSource = sources.find((source) => source.isDefault);

  return Object.freeze({
    generation: options.generation,
    sources: Object.freeze(sources),
    cache,
    defaultId: defaultSource?.id ?? null,
    lastReloadAt: now(),
  });
}
