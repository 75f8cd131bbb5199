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
 * The engine surface used by the HTTP layer.
 * Owns the index store, the resolver and the reload coordinator.
 */

import { type BundleFileSystem, nodeFileSystem } from "../bundle/file-system.js";
import { type AppLogger, appLogger } from "../observability/logger.js";
import { ConfigNotFoundError } from "./errors.js";
import { ReloadCoordinator } from "./reload.js";
import { ConfigResolver } from "./resolver.js";
import { IndexStore } from "./store.js";
import type {
  ConfigurationSource,
  Metadata,
  ProviderIndex,
  ProviderStats,
  ResolvedConfig,
  SourceDefinition,
} from "./types.js";

export interface ConfigProviderOptions {
  fs?: BundleFileSystem;
  logger?: AppLogger;
  cacheTtlMs?: number;
  now?: () => Date;
}

/**
 * Render a duration the way operators read it: "1h2m3s", "4m0s", "12s".
 */
export function formatUptime(totalSeconds: number): string {
  const seconds = Math.floor(totalSeconds);
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = seconds % 60;
  if (hours > 0) return `${hours}h${minutes}m${rest}s`;
  if (minutes > 0) return `${minutes}m${rest}s`;
  return `${rest}s`;
}

export class ConfigProvider {
  private readonly store = new IndexStore();
  private readonly resolver: ConfigResolver;
  private readonly coordinator: ReloadCoordinator;
  private readonly now: () => Date;
  private readonly startedAt: Date;
  private cacheHits = 0;
  private cacheMisses = 0;

  private constructor(definitions: readonly SourceDefinition[], options: ConfigProviderOptions) {
    const logger = (options.logger ?? appLogger).child({ subsystem: "provider" });
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now();
    this.resolver = new ConfigResolver(this.store, logger);
    this.coordinator = new ReloadCoordinator({
      definitions,
      store: this.store,
      fs: options.fs ?? nodeFileSystem,
      logger,
      cacheTtlMs: options.cacheTtlMs,
      now: this.now,
    });
  }

  /**
   * Build the provider and publish its first index.
   * Fails when the initial load or validation fails.
   */
  static async create(
    definitions: readonly SourceDefinition[],
    options: ConfigProviderOptions = {},
  ): Promise<ConfigProvider> {
    const provider = new ConfigProvider(definitions, options);
    await provider.reload();
    return provider;
  }

  resolve(metadata: Metadata): ResolvedConfig {
    try {
      const resolved = this.resolver.resolve(metadata);
      this.cacheHits++;
      return resolved;
    } catch (error) {
      if (error instanceof ConfigNotFoundError) {
        this.cacheMisses++;
      }
      throw error;
    }
  }

  reload(): Promise<ProviderIndex> {
    return this.coordinator.reload();
  }

  sourceFor(id: string): ConfigurationSource | undefined {
    return this.resolver.sourceFor(id);
  }

  lastReloadAt(): Date | null {
    return this.store.current()?.lastReloadAt ?? null;
  }

  currentGeneration(): number {
    return this.store.current()?.generation ?? 0;
  }

  stats(): ProviderStats {
    const index = this.store.current();
    const uptimeSeconds = Math.max(0, (this.now().getTime() - this.startedAt.getTime()) / 1000);
    return {
      configsLoaded: index?.cache.size ?? 0,
      sourceCount: index?.sources.length ?? 0,
      generation: index?.generation ?? 0,
      lastReload: index?.lastReloadAt.toISOString() ?? null,
      uptime: formatUptime(uptimeSeconds),
      uptimeSeconds: Math.floor(uptimeSeconds),
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      reloading: this.coordinator.inProgress,
    };
  }
}
