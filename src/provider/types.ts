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
 * Configuration source and index types.
 */

import type { ConfigBundle } from "../bundle/types.js";

export type Metadata = Readonly<Record<string, string>>;

export interface BasicAuthCredentials {
  readonly username: string;
  readonly password: string;
}

export interface AuthRequirement {
  readonly apiKey?: string;
  readonly basicAuth?: BasicAuthCredentials;
}

/**
 * A source as declared in the provider file, before its key is derived.
 * Metadata keys are already lower-cased.
 */
export interface SourceDefinition {
  readonly directory: string;
  readonly declaredMetadata: Metadata;
  readonly authRequirement?: AuthRequirement;
  readonly isDefault: boolean;
}

export interface ConfigurationSource extends SourceDefinition {
  /** Canonical key derived from declaredMetadata at build time. */
  readonly id: string;
}

export interface CacheEntry {
  readonly bundle: ConfigBundle;
  /** Informational only; entries are replaced on reload, never expired. */
  readonly expiresAt: Date;
  readonly fingerprint: string;
}

/**
 * One published generation. Readers hold a reference to a whole index, so
 * sources and cache always come from the same build.
 */
export interface ProviderIndex {
  readonly generation: number;
  readonly sources: readonly ConfigurationSource[];
  readonly cache: ReadonlyMap<string, CacheEntry>;
  readonly defaultId: string | null;
  readonly lastReloadAt: Date;
}

export interface ResolvedConfig {
  readonly bundle: ConfigBundle;
  readonly source: ConfigurationSource;
  readonly generation: number;
}

export interface ProviderStats {
  configsLoaded: number;
  sourceCount: number;
  generation: number;
  lastReload: string | null;
  uptime: string;
  uptimeSeconds: number;
  cacheHits: number;
  cacheMisses: number;
  reloading: boolean;
}
