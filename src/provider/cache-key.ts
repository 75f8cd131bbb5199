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

import type { Metadata } from "./types.js";

export const DEFAULT_CACHE_KEY = "default";

const RESERVED_CHARS = /[%&=]/g;

function escapeComponent(text: string): string {
  return text.replace(RESERVED_CHARS, (char) => `%${char.charCodeAt(0).toString(16)}`);
}

/**
 * Canonical cache key for a metadata set: `k1=v1&k2=v2`, sorted by key, lower-cased.
 * `%`, `&` and `=` inside keys and values are percent-encoded.
 * Empty metadata maps to "default".
 */
export function deriveCacheKey(metadata: Metadata): string {
  const keys = Object.keys(metadata).sort();
  if (keys.length === 0) {
    return DEFAULT_CACHE_KEY;
  }
  return keys
    .map((key) => `${escapeComponent(key)}=${escapeComponent(metadata[key] ?? "")}`)
    .join("&")
    .toLowerCase();
}
