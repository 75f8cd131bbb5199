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
 * Request metadata extraction.
 * Query parameters (first value) are read first; prefixed headers then override them.
 * Keys are lower-cased to match declared metadata.
 */

import type { IncomingHttpHeaders } from "node:http";

export interface MetadataRequest {
  /** Raw request URL, path and query string. */
  url: string;
  headers: IncomingHttpHeaders;
}

export function extractMetadata(
  request: MetadataRequest,
  headerPrefix: string,
): Record<string, string> {
  const entries: Array<[string, string]> = [];

  const query = new URL(request.url, "http://localhost").searchParams;
  const seen = new Set<string>();
  for (const [key, value] of query) {
    const normalized = key.toLowerCase();
    if (normalized === "" || seen.has(normalized)) continue;
    seen.add(normalized);
    entries.push([normalized, value]);
  }

  const prefix = headerPrefix.toLowerCase();
  for (const [name, raw] of Object.entries(request.headers)) {
    const lower = name.toLowerCase();
    if (!lower.startsWith(prefix) || lower.length === prefix.length) continue;
    const value = Array.isArray(raw) ? raw[0] : raw;
    if (value === undefined) continue;
    entries.push([lower.slice(prefix.length), value]);
  }

  return Object.fromEntries(entries);
}
