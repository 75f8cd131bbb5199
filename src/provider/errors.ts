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
 * Resolution errors. Both are per-request and leave the index untouched.
 */

/**
 * No source scored above zero and no default source is configured.
 */
export class ConfigNotFoundError extends Error {
  constructor(message = "No configuration matched metadata") {
    super(message);
    this.name = "ConfigNotFoundError";
  }
}

/**
 * The index and its cache disagree (a resolved source has no cache entry,
 * or nothing has been published yet). Always a defect.
 */
export class IndexConsistencyError extends Error {
  readonly sourceId?: string;

  constructor(message: string, sourceId?: string) {
    super(message);
    this.name = "IndexConsistencyError";
    this.sourceId = sourceId;
  }
}
