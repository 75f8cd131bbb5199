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
 * Bundle payload types.
 * Route and middleware records are opaque: the provider never interprets them.
 */

export type PayloadRecord = Readonly<Record<string, unknown>>;

/** A gateway route definition, passed through as-is. */
export type RouteRecord = PayloadRecord;

/** A gateway middleware definition; its `rule` document is never parsed here. */
export type MiddlewareRecord = PayloadRecord;

export type BundleMetadata = Readonly<Record<string, string>>;

/**
 * The fingerprinted part of a bundle.
 */
export interface BundleContent {
  readonly version: string;
  readonly routes: readonly RouteRecord[];
  readonly middlewares: readonly MiddlewareRecord[];
  readonly metadata: BundleMetadata;
}

export interface ConfigBundle extends BundleContent {
  readonly fingerprint: string;
  readonly loadedAt: Date;
}
