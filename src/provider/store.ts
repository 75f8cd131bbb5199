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
 * Holder for the published ProviderIndex.
 * The index is frozen; publishing swaps the single reference, so a reader that
 * grabbed `current()` keeps a complete generation for as long as it needs it.
 */

import type { ProviderIndex } from "./types.js";

export class IndexStore {
  private published: ProviderIndex | null = null;

  /**
   * Returns null until the first successful build has been published.
   */
  current(): ProviderIndex | null {
    return this.published;
  }

  /**
   * @internal Only the ReloadCoordinator publishes
   */
  publish(index: ProviderIndex): void {
    const previous = this.published;
    if (previous && index.generation <= previous.generation) {
      throw new Error(
        `Refusing to publish generation ${index.generation} over generation ${previous.generation}`,
      );
    }
    this.published = index;
  }
}
