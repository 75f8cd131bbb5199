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

import { MemoryFileSystem } from "./memory-file-system.js";

/**
 * MemoryFileSystem whose reads can be held open, to observe a reload in flight.
 */
export class GatedFileSystem extends MemoryFileSystem {
  private gate: Promise<void> | null = null;

  /** Hold every read until the returned function is called. */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => {
      this.gate = null;
      release();
    };
  }

  override async readFile(path: string): Promise<string> {
    if (this.gate) {
      await this.gate;
    }
    return super.readFile(path);
  }
}
