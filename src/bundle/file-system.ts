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
 * Pluggable file access for the bundle loader and index validation.
 */

import { readFile, readdir, stat } from "node:fs/promises";
import { join } from "node:path";

export interface BundleFileSystem {
  /** True when `path` exists and is a directory. Never throws for missing paths. */
  isDirectory(path: string): Promise<boolean>;
  /** Yields every non-directory entry below `root`, depth-first, entries sorted by name. */
  walk(root: string): AsyncIterable<string>;
  readFile(path: string): Promise<string>;
}

export class NodeFileSystem implements BundleFileSystem {
  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === "ENOENT" || code === "ENOTDIR" || code === "EACCES") {
        return false;
      }
      throw error;
    }
  }

  async *walk(root: string): AsyncIterable<string> {
    const entries = await readdir(root, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const entryPath = join(root, entry.name);
      if (entry.isDirectory()) {
        yield* this.walk(entryPath);
      } else {
        yield entryPath;
      }
    }
  }

  async readFile(path: string): Promise<string> {
    return readFile(path, "utf-8");
  }
}

export const nodeFileSystem: BundleFileSystem = new NodeFileSystem();
