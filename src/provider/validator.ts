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
 * Whole-index validation, run on every build before anything is published:
 * 1. Every directory is non-empty and resolves to an accessible directory
 * 2. Derived keys are unique
 * 3. At most one source is the default
 */

import type { BundleFileSystem } from "../bundle/file-system.js";
import { type ConfigErrorDetail, ConfigValidationError } from "../config/errors.js";
import type { ConfigurationSource } from "./types.js";

/**
 * Check key uniqueness and the default count. Pure; no file access.
 */
export function collectIndexErrors(sources: readonly ConfigurationSource[]): ConfigErrorDetail[] {
  const errors: ConfigErrorDetail[] = [];
  const keySeen = new Map<string, number>();
  const defaults: number[] = [];

  sources.forEach((source, index) => {
    const path = `configurations.${index}`;
    if (source.directory.trim() === "") {
      errors.push({ path, message: "Configuration directory is required" });
    }

    const existing = keySeen.get(source.id);
    if (existing !== undefined) {
      errors.push({
        path,
        message: `Duplicate configuration id "${source.id}" (same metadata as configurations.${existing})`,
      });
    } else {
      keySeen.set(source.id, index);
    }

    if (source.isDefault) {
      defaults.push(index);
    }
  });

  if (defaults.length > 1) {
    errors.push({
      message: `Only one configuration can be marked as default (found ${defaults.length}: ${defaults
        .map((i) => `configurations.${i}`)
        .join(", ")})`,
    });
  }

  return errors;
}

/**
 * Validate a full set of sources.
 * @throws ConfigValidationError with every problem found.
 */
export async function validateIndex(
  sources: readonly ConfigurationSource[],
  fs: BundleFileSystem,
): Promise<void> {
  const errors = collectIndexErrors(sources);

  for (const [index, source] of sources.entries()) {
    if (source.directory.trim() === "") continue;
    if (!(await fs.isDirectory(source.directory))) {
      errors.push({
        file: source.directory,
        path: `configurations.${index}`,
        message: `Directory does not exist: ${source.directory}`,
      });
    }
  }

  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
}
