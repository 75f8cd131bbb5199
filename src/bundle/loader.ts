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
 * Merges every YAML/JSON fragment under a directory into one bundle.
 *
 * Fragments are visited in sorted path order. Routes and middlewares are
 * concatenated in that order without deduplication; metadata keys are
 * last-write-wins. One unreadable or malformed fragment fails the whole load.
 */

import { extname } from "node:path";
import { isMap } from "yaml";
import { parseConfigText } from "../config/document.js";
import { ConfigLoadError } from "../config/errors.js";
import { type BundleFragmentParsed, BundleFragmentSchema } from "../config/schema.js";
import { type BundleFileSystem, nodeFileSystem } from "./file-system.js";
import type { BundleContent, MiddlewareRecord, RouteRecord } from "./types.js";

export const DEFAULT_BUNDLE_VERSION = "1.0";

const SUPPORTED_EXTENSIONS = new Set([".yaml", ".yml", ".json"]);

export function isFragmentFile(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(extname(filePath).toLowerCase());
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function sourceTextMaps(contents: unknown): unknown[] {
  return isMap(contents) ? [contents, contents.get("metadata")] : [];
}

/**
 * Parse one fragment according to its extension.
 * An empty YAML document is an empty fragment.
 */
export function parseFragment(content: string, filePath: string): BundleFragmentParsed {
  const raw = parseConfigText(content, filePath, sourceTextMaps);
  const result = BundleFragmentSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigLoadError({
      file: filePath,
      path: issue?.path.map(String).join("."),
      message: `Invalid bundle fragment: ${issue?.message ?? result.error.message}`,
    });
  }
  return result.data;
}

export async function loadBundle(
  directory: string,
  fs: BundleFileSystem = nodeFileSystem,
): Promise<BundleContent> {
  let version = DEFAULT_BUNDLE_VERSION;
  const routes: RouteRecord[] = [];
  const middlewares: MiddlewareRecord[] = [];
  const metadata: Record<string, string> = {};

  const files: string[] = [];
  try {
    for await (const filePath of fs.walk(directory)) {
      if (isFragmentFile(filePath)) {
        files.push(filePath);
      }
    }
  } catch (error) {
    throw new ConfigLoadError(
      { file: directory, message: `Failed to read directory: ${errorMessage(error)}` },
      { cause: error },
    );
  }

  for (const filePath of files) {
    let content: string;
    try {
      content = await fs.readFile(filePath);
    } catch (error) {
      throw new ConfigLoadError(
        { file: filePath, message: `Failed to read file: ${errorMessage(error)}` },
        { cause: error },
      );
    }

    const fragment = parseFragment(content, filePath);
    if (fragment.version !== undefined) {
      version = fragment.version;
    }
    routes.push(...fragment.routes);
    middlewares.push(...fragment.middlewares);
    Object.assign(metadata, fragment.metadata);
  }

  return { version, routes, middlewares, metadata };
}
