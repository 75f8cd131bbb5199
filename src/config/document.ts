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
 * YAML/JSON text parsing shared by the provider file and bundle fragments.
 * Number and boolean values of the located mappings keep the text they were
 * written with, so `release: 1.10` reads as "1.10" rather than the number 1.1.
 */

import { extname } from "node:path";
import { isMap, isScalar, parseDocument } from "yaml";
import { ConfigLoadError } from "./errors.js";

/** Picks the mapping nodes that keep scalar text out of a parsed YAML document's contents. */
export type SourceTextLocator = (contents: unknown) => unknown[];

function keepScalarSource(node: unknown): void {
  if (!isMap(node)) return;
  for (const pair of node.items) {
    const { value } = pair;
    if (!isScalar(value) || value.source === undefined) continue;
    if (typeof value.value === "number" || typeof value.value === "boolean") {
      value.value = value.source;
    }
  }
}

function parseYamlText(text: string, locateMaps: SourceTextLocator): unknown {
  const document = parseDocument(text);
  const [firstError] = document.errors;
  if (firstError) {
    throw firstError;
  }
  for (const node of locateMaps(document.contents)) {
    keepScalarSource(node);
  }
  return document.toJS();
}

/**
 * Parse YAML or JSON according to the file extension.
 * @throws ConfigLoadError when the text is not well-formed.
 */
export function parseConfigText(
  text: string,
  sourceFile: string,
  locateMaps: SourceTextLocator,
): unknown {
  const isJson = extname(sourceFile).toLowerCase() === ".json";
  try {
    return isJson ? JSON.parse(text) : parseYamlText(text, locateMaps);
  } catch (error) {
    throw new ConfigLoadError(
      {
        file: sourceFile,
        message: `Failed to parse ${isJson ? "JSON" : "YAML"}: ${error instanceof Error ? error.message : String(error)}`,
      },
      { cause: error },
    );
  }
}
