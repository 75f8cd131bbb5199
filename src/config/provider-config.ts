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
 * Provider file loading.
 * Pipeline: read raw text → parse → substitute env vars → validate → normalize.
 */

import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { isMap, isSeq } from "yaml";
import type { AuthRequirement, SourceDefinition } from "../provider/types.js";
import { parseConfigText } from "./document.js";
import { type EnvSource, substituteEnvInTree } from "./env-substitute.js";
import { ConfigLoadError, ConfigValidationError } from "./errors.js";
import {
  type ConfigurationParsed,
  type ProviderConfigParsed,
  ProviderConfigSchema,
} from "./schema.js";

export interface LoadProviderConfigOptions {
  env?: EnvSource;
  /** Called once per configuration declared without metadata. */
  onEmptyMetadata?: (index: number, directory: string) => void;
}

export interface ProviderConfig {
  version?: string;
  sources: SourceDefinition[];
}

/**
 * Lower-case metadata keys. On a case-only collision the later key wins.
 */
export function normalizeMetadata(metadata: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(metadata).map(([key, value]) => [key.toLowerCase(), value]),
  );
}

function toAuthRequirement(auth: ConfigurationParsed["auth"]): AuthRequirement | undefined {
  if (!auth || (auth.apiKey === undefined && auth.basicAuth === undefined)) {
    return undefined;
  }
  return {
    apiKey: auth.apiKey,
    basicAuth: auth.basicAuth,
  };
}

/**
 * Turn validated provider-file entries into source definitions.
 * Relative directories are resolved against `baseDir`.
 */
export function toSourceDefinitions(
  configurations: readonly ConfigurationParsed[],
  baseDir: string,
): SourceDefinition[] {
  return configurations.map((cfg) => ({
    directory: isAbsolute(cfg.directory) ? cfg.directory : resolve(baseDir, cfg.directory),
    declaredMetadata: normalizeMetadata(cfg.metadata),
    authRequirement: toAuthRequirement(cfg.auth),
    isDefault: cfg.default,
  }));
}

/** The root (for `version`) and each configuration's metadata. */
function sourceTextMaps(contents: unknown): unknown[] {
  if (!isMap(contents)) return [];
  const configurations = contents.get("configurations");
  if (!isSeq(configurations)) return [contents];
  return [
    contents,
    ...configurations.items.map((item) => (isMap(item) ? item.get("metadata") : undefined)),
  ];
}

/**
 * Parse provider-file text, substitute env vars into its string values and validate it.
 */
export function parseProviderConfig(
  text: string,
  sourceFile: string,
  env: EnvSource = process.env,
): ProviderConfigParsed {
  const raw = parseConfigText(text, sourceFile, sourceTextMaps);
  const substituted = substituteEnvInTree(raw, sourceFile, env);

  const result = ProviderConfigSchema.safeParse(substituted);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => ({
        file: sourceFile,
        path: issue.path.map(String).join("."),
        message: issue.message,
      })),
    );
  }
  return result.data;
}

export async function loadProviderConfig(
  filePath: string,
  options: LoadProviderConfigOptions = {},
): Promise<ProviderConfig> {
  let rawText: string;
  try {
    rawText = await readFile(filePath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigLoadError({
        file: filePath,
        message: `Provider config file not found: ${filePath}`,
      });
    }
    throw new ConfigLoadError(
      { file: filePath, message: `Failed to read provider config: ${String(error)}` },
      { cause: error },
    );
  }

  const parsed = parseProviderConfig(rawText, filePath, options.env);

  parsed.configurations.forEach((cfg, index) => {
    if (Object.keys(cfg.metadata).length === 0) {
      options.onEmptyMetadata?.(index, cfg.directory);
    }
  });

  return {
    version: parsed.version,
    sources: toSourceDefinitions(parsed.configurations, dirname(resolve(filePath))),
  };
}
