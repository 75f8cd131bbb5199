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
 * Environment variable substitution for the provider file.
 * Supports ${VAR} and ${VAR:-default} syntax.
 * Runs on string values of the parsed document, so a substituted value is
 * never read as YAML or JSON syntax.
 */

import { type ConfigErrorDetail, ConfigValidationError } from "./errors.js";

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

export type EnvSource = Record<string, string | undefined>;

function substituteString(
  text: string,
  sourceFile: string,
  env: EnvSource,
  missing: ConfigErrorDetail[],
): string {
  return text.replace(ENV_VAR_PATTERN, (match, expr: string) => {
    const defaultSepIndex = expr.indexOf(":-");
    const varName = defaultSepIndex === -1 ? expr : expr.slice(0, defaultSepIndex);
    const defaultValue = defaultSepIndex === -1 ? undefined : expr.slice(defaultSepIndex + 2);

    const value = env[varName];
    if (value !== undefined) {
      return value;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }

    missing.push({
      file: sourceFile,
      message: `Unresolved environment variable: \${${varName}}`,
    });
    return match;
  });
}

function substituteNode(
  node: unknown,
  sourceFile: string,
  env: EnvSource,
  missing: ConfigErrorDetail[],
): unknown {
  if (typeof node === "string") {
    return substituteString(node, sourceFile, env, missing);
  }
  if (Array.isArray(node)) {
    return node.map((item) => substituteNode(item, sourceFile, env, missing));
  }
  if (node !== null && typeof node === "object") {
    return Object.fromEntries(
      Object.entries(node).map(([key, value]) => [
        key,
        substituteNode(value, sourceFile, env, missing),
      ]),
    );
  }
  return node;
}

/**
 * Substitute ${VAR} and ${VAR:-default} references in one string.
 * @throws ConfigValidationError listing every unresolved variable without a default.
 */
export function substituteEnvVars(
  text: string,
  sourceFile: string,
  env: EnvSource = process.env,
): string {
  const missing: ConfigErrorDetail[] = [];
  const result = substituteString(text, sourceFile, env, missing);
  if (missing.length > 0) {
    throw new ConfigValidationError(missing);
  }
  return result;
}

/**
 * Substitute references in every string value of a parsed document.
 * Keys, numbers and booleans are left as they are.
 * @throws ConfigValidationError listing every unresolved variable in document order.
 */
export function substituteEnvInTree(
  document: unknown,
  sourceFile: string,
  env: EnvSource = process.env,
): unknown {
  const missing: ConfigErrorDetail[] = [];
  const result = substituteNode(document, sourceFile, env, missing);
  if (missing.length > 0) {
    throw new ConfigValidationError(missing);
  }
  return result;
}
