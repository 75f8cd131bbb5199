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
 * Process settings from CLI flags and environment variables.
 * Environment wins over flags, flags win over defaults.
 */

import { parseArgs } from "node:util";
import type { EnvSource } from "./env-substitute.js";
import { ConfigValidationError } from "./errors.js";
import { ServerSettingsSchema } from "./schema.js";

export const DEFAULT_CONFIG_FILE = "config.yaml";
export const DEFAULT_PORT = 8080;
export const DEFAULT_TLS_PORT = 8443;

export interface CliFlags {
  configFile: string;
  port?: string;
  help: boolean;
}

export interface ServerSettings {
  configFile: string;
  port: number;
  tls?: { certPath: string; keyPath: string };
  metaHeaderPrefix: string;
}

export function parseCliArgs(argv: readonly string[]): CliFlags {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      config: { type: "string", short: "c" },
      port: { type: "string", short: "p" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });
  return {
    configFile: values.config ?? DEFAULT_CONFIG_FILE,
    port: values.port,
    help: values.help ?? false,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Combine flags and environment into validated settings.
 * With TLS enabled, the stock port 8080 moves to 8443.
 */
export function loadServerSettings(flags: CliFlags, env: EnvSource = process.env): ServerSettings {
  const result = ServerSettingsSchema.safeParse({
    port: nonEmpty(env.PORT) ?? flags.port,
    tlsCertPath: nonEmpty(env.TLS_CERT_PATH),
    tlsKeyPath: nonEmpty(env.TLS_KEY_PATH),
    metaHeaderPrefix: nonEmpty(env.META_HEADER_PREFIX),
  });
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.map(String).join(".") || undefined,
        message: issue.message,
      })),
    );
  }

  const data = result.data;
  const tls =
    data.tlsCertPath && data.tlsKeyPath
      ? { certPath: data.tlsCertPath, keyPath: data.tlsKeyPath }
      : undefined;

  return {
    configFile: nonEmpty(env.CONFIG_FILE) ?? flags.configFile,
    port: tls && data.port === DEFAULT_PORT ? DEFAULT_TLS_PORT : data.port,
    tls,
    metaHeaderPrefix: data.metaHeaderPrefix,
  };
}
