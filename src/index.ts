#!/usr/bin/env node
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
 * Application entry point.
 * Loads dotenv and settings, builds the provider, then serves HTTP.
 */

import { config as loadDotenv } from "dotenv";
import { loadProviderConfig } from "./config/provider-config.js";
import { loadServerSettings, parseCliArgs } from "./config/settings.js";
import { createApp } from "./http/app.js";
import { startServer } from "./http/server.js";
import { appLogger, normalizeError } from "./observability/logger.js";
import { ConfigProvider } from "./provider/provider.js";

const USAGE = `Usage: gateway-config-provider [options]

Options:
  -c, --config <file>  Provider file (default: config.yaml, env: CONFIG_FILE)
  -p, --port <port>    Listen port (default: 8080, 8443 with TLS, env: PORT)
  -h, --help           Show this help
`;

async function main(): Promise<void> {
  loadDotenv();

  const flags = parseCliArgs(process.argv.slice(2));
  if (flags.help) {
    process.stdout.write(USAGE);
    return;
  }

  const settings = loadServerSettings(flags);
  const logger = appLogger.child({ subsystem: "bootstrap" });

  const providerConfig = await loadProviderConfig(settings.configFile, {
    onEmptyMetadata: (index, directory) => {
      logger.warn(
        { path: `configurations.${index}`, directory },
        "configuration declares no metadata and only matches as the default",
      );
    },
  });
  logger.info(
    { file: settings.configFile, version: providerConfig.version, sources: providerConfig.sources.length },
    "provider config loaded",
  );

  const provider = await ConfigProvider.create(providerConfig.sources, { logger: appLogger });
  const app = createApp({ provider, logger: appLogger, metaHeaderPrefix: settings.metaHeaderPrefix });

  await startServer({ app, port: settings.port, tls: settings.tls, logger });
}

main().catch((error: unknown) => {
  appLogger.fatal({ err: normalizeError(error) }, "startup failed");
  process.exit(1);
});
