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
 * Structured JSON logging.
 * Level comes from LOG_LEVEL; every line carries a `service` binding.
 */

import pino, { type LoggerOptions, type Logger as PinoLogger, stdTimeFunctions } from "pino";

export type AppLogger = PinoLogger;

export interface NormalizedError {
  message: string;
  name?: string;
  file?: string;
  path?: string;
  stack?: string;
  cause?: NormalizedError;
}

export interface CreateLoggerOptions {
  level?: string;
  serviceName?: string;
  bindings?: Record<string, unknown>;
}

export const SERVICE_NAME = "gateway-config-provider";

function resolveLevel(): string {
  const envLevel = process.env.LOG_LEVEL?.trim();
  return envLevel && envLevel.length > 0 ? envLevel : "info";
}

export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? resolveLevel(),
    base: { service: options.serviceName ?? SERVICE_NAME },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  const logger = pino(loggerOptions);
  if (options.bindings && Object.keys(options.bindings).length > 0) {
    return logger.child(options.bindings);
  }
  return logger;
}

export const appLogger: AppLogger = createLogger();

function readStringField(error: Error, field: "file" | "path"): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

/**
 * Flatten an unknown thrown value into a log-friendly object.
 * Keeps the `file`/`path` detail carried by config errors.
 */
export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    const normalized: NormalizedError = { message: error.message, name: error.name };
    const file = readStringField(error, "file");
    if (file) normalized.file = file;
    const path = readStringField(error, "path");
    if (path) normalized.path = path;
    if (error.stack) normalized.stack = error.stack;
    if (error.cause !== undefined) normalized.cause = normalizeError(error.cause);
    return normalized;
  }
  if (typeof error === "string") {
    return { message: error };
  }
  return { message: String(error) };
}
