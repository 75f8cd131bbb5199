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
 * Error responses. Bodies are `{ code, message, requestId }`.
 */

import type { Response } from "express";
import { ConfigLoadError, ConfigValidationError } from "../config/errors.js";
import { ConfigNotFoundError } from "../provider/errors.js";

export interface ErrorBody {
  code: string;
  message: string;
}

export interface HttpErrorMapping {
  status: number;
  body: ErrorBody;
}

export function respondWithError(res: Response, status: number, body: ErrorBody): void {
  const requestId: unknown = res.locals.requestId;
  res.status(status).json({
    code: body.code,
    message: body.message,
    ...(typeof requestId === "string" ? { requestId } : {}),
  });
}

/**
 * Map an engine error to its HTTP status. Anything unrecognised is a 500
 * with a generic message; the detail stays in the logs.
 */
export function mapError(error: unknown): HttpErrorMapping {
  if (error instanceof ConfigNotFoundError) {
    return {
      status: 404,
      body: { code: "config_not_found", message: "No matching configuration" },
    };
  }
  if (error instanceof ConfigLoadError || error instanceof ConfigValidationError) {
    return {
      status: 500,
      body: { code: "reload_failed", message: `Reload failed: ${error.message}` },
    };
  }
  return {
    status: 500,
    body: { code: "internal_error", message: "Internal server error" },
  };
}
