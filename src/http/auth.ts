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
 * Credential check against the auth requirement of the matched source.
 * A source without a requirement is open. Otherwise either the API key or the
 * basic-auth pair must match.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";
import type { AuthRequirement, BasicAuthCredentials } from "../provider/types.js";

export const API_KEY_HEADER = "x-api-key";

export interface RequestCredentials {
  apiKey?: string;
  basicAuth?: BasicAuthCredentials;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function parseBasicAuthHeader(header: string | undefined): BasicAuthCredentials | undefined {
  if (!header) return undefined;
  const match = /^Basic\s+(\S+)\s*$/i.exec(header);
  const encoded = match?.[1];
  if (!encoded) return undefined;
  const decoded = Buffer.from(encoded, "base64").toString("utf-8");
  const separator = decoded.indexOf(":");
  if (separator === -1) return undefined;
  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

export function readCredentials(headers: IncomingHttpHeaders): RequestCredentials {
  return {
    apiKey: firstHeader(headers[API_KEY_HEADER]),
    basicAuth: parseBasicAuthHeader(headers.authorization),
  };
}

function safeEqual(actual: string, expected: string): boolean {
  const a = createHash("sha256").update(actual).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

export function authenticate(
  credentials: RequestCredentials,
  requirement: AuthRequirement | undefined,
): boolean {
  if (!requirement || (!requirement.apiKey && !requirement.basicAuth)) {
    return true;
  }

  if (requirement.apiKey && credentials.apiKey !== undefined) {
    if (safeEqual(credentials.apiKey, requirement.apiKey)) {
      return true;
    }
  }

  if (requirement.basicAuth && credentials.basicAuth) {
    const userOk = safeEqual(credentials.basicAuth.username, requirement.basicAuth.username);
    const passOk = safeEqual(credentials.basicAuth.password, requirement.basicAuth.password);
    if (userOk && passOk) {
      return true;
    }
  }

  return false;
}
