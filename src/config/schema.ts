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
 * Zod schemas for the provider file, bundle fragments and server settings.
 * Provider file objects use .strict() to reject unknown fields.
 * Fragments are only shape-checked: route and middleware records pass through untouched.
 */

import { z } from "zod";

const MetadataValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

export const MetadataSchema = z.record(z.string(), MetadataValueSchema);

export const BasicAuthSchema = z
  .object({
    username: z.string().min(1, "Basic auth username is required"),
    password: z.string().min(1, "Basic auth password is required"),
  })
  .strict();

export const AuthSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    basicAuth: BasicAuthSchema.optional(),
  })
  .strict();

export const ConfigurationSchema = z
  .object({
    directory: z.string().trim().min(1, "Configuration directory is required"),
    default: z.boolean().optional().default(false),
    metadata: MetadataSchema.optional().default({}),
    auth: AuthSchema.optional(),
  })
  .strict();

export const ProviderConfigSchema = z
  .object({
    version: z
      .union([z.string(), z.number()])
      .transform((value) => String(value))
      .optional(),
    configurations: z
      .array(ConfigurationSchema)
      .min(1, "At least one configuration is required"),
  })
  .strict();

const PayloadRecordSchema = z.record(z.string(), z.unknown());

export const BundleFragmentSchema = z.object({
  version: z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .optional(),
  routes: z.array(PayloadRecordSchema).optional().default([]),
  middlewares: z.array(PayloadRecordSchema).optional().default([]),
  metadata: MetadataSchema.optional().default({}),
});

const PortSchema = z.coerce.number().int().min(1).max(65535);

export const ServerSettingsSchema = z
  .object({
    port: PortSchema.default(8080),
    tlsCertPath: z.string().min(1).optional(),
    tlsKeyPath: z.string().min(1).optional(),
    metaHeaderPrefix: z.string().min(1).default("X-Gateway-Meta-"),
  })
  .refine((data) => (data.tlsCertPath === undefined) === (data.tlsKeyPath === undefined), {
    message: "TLS_CERT_PATH and TLS_KEY_PATH must be set together",
  });

export type ConfigurationParsed = z.output<typeof ConfigurationSchema>;
export type ProviderConfigParsed = z.output<typeof ProviderConfigSchema>;
export type BundleFragmentParsed = z.output<typeof BundleFragmentSchema>;
