/**
 * @module @llmverify/adapters-pino/manifest
 * Adapter manifest for Pino logger.
 */

import type { AdapterManifest } from "@llmverify/core";

export const manifest: AdapterManifest = {
  manifestVersion: "1.0.0",
  id: "pino-logger",
  name: "Pino Logger",
  version: "1.0.0",
  description: "Structured JSON logging for probes, cache tiers and notification workers, with credential redaction",
  license: "MIT",
  type: "core",
  implements: "ILogger",
  configSchema: {
    level: {
      type: "string",
      enum: ["trace", "debug", "info", "warn", "error", "fatal"],
      default: "info",
      description: "Minimum log level",
    },
    pretty: {
      type: "boolean",
      default: false,
      description: "Human-readable output through pino-pretty",
    },
    redact: {
      type: "array",
      default: [],
      description: "Extra field paths to censor besides provider credentials",
    },
  },
};
