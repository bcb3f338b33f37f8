import os from "node:os";

import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { DEFAULT_MIN_CHUNK_LENGTH } from "./core/impl/kmpPhraseMatcher.js";

loadEnv();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).optional(),
  SEARCH_PARALLELISM: z.coerce.number().int().positive().default(os.availableParallelism()),
  MIN_CHUNK_LENGTH: z.coerce.number().int().positive().default(DEFAULT_MIN_CHUNK_LENGTH),
  MAX_TEXT_LENGTH: z.coerce.number().int().positive().default(5_000_000),
  MAX_PHRASES: z.coerce.number().int().positive().default(10_000),
  PARALLEL_SEARCHING: booleanFlag,
  PARALLEL_PHRASES: booleanFlag,
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: Env["NODE_ENV"];
  port: number;
  logLevel: string;
  search: {
    parallelism: number;
    minChunkLength: number;
    maxTextLength: number;
    maxPhrases: number;
    parallelSearching: boolean;
    parallelPhrases: boolean;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);
  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === "development" ? "debug" : "info"),
    search: {
      parallelism: env.SEARCH_PARALLELISM,
      minChunkLength: env.MIN_CHUNK_LENGTH,
      maxTextLength: env.MAX_TEXT_LENGTH,
      maxPhrases: env.MAX_PHRASES,
      parallelSearching: env.PARALLEL_SEARCHING,
      parallelPhrases: env.PARALLEL_PHRASES,
    },
  };
}
