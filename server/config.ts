import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.string().optional(),
  // Pipeline defaults; request bodies and CLI flags may override them
  SHINGLE_SIZE: z.string().optional(),
  NUM_HASHES: z.string().optional(),
  SIMILARITY_THRESHOLD: z.string().optional(),
  // Fixed seed makes hash families (and therefore signatures) reproducible
  HASH_SEED: z.string().optional(),
  // Corpus discovery for the scan CLI
  CORPUS_DIR: z.string().optional(),
  CORPUS_EXTENSION: z.string().optional(),
  CORPUS_ON_ERROR: z.enum(["skip", "abort"]).optional(),
  // Pairwise stage partitioning and API limits
  PAIRWISE_PARTITIONS: z.string().optional(),
  MAX_REQUEST_DOCUMENTS: z.string().optional(),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  // Fail fast on enum values; numeric values fall back to defaults below
  throw new Error(`Invalid environment variables: ${parsed.error.message}`);
}

const env = parsed.data;

function toPort(val: string | undefined, fallback: number): number {
  const parsedPort = parseInt(val ?? "", 10);
  return Number.isFinite(parsedPort) ? parsedPort : fallback;
}

function parseBoundedInt(
  val: string | undefined,
  {
    defaultValue,
    min,
    max,
    name,
  }: { defaultValue: number; min: number; max: number; name: string }
): number {
  const raw = parseInt(val ?? "", 10);
  if (!Number.isFinite(raw)) return defaultValue;
  if (raw < min) {
    console.warn(`${name} too low (${raw}). Clamping to minimum ${min}.`);
    return min;
  }
  if (raw > max) {
    console.warn(`${name} too high (${raw}). Clamping to maximum ${max}.`);
    return max;
  }
  return raw;
}

function parseThreshold(val: string | undefined, fallback: number): number {
  const raw = parseFloat(val ?? "");
  if (!Number.isFinite(raw)) return fallback;
  return Math.min(1, Math.max(0, raw));
}

function parseSeed(val: string | undefined): number | undefined {
  if (val === undefined || val.trim() === "") return undefined;
  const raw = Number(val);
  return Number.isInteger(raw) ? raw >>> 0 : undefined;
}

const PIPELINE_BOUNDS = {
  SHINGLE_MAX: 64,
  HASHES_MAX: 4096,
  PARTITIONS_MAX: 1024,
  DOCUMENTS_MAX: 10_000,
} as const;

export const config = {
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === "development",
  port: toPort(env.PORT, 5000),
  pipeline: {
    shingleSize: parseBoundedInt(env.SHINGLE_SIZE, {
      defaultValue: 3,
      min: 1,
      max: PIPELINE_BOUNDS.SHINGLE_MAX,
      name: "SHINGLE_SIZE",
    }),
    numHashes: parseBoundedInt(env.NUM_HASHES, {
      defaultValue: 100,
      min: 1,
      max: PIPELINE_BOUNDS.HASHES_MAX,
      name: "NUM_HASHES",
    }),
    similarityThreshold: parseThreshold(env.SIMILARITY_THRESHOLD, 0.5),
    hashSeed: parseSeed(env.HASH_SEED),
    pairwisePartitions: parseBoundedInt(env.PAIRWISE_PARTITIONS, {
      defaultValue: 8,
      min: 1,
      max: PIPELINE_BOUNDS.PARTITIONS_MAX,
      name: "PAIRWISE_PARTITIONS",
    }),
  },
  corpus: {
    directory: env.CORPUS_DIR,
    extension: env.CORPUS_EXTENSION ?? ".txt",
    onError: env.CORPUS_ON_ERROR ?? "skip",
  },
  api: {
    maxRequestDocuments: parseBoundedInt(env.MAX_REQUEST_DOCUMENTS, {
      defaultValue: 500,
      min: 2,
      max: PIPELINE_BOUNDS.DOCUMENTS_MAX,
      name: "MAX_REQUEST_DOCUMENTS",
    }),
  },
} as const;
