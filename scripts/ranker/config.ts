import { InvalidArgumentError } from "commander";
import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";

import { METRIC_NAMES, STRATEGY_NAMES, type MetricName, type RetrievalStrategy } from "./types";

export const OUTPUT_FORMATS = ["table", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const DEFAULT_CONCURRENCY = 10;
export const DEFAULT_API_URL = "https://api.github.com";

export interface RankerCliOptions {
  org?: string;
  top?: number;
  metric?: MetricName;
  strategy?: RetrievalStrategy;
  concurrency?: number;
  timeout?: number;
  config?: string;
  apiUrl?: string;
  format: OutputFormat;
  debug?: boolean;
}

export interface ResolvedRankerOptions {
  org: string;
  n: number;
  metric: MetricName;
  strategy: RetrievalStrategy;
  concurrency: number;
  timeoutMs: number | null;
  apiUrl: string;
  token: string | null;
  format: OutputFormat;
  debug: boolean;
}

const RankerConfigFileSchema = z
  .object({
    org: z.string().min(1).optional(),
    top: z.number().int().nonnegative().optional(),
    metric: z.enum(METRIC_NAMES).optional(),
    strategy: z.enum(STRATEGY_NAMES).optional(),
    concurrency: z.number().int().positive().optional(),
    apiUrl: z.string().url().optional(),
  })
  .strict();

export type RankerConfigFile = z.infer<typeof RankerConfigFileSchema>;

function oneOf<T extends string>(allowed: readonly T[], flag: string) {
  return (value: string): T => {
    const normalized = value.trim().toLowerCase();
    const match = allowed.find((candidate) => candidate === normalized);
    if (!match) {
      throw new InvalidArgumentError(`${flag} must be one of [${allowed.map((item) => `"${item}"`).join(", ")}]`);
    }
    return match;
  };
}

export const parseMetric = oneOf(METRIC_NAMES, "--metric");
export const parseStrategy = oneOf(STRATEGY_NAMES, "--strategy");
export const parseFormat = oneOf(OUTPUT_FORMATS, "--format");

function parseInteger(value: string, flag: string, minimum: number): number {
  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < minimum) {
    throw new InvalidArgumentError(
      `${flag} must be a ${minimum > 0 ? "positive" : "non-negative"} integer, got '${value}'`
    );
  }
  return parsed;
}

export function parseTopN(value: string): number {
  return parseInteger(value, "--top", 0);
}

export function parsePositiveInteger(flag: string) {
  return (value: string): number => parseInteger(value, flag, 1);
}

export async function readRankerConfigFile(filePath: string): Promise<RankerConfigFile> {
  const resolved = path.resolve(filePath);
  if (!(await fs.pathExists(resolved))) {
    throw new Error(`Config file not found: ${resolved}`);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(resolved);
  } catch (error) {
    throw new Error(`Failed to read ${resolved}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = RankerConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config file ${resolved}: ${details}`);
  }
  return parsed.data;
}

/** Flags win over the config file, the file over the environment, the environment over defaults. */
export function resolveRankerOptions(
  cli: RankerCliOptions,
  file: RankerConfigFile = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedRankerOptions {
  const org = (cli.org ?? file.org ?? "").trim();
  if (org.length === 0) {
    throw new Error("--org is required");
  }

  const n = cli.top ?? file.top;
  if (n === undefined) {
    throw new Error("--top is required");
  }

  const envConcurrency = env.RANKER_CONCURRENCY
    ? parsePositiveInteger("RANKER_CONCURRENCY")(env.RANKER_CONCURRENCY)
    : undefined;

  const strategy = cli.strategy ?? file.strategy ?? "rest";
  const token = env.GITHUB_TOKEN?.trim() || null;
  if (strategy === "graphql" && !token) {
    throw new Error("GITHUB_TOKEN is required for the graphql strategy. Set it via environment variable or .env file.");
  }

  return {
    org,
    n,
    metric: cli.metric ?? file.metric ?? "stars",
    strategy,
    concurrency: cli.concurrency ?? file.concurrency ?? envConcurrency ?? DEFAULT_CONCURRENCY,
    timeoutMs: cli.timeout !== undefined ? cli.timeout * 1000 : null,
    apiUrl: (cli.apiUrl ?? file.apiUrl ?? env.GITHUB_API_URL ?? DEFAULT_API_URL).replace(/\/+$/, ""),
    token,
    format: cli.format,
    debug: Boolean(cli.debug),
  };
}
