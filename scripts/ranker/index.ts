#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import { Octokit } from "@octokit/rest";
import { graphql } from "@octokit/graphql";

import {
  parseFormat,
  parseMetric,
  parsePositiveInteger,
  parseStrategy,
  parseTopN,
  readRankerConfigFile,
  resolveRankerOptions,
  type RankerCliOptions,
} from "./config";
import { CancellationError } from "./errors";
import { renderJson, renderTable } from "./output";
import { RateLimiter, resourceForRoute } from "./rate-limiter";
import { listTopRepositories } from "./top-repos";
import type { RankerRuntimeConfig } from "./types";

const program = new Command();

program
  .name("repo-rank")
  .description("List the top-n repositories of a GitHub organization by stars, forks, pull requests or contribution ratio")
  .option("--org <name>", "Organization to rank repositories for (required)")
  .option("-n, --top <number>", "How many repositories to list (required)", parseTopN)
  .option("-m, --metric <name>", 'Metric to rank by: "stars", "forks", "prs" or "contribs" (default: stars)', parseMetric)
  .option(
    "-s, --strategy <name>",
    'Retrieval strategy: "rest" (search + per-repo pull request lookups) or "graphql" (one combined query) (default: rest)',
    parseStrategy
  )
  .option(
    "-c, --concurrency <number>",
    "Pull request lookups per batch for the prs and contribs metrics (default: RANKER_CONCURRENCY or 10)",
    parsePositiveInteger("--concurrency")
  )
  .option("--timeout <seconds>", "Cancel the ranking after this many seconds", parsePositiveInteger("--timeout"))
  .option("--config <path>", "JSON file with default org, top, metric, strategy, concurrency and apiUrl")
  .option("--api-url <url>", "GitHub API base URL, for GitHub Enterprise (default: GITHUB_API_URL or api.github.com)")
  .option("-f, --format <type>", "Output format: table or json", parseFormat, "table")
  .option("--debug", "Log every page and batch");

async function run() {
  const started = Date.now();
  program.parse(process.argv);
  const cliOptions = program.opts<RankerCliOptions>();

  const fileOptions = cliOptions.config ? await readRankerConfigFile(cliOptions.config) : {};
  const options = resolveRankerOptions(cliOptions, fileOptions);

  // Keep stdout clean for machine-readable output.
  const progress = options.format === "json" ? console.error : console.log;

  if (options.debug) {
    progress("ℹ️  Debug mode enabled");
  }

  const rateLimiter = new RateLimiter({ log: progress });
  const octokit = new Octokit({
    auth: options.token ?? undefined,
    baseUrl: options.apiUrl,
  });
  octokit.hook.before("request", async (request) => {
    await rateLimiter.checkAndWait(resourceForRoute(request.url), request.request?.signal);
  });
  octokit.hook.after("request", (response) => {
    rateLimiter.updateFromHeaders(response.headers);
  });
  const graphqlClient = graphql.defaults({
    baseUrl: options.apiUrl,
    headers: options.token ? { authorization: `token ${options.token}` } : {},
  });

  const runtime: RankerRuntimeConfig = {
    octokit,
    graphqlClient,
    concurrency: options.concurrency,
    debug: options.debug,
  };

  const controller = new AbortController();
  const onInterrupt = () => {
    console.error("\n⏹️  Interrupted, cancelling…");
    controller.abort(new Error("Interrupted by user"));
  };
  process.once("SIGINT", onInterrupt);
  const deadline =
    options.timeoutMs !== null
      ? setTimeout(
          () => controller.abort(new Error(`Timed out after ${options.timeoutMs}ms`)),
          options.timeoutMs
        )
      : null;

  progress(
    `⏳ Listing top ${options.n} repos for org "${options.org}" by "${options.metric}" [strategy=${options.strategy}]…`
  );

  try {
    const result = await listTopRepositories(runtime, {
      org: options.org,
      n: options.n,
      metric: options.metric,
      strategy: options.strategy,
      signal: controller.signal,
    });

    console.log(
      options.format === "json"
        ? renderJson(result, { org: options.org, metric: options.metric, strategy: options.strategy })
        : renderTable(result)
    );
  } finally {
    if (deadline) {
      clearTimeout(deadline);
    }
    process.removeListener("SIGINT", onInterrupt);
  }

  if (options.debug && options.strategy === "rest") {
    progress(
      `ℹ️  Rate limit remaining: search=${rateLimiter.remaining("search") ?? "unknown"}, core=${rateLimiter.remaining("core") ?? "unknown"}`
    );
  }
  progress(`✅ Took ${((Date.now() - started) / 1000).toFixed(2)}s`);
}

function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error instanceof CancellationError && error.cause instanceof Error) {
    return `${error.message} (${error.cause.message})`;
  }
  return error.message;
}

run().catch((error) => {
  console.error("\n❌ Ranking failed:", describeFailure(error));
  process.exit(1);
});
