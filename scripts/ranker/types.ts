import type { Octokit } from "@octokit/rest";

export const METRIC_NAMES = ["stars", "forks", "prs", "contribs"] as const;
export type MetricName = (typeof METRIC_NAMES)[number];

export const STRATEGY_NAMES = ["rest", "graphql"] as const;
export type RetrievalStrategy = (typeof STRATEGY_NAMES)[number];

export type GraphqlClient = typeof import("@octokit/graphql").graphql;

export interface RepositoryMetrics {
  readonly name: string;
  readonly stars: number;
  readonly forks: number;
  readonly hasIssues: boolean;
}

/**
 * A repository as decoded from a search page. It has no pull-request total
 * yet, so it cannot be ranked by `prs` or `contribs`.
 */
export interface FetchedSnapshot extends RepositoryMetrics {
  readonly stage: "fetched";
}

export interface EnrichedSnapshot extends RepositoryMetrics {
  readonly stage: "enriched";
  readonly pullRequests: number;
}

export type RankedSnapshot = FetchedSnapshot | EnrichedSnapshot;

export type RankedResult = readonly RankedSnapshot[];

export interface RankerRuntimeConfig {
  octokit: Octokit;
  graphqlClient: GraphqlClient;
  concurrency: number;
  debug: boolean;
}

export interface RankRequest {
  org: string;
  n: number;
  metric: MetricName;
  strategy: RetrievalStrategy;
  signal?: AbortSignal;
}
