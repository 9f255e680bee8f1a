import type { EnrichedSnapshot, MetricName, RepositoryMetrics } from "./types";

export type Comparator<T> = (a: T, b: T) => number;

export type SearchSortField = "stars" | "forks";

/** Metrics the search index can sort by itself. */
export interface SearchSortableMetric {
  readonly kind: "stars" | "forks";
  readonly label: string;
  readonly requiresPullRequests: false;
  readonly searchSort: SearchSortField;
  readonly value: (snapshot: RepositoryMetrics) => number;
  readonly compare: Comparator<RepositoryMetrics>;
}

/** Metrics that need every repository's pull-request total before ranking. */
export interface PullRequestMetric {
  readonly kind: "prs" | "contribs";
  readonly label: string;
  readonly requiresPullRequests: true;
  // A lookup for a skipped repository could not change its rank.
  readonly skipLookup: (snapshot: RepositoryMetrics) => boolean;
  readonly value: (snapshot: EnrichedSnapshot) => number;
  readonly compare: Comparator<EnrichedSnapshot>;
}

export type Metric = SearchSortableMetric | PullRequestMetric;

export function descendingBy<T>(value: (item: T) => number): Comparator<T> {
  return (a, b) => value(b) - value(a);
}

export function contributionRatio(snapshot: Pick<EnrichedSnapshot, "pullRequests" | "forks">): number {
  if (snapshot.forks === 0) {
    return 0;
  }
  return snapshot.pullRequests / snapshot.forks;
}

const issuesDisabled = (snapshot: RepositoryMetrics) => !snapshot.hasIssues;

const stars = (snapshot: RepositoryMetrics) => snapshot.stars;
const forks = (snapshot: RepositoryMetrics) => snapshot.forks;
const pullRequests = (snapshot: EnrichedSnapshot) => snapshot.pullRequests;

export const METRICS = {
  stars: {
    kind: "stars",
    label: "Stars",
    requiresPullRequests: false,
    searchSort: "stars",
    value: stars,
    compare: descendingBy(stars),
  },
  forks: {
    kind: "forks",
    label: "Forks",
    requiresPullRequests: false,
    searchSort: "forks",
    value: forks,
    compare: descendingBy(forks),
  },
  prs: {
    kind: "prs",
    label: "Pull requests",
    requiresPullRequests: true,
    skipLookup: issuesDisabled,
    value: pullRequests,
    compare: descendingBy(pullRequests),
  },
  contribs: {
    kind: "contribs",
    label: "Contribution",
    requiresPullRequests: true,
    skipLookup: (snapshot: RepositoryMetrics) => issuesDisabled(snapshot) || snapshot.forks === 0,
    value: contributionRatio,
    compare: descendingBy(contributionRatio),
  },
} as const satisfies Record<MetricName, Metric>;

export function getMetric(name: MetricName): Metric {
  return METRICS[name];
}
