import { getMetric } from "./metrics";
import { rankSnapshots } from "./rank";
import { fetchCombinedSnapshots } from "./strategies/search-graphql";
import { enrichSnapshots } from "./strategies/pull-requests";
import { fetchSearchSnapshots } from "./strategies/search-rest";
import type { EnrichedSnapshot, RankRequest, RankedResult, RankerRuntimeConfig } from "./types";

/**
 * Returns the top `n` repositories of `org` by `metric`.
 *
 * The `graphql` strategy reads every metric in one paginated query and always
 * sorts locally. The `rest` strategy lets the search index sort by stars or
 * forks and stops paging at `n`; for pull-request metrics it fetches every
 * repository and fills in pull-request totals in batches of
 * `runtime.concurrency` lookups.
 */
export async function listTopRepositories(runtime: RankerRuntimeConfig, request: RankRequest): Promise<RankedResult> {
  const { org, n, strategy, signal } = request;
  const metric = getMetric(request.metric);
  const { debug } = runtime;

  if (strategy === "graphql") {
    const snapshots = await fetchCombinedSnapshots({
      graphqlClient: runtime.graphqlClient,
      org,
      signal,
      debug,
    });
    return rankSnapshots<EnrichedSnapshot>(snapshots, metric.compare, n);
  }

  if (!metric.requiresPullRequests) {
    const snapshots = await fetchSearchSnapshots({
      octokit: runtime.octokit,
      org,
      ordering: { sort: metric.searchSort, stopAfter: n },
      signal,
      debug,
    });
    return rankSnapshots(snapshots, metric.compare, n, { presorted: true });
  }

  const fetched = await fetchSearchSnapshots({ octokit: runtime.octokit, org, signal, debug });
  const enriched = await enrichSnapshots({
    octokit: runtime.octokit,
    org,
    snapshots: fetched,
    concurrency: runtime.concurrency,
    skipLookup: metric.skipLookup,
    signal,
    debug,
  });
  return rankSnapshots(enriched, metric.compare, n);
}
