import { describe, expect, it } from "vitest";

import { METRICS, getMetric } from "./metrics";
import { rankSnapshots } from "./rank";
import { fetchSearchSnapshots } from "./strategies/search-rest";
import { ORG_REPOS, createFakeGraphql, createFakeOctokit, type FakeRepo } from "./testing/fake-github";
import { listTopRepositories } from "./top-repos";
import type { MetricName, RankedSnapshot, RankerRuntimeConfig, RetrievalStrategy } from "./types";

function createRuntime(repos: readonly FakeRepo[], options: { pageSize?: number; concurrency?: number } = {}) {
  const rest = createFakeOctokit(repos, options);
  const gql = createFakeGraphql(repos, options);
  const runtime: RankerRuntimeConfig = {
    octokit: rest.octokit,
    graphqlClient: gql.graphqlClient,
    concurrency: options.concurrency ?? 3,
    debug: false,
  };
  return { runtime, rest, gql };
}

function metricValue(snapshot: RankedSnapshot, name: MetricName): number {
  const metric = getMetric(name);
  if (!metric.requiresPullRequests) {
    return metric.value(snapshot);
  }
  return snapshot.stage === "enriched" ? metric.value(snapshot) : Number.NaN;
}

const STRATEGIES: RetrievalStrategy[] = ["rest", "graphql"];
const ALL_METRICS: MetricName[] = ["stars", "forks", "prs", "contribs"];
const SEARCH_SORTED: Array<"stars" | "forks"> = ["stars", "forks"];
const TOP_THREE: Array<[MetricName, string[]]> = [
  ["stars", ["metaflow", "Hystrix", "security_monkey"]],
  ["forks", ["SimianArmy", "metaflow", "chaosmonkey"]],
  ["prs", ["SimianArmy", "metaflow", "zuul"]],
  ["contribs", ["metaflow", "SimianArmy", "boqboqboq"]],
];

describe.each(STRATEGIES)("listTopRepositories with the %s strategy", (strategy) => {
  it.each(TOP_THREE)("ranks the top 3 by %s", async (metric, expected) => {
    const { runtime } = createRuntime(ORG_REPOS);

    const result = await listTopRepositories(runtime, { org: "netflix", n: 3, metric, strategy });

    expect(result.map((snapshot) => snapshot.name)).toEqual(expected);
  });

  it.each(ALL_METRICS)("returns all 7 in order for n=9999 by %s", async (metric) => {
    const { runtime } = createRuntime(ORG_REPOS, { pageSize: 2 });

    const result = await listTopRepositories(runtime, { org: "netflix", n: 9999, metric, strategy });

    expect(result).toHaveLength(7);
    for (let index = 0; index + 1 < result.length; index += 1) {
      expect(metricValue(result[index], metric)).toBeGreaterThanOrEqual(metricValue(result[index + 1], metric));
    }
  });

  it("keeps min(n, total) repositories", async () => {
    for (const n of [0, 1, 6, 7, 8]) {
      const { runtime } = createRuntime(ORG_REPOS);
      const result = await listTopRepositories(runtime, { org: "netflix", n, metric: "contribs", strategy });
      expect(result).toHaveLength(Math.min(n, 7));
    }
  });

  it("reports no pull requests for repositories without issues", async () => {
    const repos = ORG_REPOS.map((repo) =>
      repo.name === "Hystrix" ? { ...repo, prs: 50000, hasIssues: false } : repo
    );
    const { runtime } = createRuntime(repos);

    const result = await listTopRepositories(runtime, { org: "netflix", n: 7, metric: "prs", strategy });

    const hystrix = result.find((snapshot) => snapshot.name === "Hystrix");
    expect(hystrix).toMatchObject({ stage: "enriched", pullRequests: 0 });
    expect(result[0].name).toBe("SimianArmy");
  });
});

describe("listTopRepositories with the rest strategy", () => {
  it("stops paging early for stars and never looks up pull requests", async () => {
    const { runtime, rest } = createRuntime(ORG_REPOS, { pageSize: 2 });

    const result = await listTopRepositories(runtime, { org: "netflix", n: 3, metric: "stars", strategy: "rest" });

    expect(result.map((snapshot) => snapshot.stage)).toEqual(["fetched", "fetched", "fetched"]);
    expect(rest.pagesServed()).toBe(2);
    expect(rest.list).not.toHaveBeenCalled();
  });

  it.each(SEARCH_SORTED)(
    "returns the same %s ranking as fetching every page and sorting locally",
    async (metric) => {
      for (let n = 0; n <= 8; n += 1) {
        const { runtime } = createRuntime(ORG_REPOS, { pageSize: 2 });
        const early = await listTopRepositories(runtime, { org: "netflix", n, metric, strategy: "rest" });

        const everything = await fetchSearchSnapshots({ octokit: createFakeOctokit(ORG_REPOS).octokit, org: "netflix" });
        const local = rankSnapshots(everything, METRICS[metric].compare, n);

        expect(early).toEqual(local);
      }
    }
  );

  it("looks up pull requests in batches of the configured concurrency", async () => {
    const { runtime, rest } = createRuntime(ORG_REPOS, { concurrency: 2 });

    await listTopRepositories(runtime, { org: "netflix", n: 3, metric: "contribs", strategy: "rest" });

    // zuul has no forks, so its lookup cannot change the contribution ranking.
    expect(rest.list.mock.calls.map(([params]) => params.repo)).toEqual([
      "security_monkey",
      "metaflow",
      "SimianArmy",
      "chaosmonkey",
      "Hystrix",
      "boqboqboq",
    ]);
    expect(rest.iterator.mock.calls[0][1]).not.toHaveProperty("sort");
  });
});

describe("listTopRepositories with the graphql strategy", () => {
  it("needs no pull request lookups", async () => {
    const { runtime, rest, gql } = createRuntime(ORG_REPOS);

    await listTopRepositories(runtime, { org: "netflix", n: 3, metric: "prs", strategy: "graphql" });

    expect(gql.client).toHaveBeenCalledTimes(1);
    expect(rest.iterator).not.toHaveBeenCalled();
    expect(rest.list).not.toHaveBeenCalled();
  });
});
