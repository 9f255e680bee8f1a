import type { Octokit } from "@octokit/rest";
import { z } from "zod";

import { DecodeError, asCancellation, throwIfCancelled } from "../errors";
import type { SearchSortField } from "../metrics";
import type { FetchedSnapshot } from "../types";

export const SEARCH_PAGE_SIZE = 100;

const SearchItemSchema = z.object({
  name: z.string().min(1),
  stargazers_count: z.number().int().nonnegative(),
  forks_count: z.number().int().nonnegative(),
  has_issues: z.boolean(),
});

interface FetchSearchSnapshotsParams {
  octokit: Octokit;
  org: string;
  /**
   * Ask the index to sort on `sort`, descending, and stop once `stopAfter`
   * snapshots are in hand. Only sound while the index's order holds across
   * pages.
   */
  ordering?: { sort: SearchSortField; stopAfter: number };
  signal?: AbortSignal;
  debug?: boolean;
}

export function decodeSearchItem(item: unknown): FetchedSnapshot {
  const parsed = SearchItemSchema.safeParse(item);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DecodeError(
      `Unexpected search result shape at '${issue?.path.join(".") ?? ""}': ${issue?.message ?? "invalid"}`
    );
  }
  return {
    stage: "fetched",
    name: parsed.data.name,
    stars: parsed.data.stargazers_count,
    forks: parsed.data.forks_count,
    hasIssues: parsed.data.has_issues,
  };
}

export async function fetchSearchSnapshots({
  octokit,
  org,
  ordering,
  signal,
  debug,
}: FetchSearchSnapshotsParams): Promise<FetchedSnapshot[]> {
  const logPrefix = `[${org}] [search-rest]`;
  throwIfCancelled(signal, `Repository search for ${org}`);

  const snapshots: FetchedSnapshot[] = [];
  if (ordering && ordering.stopAfter <= 0) {
    return snapshots;
  }

  const iterator = octokit.paginate.iterator(octokit.search.repos, {
    q: `org:${org}`,
    per_page: SEARCH_PAGE_SIZE,
    ...(ordering ? { sort: ordering.sort, order: "desc" as const } : {}),
    request: { signal },
  });

  let page = 0;
  try {
    for await (const response of iterator) {
      page += 1;
      if (debug) {
        console.log(`${logPrefix} page ${page}: ${response.data.length} repositories`);
      }

      for (const item of response.data) {
        snapshots.push(decodeSearchItem(item));
        if (ordering && snapshots.length >= ordering.stopAfter) {
          if (debug) {
            console.log(
              `${logPrefix} stopping after page ${page}: top ${ordering.stopAfter} by ${ordering.sort} collected`
            );
          }
          return snapshots;
        }
      }
    }
  } catch (error) {
    throw asCancellation(error, signal, `Repository search for ${org}`);
  }

  if (debug) {
    console.log(`${logPrefix} fetched ${snapshots.length} repositories across ${page} page(s)`);
  }

  return snapshots;
}
