import type { Octokit } from "@octokit/rest";

import { runInBatches } from "../batch";
import { DecodeError, asCancellation, throwIfCancelled } from "../errors";
import type { EnrichedSnapshot, FetchedSnapshot, RepositoryMetrics } from "../types";

interface CountPullRequestsParams {
  octokit: Octokit;
  owner: string;
  repo: string;
  signal?: AbortSignal;
}

interface EnrichSnapshotsParams {
  octokit: Octokit;
  org: string;
  snapshots: readonly FetchedSnapshot[];
  concurrency: number;
  skipLookup: (snapshot: RepositoryMetrics) => boolean;
  signal?: AbortSignal;
  debug?: boolean;
}

const LINK_PART = /<([^>]+)>\s*;\s*rel="([^"]+)"/;

/**
 * Reads the page number of the `rel="last"` entry of a Link header, or null
 * when the header has no such entry.
 */
export function parseLastPage(link: string | undefined): number | null {
  if (!link) {
    return null;
  }

  for (const part of link.split(",")) {
    const match = LINK_PART.exec(part);
    if (!match || !match[2].split(/\s+/).includes("last")) {
      continue;
    }
    const page = /[?&]page=(\d+)/.exec(match[1]);
    const parsed = page ? Number.parseInt(page[1], 10) : Number.NaN;
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new DecodeError(`Malformed last-page link: ${match[1]}`);
    }
    return parsed;
  }

  return null;
}

/**
 * Lists the repository's pull requests one per page: the last page number is
 * then the total. A single page carries no last link, so its item count (0
 * or 1) is the total instead.
 */
export async function countPullRequests({ octokit, owner, repo, signal }: CountPullRequestsParams): Promise<number> {
  const what = `Pull request count for ${owner}/${repo}`;
  throwIfCancelled(signal, what);

  try {
    const response = await octokit.pulls.list({
      owner,
      repo,
      state: "all",
      per_page: 1,
      request: { signal },
    });
    if (!Array.isArray(response.data)) {
      throw new DecodeError(`${what}: expected an array of pull requests`);
    }
    return parseLastPage(response.headers.link) ?? response.data.length;
  } catch (error) {
    throw asCancellation(error, signal, what);
  }
}

export async function enrichSnapshots({
  octokit,
  org,
  snapshots,
  concurrency,
  skipLookup,
  signal,
  debug,
}: EnrichSnapshotsParams): Promise<EnrichedSnapshot[]> {
  const logPrefix = `[${org}] [pull-requests]`;
  const batchCount = Math.ceil(snapshots.length / concurrency);
  let skipped = 0;

  const enriched = await runInBatches(
    snapshots,
    concurrency,
    async (snapshot, batchSignal): Promise<EnrichedSnapshot> => {
      if (skipLookup(snapshot)) {
        skipped += 1;
        if (debug) {
          console.log(
            `${logPrefix} ${snapshot.name} ⏭️  skipped (issues=${snapshot.hasIssues}, forks=${snapshot.forks})`
          );
        }
        return { ...snapshot, stage: "enriched", pullRequests: 0 };
      }

      const pullRequests = await countPullRequests({
        octokit,
        owner: org,
        repo: snapshot.name,
        signal: batchSignal,
      });
      return { ...snapshot, stage: "enriched", pullRequests };
    },
    {
      signal,
      onBatch: (index, count) => {
        throwIfCancelled(signal, `Pull request enrichment for ${org}`);
        if (debug) {
          console.log(`${logPrefix} batch ${index + 1}/${batchCount}: ${count} repositories`);
        }
      },
    }
  );

  if (debug) {
    console.log(`${logPrefix} counted pull requests for ${enriched.length - skipped} repositories, skipped ${skipped}`);
  }

  return enriched;
}
