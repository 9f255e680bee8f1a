import { z } from "zod";

import { DecodeError, asCancellation, throwIfCancelled } from "../errors";
import type { EnrichedSnapshot, GraphqlClient } from "../types";

interface FetchCombinedSnapshotsParams {
  graphqlClient: GraphqlClient;
  org: string;
  signal?: AbortSignal;
  debug?: boolean;
}

export const COMBINED_SEARCH_QUERY = /* GraphQL */ `
  query ($query: String!, $cursor: String) {
    search(query: $query, type: REPOSITORY, first: 100, after: $cursor) {
      nodes {
        ... on Repository {
          name
          stargazerCount
          forkCount
          hasIssuesEnabled
          pullRequests {
            totalCount
          }
        }
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

const CombinedSearchResponseSchema = z.object({
  search: z.object({
    nodes: z.array(
      z.object({
        name: z.string().min(1),
        stargazerCount: z.number().int().nonnegative(),
        forkCount: z.number().int().nonnegative(),
        hasIssuesEnabled: z.boolean(),
        pullRequests: z.object({ totalCount: z.number().int().nonnegative() }),
      })
    ),
    pageInfo: z.object({
      hasNextPage: z.boolean(),
      endCursor: z.string().nullable(),
    }),
  }),
});

export type CombinedSearchResponse = z.infer<typeof CombinedSearchResponseSchema>;

function decodeCombinedPage(response: unknown): CombinedSearchResponse["search"] {
  const parsed = CombinedSearchResponseSchema.safeParse(response);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DecodeError(
      `Unexpected combined search shape at '${issue?.path.join(".") ?? ""}': ${issue?.message ?? "invalid"}`
    );
  }
  return parsed.data.search;
}

export async function fetchCombinedSnapshots({
  graphqlClient,
  org,
  signal,
  debug,
}: FetchCombinedSnapshotsParams): Promise<EnrichedSnapshot[]> {
  const logPrefix = `[${org}] [search-graphql]`;
  const what = `Combined repository search for ${org}`;
  const snapshots: EnrichedSnapshot[] = [];
  let cursor: string | null = null;
  let page = 0;

  while (true) {
    throwIfCancelled(signal, what);

    let response: unknown;
    try {
      response = await graphqlClient<unknown>(COMBINED_SEARCH_QUERY, {
        query: `org:${org}`,
        cursor,
        request: { signal },
      });
    } catch (error) {
      throw asCancellation(error, signal, what);
    }

    const connection = decodeCombinedPage(response);
    page += 1;

    for (const node of connection.nodes) {
      snapshots.push({
        stage: "enriched",
        name: node.name,
        stars: node.stargazerCount,
        forks: node.forkCount,
        hasIssues: node.hasIssuesEnabled,
        // Same rule as the REST lookup: no issues tracker, no counted pull requests.
        pullRequests: node.hasIssuesEnabled ? node.pullRequests.totalCount : 0,
      });
    }

    if (debug) {
      console.log(`${logPrefix} page ${page}: ${connection.nodes.length} repositories`);
    }

    if (!connection.pageInfo.hasNextPage) {
      break;
    }

    if (connection.pageInfo.endCursor === null) {
      throw new DecodeError(`${what}: page ${page} reports a next page without an end cursor`);
    }
    cursor = connection.pageInfo.endCursor;
  }

  if (debug) {
    console.log(`${logPrefix} fetched ${snapshots.length} repositories across ${page} page(s)`);
  }

  return snapshots;
}
