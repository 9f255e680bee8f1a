import Table from "cli-table3";

import { METRICS } from "./metrics";
import type { MetricName, RankedResult, RankedSnapshot, RetrievalStrategy } from "./types";

interface OutputContext {
  org: string;
  metric: MetricName;
  strategy: RetrievalStrategy;
}

export interface RankedRepositoryRecord {
  rank: number;
  name: string;
  stars: number;
  forks: number;
  pullRequests?: number;
  contributionRatio?: number;
}

export function formatContribution(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

function hasPullRequests(result: RankedResult): boolean {
  return result.length > 0 && result.every((snapshot) => snapshot.stage === "enriched");
}

export function toRecord(snapshot: RankedSnapshot, index: number): RankedRepositoryRecord {
  const record: RankedRepositoryRecord = {
    rank: index + 1,
    name: snapshot.name,
    stars: METRICS.stars.value(snapshot),
    forks: METRICS.forks.value(snapshot),
  };
  if (snapshot.stage === "enriched") {
    record.pullRequests = METRICS.prs.value(snapshot);
    record.contributionRatio = METRICS.contribs.value(snapshot);
  }
  return record;
}

export function buildTableRows(result: RankedResult): { head: string[]; rows: string[][] } {
  const withPullRequests = hasPullRequests(result);
  const head = ["#", "Repository", METRICS.stars.label, METRICS.forks.label];
  if (withPullRequests) {
    head.push(METRICS.prs.label, METRICS.contribs.label);
  }

  const rows = result.map((snapshot, index) => {
    const record = toRecord(snapshot, index);
    const row = [String(record.rank), record.name, String(record.stars), String(record.forks)];
    if (withPullRequests) {
      row.push(String(record.pullRequests ?? 0), formatContribution(record.contributionRatio ?? 0));
    }
    return row;
  });

  return { head, rows };
}

export function renderTable(result: RankedResult): string {
  const { head, rows } = buildTableRows(result);
  const table = new Table({ head });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

export function renderJson(result: RankedResult, context: OutputContext): string {
  return JSON.stringify(
    {
      org: context.org,
      metric: context.metric,
      strategy: context.strategy,
      repositories: result.map(toRecord),
    },
    null,
    2
  );
}
