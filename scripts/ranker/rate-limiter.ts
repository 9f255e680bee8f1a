import type { ResponseHeaders } from "@octokit/types";

import { CancellationError } from "./errors";

export type RateLimitResource = "core" | "search";

interface Bucket {
  limit: number | null;
  remaining: number;
  resetAt: Date;
}

export interface RateLimiterOptions {
  thresholds?: Partial<Record<RateLimitResource, number>>;
  log?: (message: string) => void;
}

// Search has its own, much smaller quota than the rest of the REST API.
const DEFAULT_THRESHOLDS: Record<RateLimitResource, number> = {
  core: 100,
  search: 2,
};

// Small quotas (anonymous callers get 60 core requests an hour) scale the threshold down.
const LOW_FRACTION = 0.1;

export function resourceForRoute(url: string): RateLimitResource {
  return url.startsWith("/search/") ? "search" : "core";
}

export class RateLimiter {
  private buckets = new Map<RateLimitResource, Bucket>();
  private thresholds: Record<RateLimitResource, number>;
  private log: (message: string) => void;

  constructor(options: RateLimiterOptions = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
    this.log = options.log ?? console.error;
  }

  remaining(resource: RateLimitResource): number | null {
    return this.buckets.get(resource)?.remaining ?? null;
  }

  async checkAndWait(resource: RateLimitResource, signal?: AbortSignal) {
    const bucket = this.buckets.get(resource);
    const now = Date.now();
    if (!bucket || bucket.remaining > this.lowWatermark(resource, bucket) || bucket.resetAt.getTime() <= now) {
      return;
    }
    const waitMs = bucket.resetAt.getTime() - now + 1000;
    const seconds = Math.ceil(waitMs / 1000);
    this.log(
      `⏸️  ${resource} rate limit low (${bucket.remaining} remaining). Waiting ${seconds}s until ${bucket.resetAt.toISOString()}…`
    );
    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new CancellationError(`Waiting for the ${resource} rate limit reset cancelled`, { cause: signal?.reason }));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, waitMs);
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private lowWatermark(resource: RateLimitResource, bucket: Bucket): number {
    const threshold = this.thresholds[resource];
    if (bucket.limit === null) {
      return threshold;
    }
    return Math.min(threshold, Math.floor(bucket.limit * LOW_FRACTION));
  }

  updateFromHeaders(headers: ResponseHeaders) {
    const resourceHeader = headers["x-ratelimit-resource"];
    const resource: RateLimitResource = resourceHeader === "search" ? "search" : "core";

    const limit = toInteger(headers["x-ratelimit-limit"]);
    const remaining = toInteger(headers["x-ratelimit-remaining"]);
    const reset = toInteger(headers["x-ratelimit-reset"]);
    if (remaining === null && reset === null) {
      return;
    }

    const current = this.buckets.get(resource);
    this.buckets.set(resource, {
      limit: limit ?? current?.limit ?? null,
      remaining: remaining ?? current?.remaining ?? Number.POSITIVE_INFINITY,
      resetAt: reset !== null ? new Date(reset * 1000) : current?.resetAt ?? new Date(0),
    });
  }
}

function toInteger(value: string | number | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}
