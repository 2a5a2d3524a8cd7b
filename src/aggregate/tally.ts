import type { PackageOutcome, ScanReport, SkipReason, TallyBucket } from "../sources/types.js";

export const SENTINEL_BUCKETS = ["total", "known", "unknown", "na"] as const;

const FETCH_ERRORS: ReadonlySet<SkipReason> = new Set<SkipReason>([
  "error retrieving metadata",
  "no info",
]);

/** Named counters where a bucket that was never incremented reads as zero. */
export class Tally {
  private readonly counts = new Map<string, number>();

  constructor(seed: readonly string[] = []) {
    for (const bucket of seed) this.counts.set(bucket, 0);
  }

  increment(bucket: string, by = 1): void {
    this.counts.set(bucket, this.get(bucket) + by);
  }

  get(bucket: string): number {
    return this.counts.get(bucket) ?? 0;
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}

export function bucketFor(outcome: PackageOutcome): TallyBucket {
  if (outcome.status === "kept") {
    return outcome.versions.length > 0 ? "known" : "unknown";
  }
  return FETCH_ERRORS.has(outcome.reason) ? "na" : "unknown";
}

export class Aggregator {
  private readonly packages = new Map<string, PackageOutcome>();
  private readonly tally = new Tally(SENTINEL_BUCKETS);

  add(pkg: string, outcome: PackageOutcome): TallyBucket {
    this.packages.set(pkg, outcome);
    this.tally.increment("total");

    const bucket = bucketFor(outcome);
    this.tally.increment(bucket);
    if (outcome.status === "kept") {
      for (const version of outcome.versions) this.tally.increment(version);
    }
    return bucket;
  }

  report(): ScanReport {
    return { packages: new Map(this.packages), tally: this.tally.toJSON() };
  }
}
