export type SkipReason =
  | "error retrieving metadata"
  | "no info"
  | "no summary"
  | "no classifiers";

export type PackageOutcome =
  | { status: "kept"; versions: string[] }
  | { status: "skipped"; reason: SkipReason };

export type TallyBucket = "known" | "unknown" | "na";

export interface ScanReport {
  packages: Map<string, PackageOutcome>;
  tally: Record<string, number>;
}
