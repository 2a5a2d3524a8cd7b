import { writeFileSync } from "node:fs";
import * as core from "@actions/core";
import type { ScanConfig } from "../config.js";
import type { ScanReport } from "../sources/types.js";

type WriteFileFn = (path: string, data: string) => void;

export function packageVersions(report: ScanReport): Record<string, string[]> {
  const entries = [...report.packages].map(
    ([pkg, outcome]): [string, string[]] => [
      pkg,
      outcome.status === "kept" ? outcome.versions : [],
    ]
  );
  return Object.fromEntries(entries);
}

export function formatTally(tally: Record<string, number>): string {
  return JSON.stringify(tally, null, 2);
}

export function writeReport(
  report: ScanReport,
  config: ScanConfig,
  writeFileFn: WriteFileFn = writeFileSync
): void {
  const { packages_file, tally_file } = config.output;

  writeFileFn(packages_file, `${JSON.stringify(packageVersions(report), null, 2)}\n`);
  core.info(`Wrote ${report.packages.size} package entries to ${packages_file}`);

  writeFileFn(tally_file, `${formatTally(report.tally)}\n`);
  core.info(`Wrote version tally to ${tally_file}`);
}
