import * as core from "@actions/core";
import type { ScanConfig } from "./config.js";
import type { PackageOutcome, ScanReport } from "./sources/types.js";
import { Aggregator } from "./aggregate/tally.js";
import { completed, poolSize } from "./concurrency/pool.js";
import { formatTally } from "./output/json_files.js";

export interface PipelineResult {
  packagesFound: number;
  packagesKept: number;
  packagesSkipped: number;
  tally: Record<string, number>;
  elapsedMs: number;
}

export interface PipelineDeps {
  list: (config: ScanConfig) => Promise<string[]>;
  classify: (
    pkg: string,
    index: number,
    config: ScanConfig
  ) => Promise<PackageOutcome>;
  output: (report: ScanReport, config: ScanConfig) => void | Promise<void>;
}

function elapsed(ms: number): string {
  return `${(ms / 1000).toFixed(3)}s`;
}

export async function runPipeline(
  config: ScanConfig,
  deps: PipelineDeps,
  now: () => number = Date.now
): Promise<PipelineResult> {
  const startedAt = now();
  core.info(`Started: ${new Date(startedAt).toISOString()}`);

  core.info("Stage 1/3: Listing packages...");
  const packages = await deps.list(config);
  core.info(`  Found ${packages.length} packages`);

  core.info("Stage 2/3: Fetching and classifying metadata...");
  const scanStartedAt = now();
  const aggregator = new Aggregator();
  let kept = 0;
  let skipped = 0;

  const settlements = completed(
    packages,
    poolSize(config.concurrency, packages.length),
    (pkg, index) => deps.classify(pkg, index, config)
  );

  for await (const settled of settlements) {
    let outcome: PackageOutcome;
    if (settled.status === "fulfilled") {
      outcome = settled.value;
    } else {
      core.warning(
        `Classification failed for "${settled.item}": ${settled.reason instanceof Error ? settled.reason.message : String(settled.reason)}`
      );
      outcome = { status: "skipped", reason: "error retrieving metadata" };
    }

    aggregator.add(settled.item, outcome);
    if (outcome.status === "kept") kept++;
    else skipped++;
  }
  const scanFinishedAt = now();

  core.info("Stage 3/3: Writing output...");
  const report = aggregator.report();
  await deps.output(report, config);

  const finishedAt = now();
  core.info(`Finished: ${new Date(finishedAt).toISOString()}`);
  core.info(`Scan elapsed: ${elapsed(scanFinishedAt - scanStartedAt)}`);
  core.info(`Total elapsed: ${elapsed(finishedAt - startedAt)}`);
  core.info(formatTally(report.tally));

  return {
    packagesFound: packages.length,
    packagesKept: kept,
    packagesSkipped: skipped,
    tally: report.tally,
    elapsedMs: finishedAt - startedAt,
  };
}
