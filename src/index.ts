import * as core from "@actions/core";
import { loadConfig } from "./config.js";
import { runPipeline } from "./pipeline.js";
import { listPackages } from "./sources/index_listing.js";
import { classifyPackage } from "./classifier/versions.js";
import { writeReport } from "./output/json_files.js";

const DEFAULT_CONFIG_PATH = "version-scan.yml";

async function run(): Promise<void> {
  try {
    const configPath = core.getInput("config_path") || DEFAULT_CONFIG_PATH;

    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);

    const result = await runPipeline(config, {
      list: (cfg) => listPackages(cfg),
      classify: (pkg, index, cfg) => classifyPackage(pkg, index, cfg),
      output: writeReport,
    });

    core.setOutput("packages_found", result.packagesFound);
    core.setOutput("packages_total", result.tally.total);
    core.setOutput("packages_known", result.tally.known);
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  }
}

void run();
