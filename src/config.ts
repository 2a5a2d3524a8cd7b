import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const ClassificationSchema = z.object({
  language: z.string().min(1).default("Python"),
  version_format: z.enum(["major_minor", "any"]).default("any"),
  require_summary: z.boolean().default(false),
  summary_placeholder: z.string().default("UNKNOWN"),
});

const OutputSchema = z.object({
  packages_file: z.string().min(1).default("PKG_INFO.json"),
  tally_file: z.string().min(1).default("VERSIONS.json"),
});

export const ScanConfigSchema = z.object({
  index_url: z.string().url().default("https://pypi.org/simple/"),
  metadata_url: z.string().url().default("https://pypi.org/pypi"),
  concurrency: z
    .union([z.number().int().positive(), z.literal("unbounded")])
    .default(32),
  request_timeout_ms: z.number().int().positive().optional(),
  max_packages: z.number().int().positive().optional(),
  classification: ClassificationSchema.default({}),
  output: OutputSchema.default({}),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type ClassificationConfig = ScanConfig["classification"];

export function parseConfig(yamlContent: string): ScanConfig {
  // An empty document parses to null; treat it as "all defaults".
  const raw: unknown = parseYaml(yamlContent) ?? {};
  return ScanConfigSchema.parse(raw);
}

export function loadConfig(filePath: string): ScanConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseConfig(content);
}
