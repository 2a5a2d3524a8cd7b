import * as core from "@actions/core";
import { z } from "zod";
import type { ClassificationConfig, ScanConfig } from "../config.js";
import type { PackageOutcome, SkipReason } from "../sources/types.js";

const CATEGORY = "Programming Language";

const VERSION_PATTERNS: Record<ClassificationConfig["version_format"], RegExp> = {
  major_minor: /^\d+\.\d+$/,
  any: /^\d+(\.\d+)?$/,
};

// Only the two fields the classifier reads are modelled; a malformed
// summary or classifier list counts as missing rather than failing the record.
// An empty info object is the same as no info at all.
const MetadataSchema = z.object({
  info: z
    .record(z.unknown())
    .refine((info) => Object.keys(info).length > 0)
    .pipe(
      z.object({
        summary: z.string().nullish().catch(undefined),
        classifiers: z.array(z.string()).nullish().catch(undefined),
      })
    ),
});

export type Metadata = z.infer<typeof MetadataSchema>;

type MetadataResult =
  | { ok: true; metadata: Metadata }
  | { ok: false; reason: SkipReason };

export function metadataUrl(pkg: string, config: ScanConfig): string {
  const base = config.metadata_url.replace(/\/+$/, "");
  return `${base}/${encodeURIComponent(pkg)}/json`;
}

export function extractVersions(
  classifiers: string[],
  options: Pick<ClassificationConfig, "language" | "version_format">
): string[] {
  const pattern = VERSION_PATTERNS[options.version_format];
  const versions = new Set<string>();

  for (const classifier of classifiers) {
    const parts = classifier.split("::").map((part) => part.trim());
    if (parts.length !== 3) continue;
    const [category, language, token] = parts;
    if (category !== CATEGORY || language !== options.language) continue;
    if (pattern.test(token)) versions.add(token);
  }

  return [...versions].sort((a, b) =>
    a.localeCompare(b, undefined, { numeric: true })
  );
}

async function fetchMetadata(
  pkg: string,
  config: ScanConfig,
  fetchFn: typeof fetch
): Promise<MetadataResult> {
  const signal =
    config.request_timeout_ms !== undefined
      ? AbortSignal.timeout(config.request_timeout_ms)
      : undefined;

  let response: Response;
  try {
    response = await fetchFn(metadataUrl(pkg, config), { signal });
  } catch {
    return { ok: false, reason: "error retrieving metadata" };
  }
  if (!response.ok) {
    // Release the connection without reading the error page.
    await response.body?.cancel();
    return { ok: false, reason: "error retrieving metadata" };
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch {
    // The timeout also covers the body; a stalled read is a transport failure.
    if (signal?.aborted) {
      return { ok: false, reason: "error retrieving metadata" };
    }
    return { ok: false, reason: "no info" };
  }

  const parsed = MetadataSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, reason: "no info" };
  }
  return { ok: true, metadata: parsed.data };
}

export function classifyMetadata(
  metadata: Metadata,
  options: ClassificationConfig
): PackageOutcome {
  const { summary, classifiers } = metadata.info;

  if (
    options.require_summary &&
    (!summary || summary.trim() === options.summary_placeholder)
  ) {
    return { status: "skipped", reason: "no summary" };
  }

  if (!classifiers || classifiers.length === 0) {
    return { status: "skipped", reason: "no classifiers" };
  }

  return { status: "kept", versions: extractVersions(classifiers, options) };
}

export async function classifyPackage(
  pkg: string,
  index: number,
  config: ScanConfig,
  fetchFn: typeof fetch = fetch
): Promise<PackageOutcome> {
  const label = `[${String(index).padStart(7)}]`;
  const result = await fetchMetadata(pkg, config, fetchFn);
  const outcome: PackageOutcome = result.ok
    ? classifyMetadata(result.metadata, config.classification)
    : { status: "skipped", reason: result.reason };

  if (outcome.status === "skipped") {
    core.info(`${label} skip ${pkg}: ${outcome.reason}`);
  } else {
    core.info(`${label} keep ${pkg}`);
  }
  return outcome;
}
