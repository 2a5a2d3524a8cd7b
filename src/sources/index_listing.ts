import * as core from "@actions/core";
import type { ScanConfig } from "../config.js";

const ANCHOR_REGEX = /<a\s+[^>]*href=["']([^"']*)["'][^>]*>/gi;
const TAG_REGEX = /<[a-z!][^>]*>/i;

export function extractLinks(html: string): string[] {
  const links: string[] = [];
  for (const match of html.matchAll(ANCHOR_REGEX)) {
    links.push(match[1].replace(/&amp;/g, "&"));
  }
  return links;
}

// "requests", "/simple/requests/" and "../requests/#frag" all name "requests".
export function toIdentifier(href: string): string | undefined {
  const path = href.split(/[?#]/)[0];
  const segment = path.split("/").filter((part) => part.length > 0).pop();
  if (!segment || segment === "." || segment === "..") return undefined;
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export async function listPackages(
  config: ScanConfig,
  fetchFn: typeof fetch = fetch
): Promise<string[]> {
  core.info(`Retrieving package index from ${config.index_url}`);

  let response: Response;
  try {
    response = await fetchFn(config.index_url);
  } catch (error) {
    throw new Error(
      `Could not reach package index: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  if (!response.ok) {
    throw new Error(`Package index returned ${response.status}`);
  }

  const html = await response.text();
  if (!TAG_REGEX.test(html)) {
    throw new Error("Package index response is not an HTML document");
  }

  core.info("Parsing package index");
  const packages: string[] = [];
  for (const href of extractLinks(html)) {
    const id = toIdentifier(href);
    if (id) packages.push(id);
  }
  core.info(`${packages.length} packages found`);

  if (config.max_packages !== undefined && packages.length > config.max_packages) {
    core.info(`Limiting scan to the first ${config.max_packages} packages`);
    return packages.slice(0, config.max_packages);
  }
  return packages;
}
