import { describe, it, expect, vi } from "vitest";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  extractLinks,
  listPackages,
  toIdentifier,
} from "../../src/sources/index_listing.js";
import { ScanConfigSchema } from "../../src/config.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
}));

const indexHtml = readFileSync(
  join(dirname(fileURLToPath(import.meta.url)), "../fixtures/simple-index.html"),
  "utf-8"
);

const baseConfig = ScanConfigSchema.parse({
  index_url: "https://index.example.test/simple/",
});

const respondWith = (body: string, status = 200) =>
  vi.fn(async () => new Response(body, { status }));

describe("extractLinks", () => {
  it("returns href targets in document order", () => {
    expect(extractLinks(indexHtml)).toEqual([
      "/simple/alpha-pkg/",
      "/simple/beta_tools/",
      "/simple/gamma/",
      "delta",
      "/simple/zope.interface/",
    ]);
  });

  it("decodes escaped ampersands", () => {
    expect(extractLinks('<a href="/x?a=1&amp;b=2">x</a>')).toEqual([
      "/x?a=1&b=2",
    ]);
  });

  it("returns an empty list when there are no anchors", () => {
    expect(extractLinks("<html><body>nothing</body></html>")).toEqual([]);
  });
});

describe("toIdentifier", () => {
  it("uses a bare href as is", () => {
    expect(toIdentifier("requests")).toBe("requests");
  });

  it("takes the last path segment of a path href", () => {
    expect(toIdentifier("/simple/requests/")).toBe("requests");
  });

  it("drops query strings and fragments", () => {
    expect(toIdentifier("../requests/?x=1#top")).toBe("requests");
  });

  it("decodes percent escapes", () => {
    expect(toIdentifier("/simple/foo%2Bbar/")).toBe("foo+bar");
  });

  it("returns undefined for hrefs without a name", () => {
    expect(toIdentifier("/")).toBeUndefined();
    expect(toIdentifier("#top")).toBeUndefined();
    expect(toIdentifier("..")).toBeUndefined();
  });
});

describe("listPackages", () => {
  it("fetches the index and returns package identifiers", async () => {
    const fetchFn = respondWith(indexHtml);

    const packages = await listPackages(baseConfig, fetchFn);

    expect(fetchFn).toHaveBeenCalledWith("https://index.example.test/simple/");
    expect(packages).toEqual([
      "alpha-pkg",
      "beta_tools",
      "gamma",
      "delta",
      "zope.interface",
    ]);
  });

  it("keeps duplicate identifiers", async () => {
    const fetchFn = respondWith('<a href="dup">dup</a><a href="dup">dup</a>');

    expect(await listPackages(baseConfig, fetchFn)).toEqual(["dup", "dup"]);
  });

  it("truncates to max_packages when configured", async () => {
    const config = ScanConfigSchema.parse({ max_packages: 2 });

    const packages = await listPackages(config, respondWith(indexHtml));
    expect(packages).toEqual(["alpha-pkg", "beta_tools"]);
  });

  it("fails on a non-success status", async () => {
    await expect(
      listPackages(baseConfig, respondWith("Service Unavailable", 503))
    ).rejects.toThrow("Package index returned 503");
  });

  it("fails when the index cannot be reached", async () => {
    const fetchFn = vi.fn(async (): Promise<Response> => {
      throw new Error("connect ECONNREFUSED");
    });

    await expect(listPackages(baseConfig, fetchFn)).rejects.toThrow(
      "Could not reach package index: connect ECONNREFUSED"
    );
  });

  it("fails when the body is not markup", async () => {
    await expect(
      listPackages(baseConfig, respondWith('{"projects": []}'))
    ).rejects.toThrow("Package index response is not an HTML document");
  });
});
