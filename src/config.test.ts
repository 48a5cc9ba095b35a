import { describe, expect, it } from "vitest";
import {
  ConfigError,
  loadConfig,
  normalizeBasePath,
  publishedMenu,
  resolvePort,
  withBasePath,
  type SiteConfig,
} from "./config";
import { renderMenuItems } from "./lib/menu";

describe("normalizeBasePath", () => {
  it("adds a leading slash and drops trailing ones", () => {
    expect(normalizeBasePath("")).toBe("");
    expect(normalizeBasePath("/")).toBe("");
    expect(normalizeBasePath("concepts")).toBe("/concepts");
    expect(normalizeBasePath("/docs/concepts/")).toBe("/docs/concepts");
  });

  it("rejects single-character base paths", () => {
    expect(() => normalizeBasePath("/a")).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  it("uses defaults without environment overrides", () => {
    const site = loadConfig({});
    expect(site.title).toBe("Programming Concepts");
    expect(site.basePath).toBe("");
    expect(site.menu.map((entry) => entry.label)).toEqual([
      "Home",
      "Immutability",
      "Closures",
      "Recursion",
      "Helpers",
    ]);
  });

  it("reads the title and base path from the environment", () => {
    const site = loadConfig({ SITE_TITLE: "Concepts", SITE_BASE_PATH: "/concepts/" });
    expect(site.title).toBe("Concepts");
    expect(site.basePath).toBe("/concepts");
  });

  it("returns a frozen configuration", () => {
    const site = loadConfig({});
    expect(Object.isFrozen(site)).toBe(true);
    expect(Object.isFrozen(site.menu)).toBe(true);
    expect(site.menu.every((entry) => Object.isFrozen(entry))).toBe(true);
  });
});

describe("withBasePath", () => {
  const site = loadConfig({ SITE_BASE_PATH: "concepts" });

  it("prefixes site-absolute hrefs", () => {
    expect(withBasePath(site, "/")).toBe("/concepts/");
    expect(withBasePath(site, "/closures/")).toBe("/concepts/closures/");
  });

  it("leaves other hrefs alone", () => {
    expect(withBasePath(site, "https://example.com/")).toBe("https://example.com/");
    expect(withBasePath(site, "//cdn.example.com/x.css")).toBe("//cdn.example.com/x.css");
    expect(withBasePath(site, "#top")).toBe("#top");
  });
});

describe("publishedMenu", () => {
  it("keeps paths unchanged at the root", () => {
    expect(publishedMenu(loadConfig({}))[1]).toEqual({
      label: "Immutability",
      path: "immutability",
    });
  });

  it("folds the base path into every entry", () => {
    const menu = publishedMenu(loadConfig({ SITE_BASE_PATH: "/concepts" }));
    expect(menu.slice(0, 2)).toEqual([
      { label: "Home", path: "concepts" },
      { label: "Immutability", path: "concepts/immutability" },
    ]);
  });

  it("points one-character paths at the site root with or without a base path", () => {
    const withShortEntry = (site: SiteConfig): SiteConfig => ({
      ...site,
      menu: [{ label: "X", path: "x" }],
    });
    const atRoot = withShortEntry(loadConfig({}));
    const underBase = withShortEntry(loadConfig({ SITE_BASE_PATH: "/concepts" }));

    expect(publishedMenu(underBase)).toEqual([{ label: "X", path: "concepts" }]);
    expect(renderMenuItems(publishedMenu(atRoot), "")).toContain('href="/"');
    expect(renderMenuItems(publishedMenu(underBase), "")).toContain('href="/concepts/"');
  });
});

describe("resolvePort", () => {
  it("reads PORT from the environment", () => {
    expect(resolvePort({ PORT: "8080" })).toBe(8080);
  });

  it("falls back to 3000 when PORT is missing or not a port number", () => {
    expect(resolvePort({})).toBe(3000);
    expect(resolvePort({ PORT: "" })).toBe(3000);
    expect(resolvePort({ PORT: "abc" })).toBe(3000);
    expect(resolvePort({ PORT: "-1" })).toBe(3000);
  });
});
