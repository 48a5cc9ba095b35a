import type { MenuEntry } from "./lib/menu";

export interface SiteConfig {
  readonly title: string;
  readonly author: string;
  readonly description: string;
  /** Prefix the site is published under: `""` or `/segment[/segment]`. */
  readonly basePath: string;
  readonly menu: readonly Readonly<MenuEntry>[];
}

const defaults: SiteConfig = {
  title: "Programming Concepts",
  author: "The Concepts authors",
  description: "Notes on ideas that recur across programming languages.",
  basePath: "",
  menu: [
    { label: "Home", path: "" },
    { label: "Immutability", path: "immutability" },
    { label: "Closures", path: "closures" },
    { label: "Recursion", path: "recursion" },
    { label: "Helpers", path: "helpers" },
  ],
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function normalizeBasePath(value: string): string {
  const segments = value.split("/").filter(Boolean);
  const base = segments.join("/");
  // Menu paths of one character collapse to the root.
  if (base.length === 1) {
    throw new ConfigError(`base path "${value}" must be longer than one character`);
  }
  return base === "" ? "" : `/${base}`;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): SiteConfig {
  const menu = Object.freeze(defaults.menu.map((entry) => Object.freeze({ ...entry })));
  return Object.freeze({
    ...defaults,
    title: env.SITE_TITLE || defaults.title,
    basePath: normalizeBasePath(env.SITE_BASE_PATH ?? defaults.basePath),
    menu,
  });
}

export const config = loadConfig();

export function withBasePath(site: SiteConfig, href: string): string {
  return href.startsWith("/") && !href.startsWith("//") ? `${site.basePath}${href}` : href;
}

/** Menu entries with the base path folded into each entry's path. */
export function publishedMenu(site: SiteConfig): MenuEntry[] {
  const base = site.basePath.slice(1);
  return site.menu.map(({ label, path }) => ({
    label,
    // Paths of one character or less stand for the site root.
    path: path.length <= 1 ? base : [base, path].filter(Boolean).join("/"),
  }));
}

const DEFAULT_PORT = 3000;

export function resolvePort(env: Record<string, string | undefined> = process.env): number {
  const port = Number(env.PORT);
  return env.PORT && Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT;
}
