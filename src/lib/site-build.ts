import type { Hono } from "hono";
import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import type { SiteConfig } from "../config";

export class BuildError extends Error {
  constructor(
    readonly route: string,
    readonly status: number
  ) {
    super(`${route} responded with ${status}`);
    this.name = "BuildError";
  }
}

function outputFile(outDir: string, route: string): string {
  return join(outDir, ...route.split("/").filter(Boolean), "index.html");
}

async function render(app: Hono, urlPath: string): Promise<Response> {
  return app.request(`http://localhost${urlPath}`);
}

/**
 * Renders every route in process and writes it as `<route>/index.html`
 * under `outDir`, plus a `404.html` from the not-found handler.
 */
export async function buildSite(
  app: Hono,
  site: SiteConfig,
  routes: readonly string[],
  outDir: string
): Promise<string[]> {
  const written: string[] = [];

  for (const route of routes) {
    const urlPath = `${site.basePath}${route}`;
    const res = await render(app, urlPath);
    if (!res.ok) {
      throw new BuildError(urlPath, res.status);
    }

    const filePath = outputFile(outDir, route);
    await mkdir(join(filePath, ".."), { recursive: true });
    await writeFile(filePath, await res.text(), "utf-8");
    written.push(filePath);

    console.log(`  ${urlPath} -> ${filePath}`);
  }

  const missing = await render(app, `${site.basePath}/__not_found__/`);
  const notFoundFile = join(outDir, "404.html");
  await mkdir(outDir, { recursive: true });
  await writeFile(notFoundFile, await missing.text(), "utf-8");
  written.push(notFoundFile);

  console.log(`\nBuilt ${routes.length} pages to ${outDir}`);
  return written;
}
