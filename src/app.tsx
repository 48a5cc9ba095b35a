import { Hono } from "hono";
import type { FC } from "hono/jsx";
import { appendTrailingSlash } from "hono/trailing-slash";
import type { PageProps } from "./components/Layout";
import type { SiteConfig } from "./config";
import { pages, routePath } from "./content/pages";
import { ClosuresCapturePage, ClosuresPage } from "./pages/closures";
import { HelpersPage } from "./pages/helpers";
import { ImmutabilityPage } from "./pages/immutability";
import { IndexPage } from "./pages/index";
import { NotFoundPage } from "./pages/not-found";
import { RecursionPage } from "./pages/recursion";

const components: Record<string, FC<PageProps>> = {
  Home: IndexPage,
  Immutability: ImmutabilityPage,
  Closures: ClosuresPage,
  "Closures/capture": ClosuresCapturePage,
  Recursion: RecursionPage,
  Helpers: HelpersPage,
};

export const routes = pages.map((page) => routePath(page.slug));

export function createApp(site: SiteConfig): Hono {
  const app = new Hono();

  // `/closures` -> `/closures/`, and the bare base path to `${base}/`
  app.use(appendTrailingSlash());

  for (const page of pages) {
    const Component = components[page.id];
    if (!Component) {
      throw new Error(`no component for page "${page.id}"`);
    }
    app.get(`${site.basePath}${routePath(page.slug)}`, (c) =>
      c.html(<Component site={site} />)
    );
  }

  app.notFound((c) => c.html(<NotFoundPage site={site} />, 404));

  return app;
}
