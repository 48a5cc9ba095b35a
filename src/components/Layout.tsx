import type { FC, PropsWithChildren } from "hono/jsx";
import { raw } from "hono/html";
import { publishedMenu, withBasePath, type SiteConfig } from "../config";
import { renderMenuItems } from "../lib/menu";
import { css } from "../styles/theme";

interface LayoutProps extends PropsWithChildren {
  site: SiteConfig;
  title: string;
  /** Page identifier the menu highlights, e.g. `Closures/capture`. */
  currentPage: string;
  description?: string;
}

export const Layout: FC<LayoutProps> = ({
  site,
  title,
  currentPage,
  description,
  children,
}) => {
  return (
    <>
      {raw("<!DOCTYPE html>")}
      <html lang="en">
        <head>
          <meta charset="utf-8" />
          <meta name="viewport" content="width=device-width, initial-scale=1" />
          <meta name="description" content={description ?? site.description} />
          <title>{`${title} | ${site.title}`}</title>
          <style dangerouslySetInnerHTML={{ __html: css }} />
        </head>
        <body>
          <header class="site-header">
            <div class="site-header-inner">
              <a href={withBasePath(site, "/")} class="site-title">
                {site.title}
              </a>
              <nav>
                <ul class="menu-list">
                  {raw(renderMenuItems(publishedMenu(site), currentPage))}
                </ul>
              </nav>
            </div>
          </header>
          <main class="content">{children}</main>
          <footer class="site-footer">
            &copy; {new Date().getFullYear()} {site.author}. Built with Hono.
          </footer>
        </body>
      </html>
    </>
  );
};

export interface PageProps {
  site: SiteConfig;
}
