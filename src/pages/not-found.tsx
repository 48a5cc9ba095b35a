import type { FC } from "hono/jsx";
import { Layout, type PageProps } from "../components/Layout";
import { withBasePath } from "../config";

export const NotFoundPage: FC<PageProps> = ({ site }) => (
  <Layout site={site} title="Page not found" currentPage="">
    <h1>Page not found</h1>
    <p>
      Nothing lives at this address. Try the{" "}
      <a href={withBasePath(site, "/")}>home page</a>.
    </p>
  </Layout>
);
