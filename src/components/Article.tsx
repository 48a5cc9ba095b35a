import type { FC, PropsWithChildren } from "hono/jsx";
import { findPage } from "../content/pages";
import { Layout, type PageProps } from "./Layout";

interface ArticleProps extends PageProps, PropsWithChildren {
  /** Registry id of the page being rendered. */
  id: string;
}

export const Article: FC<ArticleProps> = ({ site, id, children }) => {
  const meta = findPage(id);
  if (!meta) {
    throw new Error(`no page registered with id "${id}"`);
  }
  return (
    <Layout
      site={site}
      title={meta.title}
      currentPage={meta.id}
      description={meta.description}
    >
      <h1>{meta.title}</h1>
      {meta.published && <p class="published">Published {meta.published}</p>}
      <p class="lead">{meta.description}</p>
      {children}
    </Layout>
  );
};
