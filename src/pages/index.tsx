import type { FC } from "hono/jsx";
import { Layout, type PageProps } from "../components/Layout";
import { withBasePath } from "../config";
import { findPage, pages, routePath } from "../content/pages";

export const IndexPage: FC<PageProps> = ({ site }) => {
  const home = findPage("Home");
  const topics = pages.filter((page) => page.slug !== "" && page.published);
  return (
    <Layout
      site={site}
      title={home?.title ?? site.title}
      currentPage="Home"
      description={home?.description}
    >
      <h1>{site.title}</h1>
      <p class="lead">{home?.description}</p>
      <p>
        Every language picks a stance on a few recurring questions: can a value
        change once it exists, what does a function remember about where it was
        written, how does a computation refer to itself. These notes take one
        question at a time, show it in a couple of languages, and point out
        where the usual surprises come from.
      </p>

      <h2>Topics</h2>
      <table>
        <thead>
          <tr>
            <th>Page</th>
            <th>About</th>
            <th>Published</th>
          </tr>
        </thead>
        <tbody>
          {topics.map((page) => (
            <tr>
              <td>
                <a href={withBasePath(site, routePath(page.slug))}>{page.title}</a>
              </td>
              <td>{page.description}</td>
              <td>{page.published}</td>
            </tr>
          ))}
        </tbody>
      </table>

      <div class="callout">
        Examples are kept short on purpose: each one should fit on a screen and
        run as-is in the language it is written in.
      </div>
    </Layout>
  );
};
