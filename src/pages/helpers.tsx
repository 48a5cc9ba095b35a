import type { FC } from "hono/jsx";
import { Article } from "../components/Article";
import type { PageProps } from "../components/Layout";
import { indexVar, sqrtRounded, upper, type ParseResult } from "../lib/helpers";

const show = (result: ParseResult<number>): string =>
  result.ok ? String(result.value) : `error: ${result.error}`;

export const HelpersPage: FC<PageProps> = ({ site }) => (
  <Article site={site} id="Helpers">
    <p>
      Page templates can call a few small helpers while rendering. The values
      below are computed when this page is built.
    </p>
    <table>
      <thead>
        <tr>
          <th>Call</th>
          <th>Result</th>
        </tr>
      </thead>
      <tbody>
        <tr>
          <td>
            <code>sqrtRounded("2")</code>
          </td>
          <td>{show(sqrtRounded("2"))}</td>
        </tr>
        <tr>
          <td>
            <code>sqrtRounded("-4")</code>
          </td>
          <td>{show(sqrtRounded("-4"))}</td>
        </tr>
        <tr>
          <td>
            <code>upper("closures")</code>
          </td>
          <td>{upper("closures")}</td>
        </tr>
        <tr>
          <td>
            <code>indexVar("published")</code>
          </td>
          <td>{indexVar("published") ?? "(unset)"}</td>
        </tr>
      </tbody>
    </table>
  </Article>
);
