import type { FC } from "hono/jsx";
import { Article } from "../components/Article";
import type { PageProps } from "../components/Layout";

export const RecursionPage: FC<PageProps> = ({ site }) => (
  <Article site={site} id="Recursion">
    <p>
      A recursive definition has a base case that answers directly and a
      recursive case that reduces the problem to a smaller one of the same
      shape.
    </p>
    <pre>
      <code>{`function sum(values: readonly number[]): number {
  if (values.length === 0) return 0;          // base case
  const [head, ...rest] = values;
  return head + sum(rest);                    // smaller problem
}`}</code>
    </pre>

    <h2>Tail calls</h2>
    <p>
      When the recursive call is the last thing a function does, a compiler
      can reuse the current stack frame. Some languages guarantee this; most
      JavaScript engines do not, so deep recursion there is usually rewritten
      with an accumulator and a loop:
    </p>
    <pre>
      <code>{`function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}`}</code>
    </pre>

    <h2>Structural recursion</h2>
    <p>
      Recursion is most natural when the data is itself recursive: trees,
      nested lists, expressions. The function then mirrors the type, one case
      per variant.
    </p>
  </Article>
);
