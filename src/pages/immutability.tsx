import type { FC } from "hono/jsx";
import { Article } from "../components/Article";
import type { PageProps } from "../components/Layout";

export const ImmutabilityPage: FC<PageProps> = ({ site }) => (
  <Article site={site} id="Immutability">
    <p>
      An immutable value cannot be changed after it has been constructed. To
      "update" it you build a new value that shares whatever it can with the
      old one, and the old one stays exactly as it was.
    </p>

    <h2>Bindings versus values</h2>
    <p>
      Two different things get called immutable. A <em>binding</em> that
      cannot be reassigned says nothing about the value behind it:
    </p>
    <pre>
      <code>{`const point = { x: 1, y: 2 };
point.x = 10;        // allowed: the object is mutable
point = { x: 0 };    // TypeError: the binding is constant`}</code>
    </pre>
    <p>
      An immutable <em>value</em> rejects the mutation itself. In TypeScript
      the compiler can enforce that with <code>readonly</code>, and the runtime
      with <code>Object.freeze</code>:
    </p>
    <pre>
      <code>{`interface Point {
  readonly x: number;
  readonly y: number;
}

const origin: Point = Object.freeze({ x: 0, y: 0 });
const moved: Point = { ...origin, x: 3 };  // new value, origin untouched`}</code>
    </pre>

    <h2>What it buys</h2>
    <ul>
      <li>Values can be shared freely between callers and threads.</li>
      <li>Equality of contents is stable, so values make safe map keys.</li>
      <li>Old versions stay around, which makes undo and diffing cheap.</li>
    </ul>

    <h2>What it costs</h2>
    <p>
      Every update allocates. Persistent data structures keep that cost
      logarithmic by sharing structure between versions, which is how
      languages built around immutability keep updates fast.
    </p>
  </Article>
);
