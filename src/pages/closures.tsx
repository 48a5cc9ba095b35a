import type { FC } from "hono/jsx";
import { Article } from "../components/Article";
import type { PageProps } from "../components/Layout";
import { withBasePath } from "../config";

export const ClosuresPage: FC<PageProps> = ({ site }) => (
  <Article site={site} id="Closures">
    <p>
      A closure is a function together with the variables it refers to from
      the scope it was defined in. The function keeps those variables alive
      after that scope has returned.
    </p>
    <pre>
      <code>{`function counter() {
  let count = 0;
  return () => ++count;
}

const next = counter();
next(); // 1
next(); // 2`}</code>
    </pre>
    <p>
      Each call to <code>counter</code> creates a fresh <code>count</code>, so
      two counters never share state. Whether a closure sees later changes to
      a captured variable depends on how the language captures it; see{" "}
      <a href={withBasePath(site, "/closures/capture/")}>capture semantics</a>.
    </p>

    <h2>Where they show up</h2>
    <ul>
      <li>Callbacks and event handlers that need context.</li>
      <li>Partial application and function factories.</li>
      <li>Module-private state without classes.</li>
    </ul>
  </Article>
);

export const ClosuresCapturePage: FC<PageProps> = ({ site }) => (
  <Article site={site} id="Closures/capture">
    <p>
      Languages either capture the variable itself (by reference) or copy its
      value when the closure is created (by value). JavaScript captures
      variables, which is why the loop below logs <code>3</code> three times
      with <code>var</code>:
    </p>
    <pre>
      <code>{`for (var i = 0; i < 3; i++) {
  setTimeout(() => console.log(i));
}
// 3, 3, 3

for (let i = 0; i < 3; i++) {
  setTimeout(() => console.log(i));
}
// 0, 1, 2: each iteration gets its own binding`}</code>
    </pre>
    <table>
      <thead>
        <tr>
          <th>Language</th>
          <th>Default capture</th>
        </tr>
      </thead>
      <tbody>
        <tr>
          <td>JavaScript</td>
          <td>by reference (the binding)</td>
        </tr>
        <tr>
          <td>C++ lambdas</td>
          <td>explicit: <code>[=]</code> by value, <code>[&amp;]</code> by reference</td>
        </tr>
        <tr>
          <td>Rust</td>
          <td>by borrow, or by value with <code>move</code></td>
        </tr>
      </tbody>
    </table>
  </Article>
);
