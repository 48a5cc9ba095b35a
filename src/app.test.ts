import { describe, expect, it } from "vitest";
import { createApp, routes } from "./app";
import { loadConfig } from "./config";

describe("createApp at the site root", () => {
  const app = createApp(loadConfig({}));

  it("serves every registered route", async () => {
    for (const route of routes) {
      const res = await app.request(route);
      expect(res.status).toBe(200);
    }
  });

  it("highlights the current page in the menu", async () => {
    const html = await (await app.request("/immutability/")).text();
    expect(html).toContain(
      '<li class="menu-list-item"><a href="/" class="menu-list-link"> Home</a></li>\n' +
        '        <li class="menu-list-item active"><a href="/immutability/" class="menu-list-link active"> Immutability</a></li>'
    );
    expect(html).toContain("Immutability | Programming Concepts");
  });

  it("highlights the parent entry on nested pages", async () => {
    const html = await (await app.request("/closures/capture/")).text();
    expect(html).toContain(
      '<li class="menu-list-item active"><a href="/closures/" class="menu-list-link active"> Closures</a></li>'
    );
  });

  it("renders helper results into the helpers page", async () => {
    const html = await (await app.request("/helpers/")).text();
    expect(html).toContain("<td>1.41</td>");
    expect(html).toContain("<td>error: cannot take the square root of -4</td>");
    expect(html).toContain("<td>CLOSURES</td>");
    expect(html).toContain("<td>2024-03-02</td>");
  });

  it("redirects paths without a trailing slash", async () => {
    const res = await app.request("/recursion");
    expect(res.status).toBe(301);
    expect(res.headers.get("location")).toBe("http://localhost/recursion/");
  });

  it("puts the author and current year in the footer", async () => {
    const html = await (await app.request("/")).text();
    expect(html).toContain(
      `<footer class="site-footer">© ${new Date().getFullYear()} The Concepts authors. Built with Hono.</footer>`
    );
  });

  it("renders a 404 page for unknown paths", async () => {
    const res = await app.request("/nowhere/");
    expect(res.status).toBe(404);
    const html = await res.text();
    expect(html).toContain("<h1>Page not found</h1>");
    expect(html).not.toContain("menu-list-item active");
  });
});

describe("createApp under a base path", () => {
  const app = createApp(loadConfig({ SITE_BASE_PATH: "/concepts" }));

  it("serves pages below the base path with prefixed menu links", async () => {
    const res = await app.request("/concepts/closures/capture/");
    expect(res.status).toBe(200);
    const html = await res.text();
    expect(html).toContain(
      '<li class="menu-list-item active"><a href="/concepts/closures/" class="menu-list-link active"> Closures</a></li>'
    );
    expect(html).toContain(
      '<li class="menu-list-item"><a href="/concepts/" class="menu-list-link"> Home</a></li>'
    );
  });

  it("prefixes links in page content", async () => {
    const html = await (await app.request("/concepts/")).text();
    expect(html).toContain('<a href="/concepts/immutability/">Immutability</a>');
  });

  it("redirects the bare base path", async () => {
    const res = await app.request("/concepts");
    expect(res.status).toBe(301);
    expect(res.headers.get("location")).toBe("http://localhost/concepts/");
  });

  it("does not serve pages outside the base path", async () => {
    expect((await app.request("/closures/")).status).toBe(404);
  });
});
