export interface PageMeta {
  /** Identifier matched against menu labels; nested pages use `Label/sub`. */
  id: string;
  slug: string;
  title: string;
  description: string;
  published?: string;
}

export const pages: readonly PageMeta[] = [
  {
    id: "Home",
    slug: "",
    title: "Programming Concepts",
    description: "Short, example-driven notes on ideas that recur across programming languages.",
    published: "2024-03-02",
  },
  {
    id: "Immutability",
    slug: "immutability",
    title: "Immutability",
    description: "Values that never change after construction, and what that buys you.",
    published: "2024-03-09",
  },
  {
    id: "Closures",
    slug: "closures",
    title: "Closures",
    description: "Functions that carry the variables they were defined next to.",
    published: "2024-03-16",
  },
  {
    id: "Closures/capture",
    slug: "closures/capture",
    title: "Capture semantics",
    description: "By-value and by-reference capture, and the loop-variable trap.",
    published: "2024-03-23",
  },
  {
    id: "Recursion",
    slug: "recursion",
    title: "Recursion",
    description: "Defining a computation in terms of smaller instances of itself.",
    published: "2024-04-06",
  },
  {
    id: "Helpers",
    slug: "helpers",
    title: "Template helpers",
    description: "The small functions page templates call while rendering.",
  },
];

export function findPage(id: string): PageMeta | undefined {
  return pages.find((page) => page.id === id);
}

export function routePath(slug: string): string {
  return slug === "" ? "/" : `/${slug}/`;
}

export function pageVar(id: string, name: string): string | undefined {
  const page = findPage(id);
  if (!page) return undefined;
  switch (name) {
    case "id":
    case "slug":
    case "title":
    case "description":
    case "published":
      return page[name];
    default:
      return undefined;
  }
}
