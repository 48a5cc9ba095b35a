import { escapeToBuffer } from "hono/utils/html";

export interface MenuEntry {
  label: string;
  path: string;
}

const INDENT = "        ";

function escape(text: string): string {
  const buffer: [string] = [""];
  escapeToBuffer(text, buffer);
  return buffer[0];
}

/** `""` and single-character paths point at the site root. */
export function normalizeMenuPath(path: string): string {
  return path.length <= 1 ? "/" : `/${path}/`;
}

/** True when `currentPage` is `label` itself or any page nested under it. */
export function isActivePage(label: string, currentPage: string): boolean {
  return currentPage === label || currentPage.startsWith(`${label}/`);
}

export function renderMenuItems(
  entries: readonly MenuEntry[],
  currentPage: string
): string {
  return entries
    .map((entry, i) => {
      const active = isActivePage(entry.label, currentPage) ? " active" : "";
      const label = escape(entry.label);
      const href = escape(normalizeMenuPath(entry.path));
      const item =
        `<li class="menu-list-item${active}">` +
        `<a href="${href}" class="menu-list-link${active}"> ${label}</a></li>`;
      return (i > 0 ? INDENT : "") + item + (i < entries.length - 1 ? "\n" : "");
    })
    .join("");
}
