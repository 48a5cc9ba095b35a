export const css = /* css */ `
:root {
  --bg: #fdfdfb;
  --bg-code: #f3f2ee;
  --border: #e3e1da;
  --text: #22221f;
  --text-muted: #66655f;
  --accent: #2f6f9f;
  --accent-surface: rgba(47, 111, 159, 0.08);
  --content-w: 760px;
  --font-sans: 'Inter', -apple-system, BlinkMacSystemFont, 'Segoe UI', system-ui, sans-serif;
  --font-mono: 'JetBrains Mono', 'Fira Code', 'SF Mono', Menlo, monospace;
}

*, *::before, *::after { margin: 0; padding: 0; box-sizing: border-box; }

html { font-size: 16px; -webkit-font-smoothing: antialiased; }

body {
  font-family: var(--font-sans);
  background: var(--bg);
  color: var(--text);
  line-height: 1.7;
}

a { color: var(--accent); text-decoration: none; }
a:hover { text-decoration: underline; }

/* Header */
.site-header {
  border-bottom: 1px solid var(--border);
  padding: 18px 24px;
}

.site-header-inner {
  max-width: var(--content-w);
  margin: 0 auto;
  display: flex;
  align-items: center;
  justify-content: space-between;
  gap: 24px;
  flex-wrap: wrap;
}

.site-title { font-weight: 700; font-size: 1.1rem; color: var(--text); }

/* Menu */
.menu-list { list-style: none; display: flex; gap: 4px; flex-wrap: wrap; }

.menu-list-item { border-radius: 6px; }
.menu-list-item.active { background: var(--accent-surface); }

.menu-list-link {
  display: block;
  padding: 4px 10px;
  color: var(--text-muted);
  font-size: 0.92rem;
}
.menu-list-link:hover { color: var(--text); text-decoration: none; }
.menu-list-link.active { color: var(--accent); font-weight: 600; }

/* Content */
.content {
  max-width: var(--content-w);
  margin: 0 auto;
  padding: 40px 24px 64px;
}

h1 { font-size: 2rem; line-height: 1.25; margin-bottom: 12px; letter-spacing: -0.02em; }
h2 { font-size: 1.35rem; margin: 36px 0 10px; }
h3 { font-size: 1.1rem; margin: 24px 0 8px; }
p { margin-bottom: 14px; }
ul, ol { margin: 0 0 14px 22px; }

.lead { font-size: 1.1rem; color: var(--text-muted); margin-bottom: 24px; }
.published { font-size: 0.85rem; color: var(--text-muted); margin-bottom: 20px; }

/* Code */
code {
  font-family: var(--font-mono);
  font-size: 0.88em;
  background: var(--bg-code);
  padding: 1px 5px;
  border-radius: 4px;
}

pre {
  background: var(--bg-code);
  border: 1px solid var(--border);
  border-radius: 8px;
  padding: 14px 16px;
  overflow-x: auto;
  margin-bottom: 18px;
  line-height: 1.55;
}
pre code { background: none; padding: 0; font-size: 0.85rem; }

/* Callout */
.callout {
  border-left: 3px solid var(--accent);
  background: var(--accent-surface);
  padding: 12px 16px;
  border-radius: 0 6px 6px 0;
  margin-bottom: 18px;
}

/* Tables */
table { width: 100%; border-collapse: collapse; margin-bottom: 18px; font-size: 0.92rem; }
th, td { text-align: left; padding: 6px 10px; border-bottom: 1px solid var(--border); }
th { font-weight: 600; }

/* Footer */
.site-footer {
  border-top: 1px solid var(--border);
  padding: 20px 24px;
  text-align: center;
  font-size: 0.85rem;
  color: var(--text-muted);
}

/* Responsive */
@media (max-width: 640px) {
  .content { padding: 28px 16px 48px; }
  h1 { font-size: 1.6rem; }
}
`;
