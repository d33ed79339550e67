import { escapeHtml } from "../utils/html";

export const SHOP_NAME = "Magical Emporium";

const STYLES = `
  body { font-family: Georgia, serif; margin: 0; background: #faf7f2; color: #2b2118; }
  header { background: #3b1f4a; color: #f4e9ff; padding: 1rem 2rem; }
  header a { color: inherit; text-decoration: none; }
  main { max-width: 1100px; margin: 0 auto; padding: 2rem; }
  .grid { display: grid; grid-template-columns: repeat(auto-fill, minmax(240px, 1fr)); gap: 1.5rem; }
  .card { background: #fff; border-radius: 8px; box-shadow: 0 1px 4px rgba(0,0,0,.1); overflow: hidden; }
  .card img, .detail img { width: 100%; display: block; }
  .card .body { padding: 1rem; }
  .tag { display: inline-block; background: #efe6f7; border-radius: 4px; padding: 0 .4rem; margin: 0 .25rem .25rem 0; font-size: .85rem; }
  .rarity { font-weight: bold; }
  table { width: 100%; border-collapse: collapse; }
  th, td { text-align: left; padding: .5rem; border-bottom: 1px solid #ddd; }
  .success { color: #1d5c2e; }
  .error { color: #8a1c1c; }
`;

export function renderPage(title: string, body: string, options: { admin?: boolean } = {}): string {
  const htmx = options.admin
    ? `<script src="https://unpkg.com/htmx.org@1.9.12" defer></script>`
    : "";
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)} | ${SHOP_NAME}</title>
  <style>${STYLES}</style>
  ${htmx}
</head>
<body>
  <header><a href="/">${SHOP_NAME}</a>${options.admin ? ` &middot; <a href="/admin">Admin</a>` : ""}</header>
  <main>
${body}
  </main>
</body>
</html>`;
}
