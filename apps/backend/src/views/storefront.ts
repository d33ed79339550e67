import type { Product } from "../domain/product";
import { escapeHtml, formatDate, paragraphs } from "../utils/html";
import { renderPage } from "./layout";

const renderTags = (tags: string[]) =>
  tags.map((tag) => `<span class="tag">${escapeHtml(tag)}</span>`).join("");

function renderCard(product: Product): string {
  return `    <article class="card">
      <a href="/product/${product.id}"><img src="${escapeHtml(product.image_path)}" alt="${escapeHtml(product.name)}"></a>
      <div class="body">
        <h2><a href="/product/${product.id}">${escapeHtml(product.name)}</a></h2>
        <div><span class="rarity">${escapeHtml(product.rarity)}</span> &middot; ${escapeHtml(product.category)}</div>
        <div>${escapeHtml(product.price)}</div>
      </div>
    </article>`;
}

export function renderHomePage(products: Product[]): string {
  const body = products.length
    ? `<div class="grid">\n${products.map(renderCard).join("\n")}\n</div>`
    : `<p>The shelves are empty. New wonders arrive soon.</p>`;
  return renderPage("Shop", `<h1>Curiosities &amp; Artifacts</h1>\n${body}`);
}

export function renderProductPage(product: Product): string {
  const body = `<article class="detail">
  <h1>${escapeHtml(product.name)}</h1>
  <img src="${escapeHtml(product.image_path)}" alt="${escapeHtml(product.name)}">
  <p><span class="rarity">${escapeHtml(product.rarity)}</span> &middot; ${escapeHtml(product.category)} &middot; ${escapeHtml(product.price)}</p>
  <div>${renderTags(product.tags)}</div>
  ${paragraphs(product.description)}
  <p><small>Added ${formatDate(product.created_at)}</small></p>
</article>`;
  return renderPage(product.name, body);
}

export function renderNotFoundPage(requestedId: string): string {
  return renderPage(
    "Not found",
    `<h1>Lost in the mists</h1>\n<p>No item with id ${escapeHtml(requestedId)} exists in our shop.</p>\n<p><a href="/">Back to the shop</a></p>`,
  );
}

export function renderErrorPage(message: string): string {
  return renderPage("Error", `<h1>Something went wrong</h1>\n<p class="error">${escapeHtml(message)}</p>`);
}
