import type { Product } from "../domain/product";
import { escapeHtml, formatDate } from "../utils/html";
import { renderPage } from "./layout";

export function renderAdminListPage(products: Product[], username: string): string {
  const rows = products
    .map(
      (product) => `      <tr>
        <td>${product.id}</td>
        <td><a href="/product/${product.id}">${escapeHtml(product.name)}</a></td>
        <td>${escapeHtml(product.category)}</td>
        <td>${escapeHtml(product.rarity)}</td>
        <td>${escapeHtml(product.price)}</td>
        <td>${formatDate(product.created_at)}</td>
      </tr>`,
    )
    .join("\n");

  const body = `<h1>Products</h1>
<p>Signed in as ${escapeHtml(username)} &middot; <a href="/admin/new">Create a product</a></p>
<table>
  <thead><tr><th>ID</th><th>Name</th><th>Category</th><th>Rarity</th><th>Price</th><th>Created</th></tr></thead>
  <tbody>
${rows || `      <tr><td colspan="6">No products yet.</td></tr>`}
  </tbody>
</table>`;
  return renderPage("Admin", body, { admin: true });
}

export function renderNewProductPage(): string {
  const body = `<h1>New product</h1>
<form hx-post="/admin/create" hx-target="#result" hx-indicator="#working">
  <label for="description">One-line idea</label>
  <input id="description" name="description" type="text" size="80" required>
  <button type="submit">Conjure</button>
  <span id="working" class="htmx-indicator">Conjuring... this can take up to half a minute.</span>
</form>
<div id="result"></div>`;
  return renderPage("New product", body, { admin: true });
}

export function renderCreatedFragment(product: Product): string {
  return `<div class="success">
  &#10003; Product created! "${escapeHtml(product.name)}"
  <a href="/admin">View all</a>
  <a href="/admin/new">Create another</a>
</div>`;
}

export function renderFailureFragment(message: string): string {
  return `<div class="error">
  &#10007; Failed: ${escapeHtml(message)}
  <button hx-get="/admin/new" hx-target="body">Retry</button>
</div>`;
}
