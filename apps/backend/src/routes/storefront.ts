/**
 * Storefront Router
 *
 * Public HTML pages: product grid and product detail.
 */

import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import { renderErrorPage, renderHomePage, renderNotFoundPage, renderProductPage } from "../views/storefront";

export function parseProductId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

export function registerStorefrontRoutes(app: Express, ctx: AppContext): void {
  const { productRepo, logger } = ctx;
  const log = logger.child({ module: "storefront-routes" });

  /**
   * GET /
   *
   * Grid of all products, newest first.
   */
  app.get("/", (_req: Request, res: Response) => {
    try {
      const products = productRepo.listAll();
      res.type("html").send(renderHomePage(products));
    } catch (error) {
      log.error({ err: error }, "Failed to render storefront");
      res.status(500).type("html").send(renderErrorPage("We could not open the shop right now. Please try again."));
    }
  });

  /**
   * GET /product/:id
   */
  app.get("/product/:id", (req: Request, res: Response) => {
    const rawId = req.params.id ?? "";
    const id = parseProductId(rawId);

    try {
      const product = id === null ? undefined : productRepo.getById(id);
      if (!product) {
        return res.status(404).type("html").send(renderNotFoundPage(rawId));
      }
      res.type("html").send(renderProductPage(product));
    } catch (error) {
      log.error({ err: error, id: rawId }, "Failed to render product");
      res.status(500).type("html").send(renderErrorPage("We could not load this item right now. Please try again."));
    }
  });
}
