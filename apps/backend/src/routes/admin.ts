/**
 * Admin Router
 *
 * Product list, creation form, and the HTMX endpoint that runs the creation
 * pipeline. The pipeline runs synchronously inside the request (10-30s).
 */

import express, { type Express, type Request, type Response } from "express";
import type { AppContext } from "../app/context";
import { createAdminAuth } from "../middleware/adminAuth";
import { ProductCreationError, errorMessage } from "../domain/errors";
import {
  renderAdminListPage,
  renderCreatedFragment,
  renderFailureFragment,
  renderNewProductPage,
} from "../views/admin";
import { renderErrorPage } from "../views/storefront";

interface CreateProductBody {
  description?: unknown;
}

const adminUser = (res: Response): string =>
  typeof res.locals.adminUser === "string" ? res.locals.adminUser : "";

export function registerAdminRoutes(app: Express, ctx: AppContext): void {
  const { config, logger, productRepo, productCreator, openWriteStore } = ctx;
  const log = logger.child({ module: "admin-routes" });

  app.use("/admin", createAdminAuth(config.adminPassword, logger));

  app.get("/admin", (_req: Request, res: Response) => {
    const username = adminUser(res);
    try {
      log.info({ username }, "Admin viewing product list");
      res.type("html").send(renderAdminListPage(productRepo.listAll(), username));
    } catch (error) {
      log.error({ err: error }, "Failed to render admin product list");
      res.status(500).type("html").send(renderErrorPage(errorMessage(error)));
    }
  });

  app.get("/admin/new", (_req: Request, res: Response) => {
    res.type("html").send(renderNewProductPage());
  });

  /**
   * POST /admin/create
   *
   * Form field `description`: the one-line product idea.
   * Responds with an HTML fragment: 200 on success, 400 for a blank idea,
   * 500 when the pipeline fails.
   */
  app.post("/admin/create", express.urlencoded({ extended: false }), async (req: Request, res: Response) => {
    const body: CreateProductBody = req.body ?? {};
    const idea = typeof body.description === "string" ? body.description.trim() : "";
    const username = adminUser(res);

    if (!idea) {
      log.warn({ username }, "Empty description provided");
      res.status(400).type("html").send(renderFailureFragment("Description cannot be empty"));
      return;
    }

    log.info({ username, idea }, "Admin creating product");

    let release: (() => void) | undefined;
    try {
      const writer = openWriteStore();
      release = writer.release;

      const product = await productCreator.create(idea, writer.store);
      log.info({ productId: product.id }, "Product created successfully");
      res.status(200).type("html").send(renderCreatedFragment(product));
    } catch (error) {
      if (error instanceof ProductCreationError) {
        log.error({ kind: error.kind, message: error.message }, "Product creation failed");
        res.status(500).type("html").send(renderFailureFragment(error.message));
        return;
      }
      log.error({ err: error }, "Unexpected error during product creation");
      res.status(500).type("html").send(renderFailureFragment(`Unexpected error - ${errorMessage(error)}`));
    } finally {
      release?.();
    }
  });
}
