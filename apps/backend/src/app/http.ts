/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express, type Request, type Response } from "express";
import type { AppContext } from "./context";

import { registerStorefrontRoutes } from "../routes/storefront";
import { registerAdminRoutes } from "../routes/admin";

export const SERVICE_NAME = "magical-emporium";

export function createApp(ctx: AppContext): Express {
  const app = express();

  // Trust the first proxy hop so req.ip reflects the real client IP.
  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  // Generated product images: /images/{id}_{timestamp}.jpg
  app.use("/images", express.static(ctx.config.imageDir, { fallthrough: false, index: false }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "healthy", service: SERVICE_NAME });
  });

  registerStorefrontRoutes(app, ctx);
  registerAdminRoutes(app, ctx);

  return app;
}
