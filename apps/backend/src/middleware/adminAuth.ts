/**
 * Admin Authentication Middleware
 *
 * HTTP Basic auth for /admin pages. Only the password is checked against
 * ADMIN_PASSWORD; any username is accepted and passed on as res.locals.adminUser.
 *
 * Usage:
 *   app.use("/admin", createAdminAuth(config.adminPassword, logger));
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { Logger } from "pino";
import { createHash, timingSafeEqual } from "node:crypto";

export interface BasicCredentials {
  username: string;
  password: string;
}

/**
 * Parse `Authorization: Basic base64(user:pass)`.
 * Returns null if header is missing or malformed.
 */
export function extractBasicCredentials(req: Request): BasicCredentials | null {
  const authHeader = req.headers.authorization;
  if (!authHeader) return null;

  const [scheme, encoded] = authHeader.split(" ");
  if (!scheme || scheme.toLowerCase() !== "basic" || !encoded) {
    return null;
  }

  const decoded = Buffer.from(encoded, "base64").toString("utf8");
  const separator = decoded.indexOf(":");
  if (separator < 0) {
    return null;
  }

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

function challenge(res: Response): void {
  res.setHeader("WWW-Authenticate", 'Basic realm="Admin"');
  res.status(401).type("text/plain").send("Invalid credentials");
}

export function createAdminAuth(adminPassword: string, logger: Logger): RequestHandler {
  const log = logger.child({ module: "admin-auth" });

  return (req: Request, res: Response, next: NextFunction): void => {
    const credentials = extractBasicCredentials(req);

    if (!credentials) {
      log.warn({ path: req.path, method: req.method, ip: req.ip }, "Admin auth rejected: missing or malformed Authorization header");
      challenge(res);
      return;
    }

    if (!passwordMatches(credentials.password, adminPassword)) {
      log.warn(
        { path: req.path, method: req.method, ip: req.ip, username: credentials.username },
        "Admin auth rejected: invalid password",
      );
      challenge(res);
      return;
    }

    res.locals.adminUser = credentials.username;
    next();
  };
}

/**
 * Constant-time password check. Both sides are hashed first so the comparison
 * always runs over equal-length buffers, whatever the supplied length.
 */
export function passwordMatches(supplied: string, expected: string): boolean {
  const suppliedDigest = createHash("sha256").update(supplied, "utf8").digest();
  const expectedDigest = createHash("sha256").update(expected, "utf8").digest();
  return timingSafeEqual(suppliedDigest, expectedDigest);
}
