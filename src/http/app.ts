/**
 * Express application assembly.
 * @module http/app
 */

import express, { type Express, type RequestHandler } from "express";
import { TodoError } from "../errors.js";
import type { TodoService } from "../service.js";
import type { CorsConfig } from "../types.js";
import { errorHandler } from "./error-mapper.js";
import { requestContext } from "./request-context.js";
import { createTodoRouter } from "./routes.js";

/** Headers a browser client may read */
const EXPOSED_HEADERS = [
  "Location",
  "X-Request-ID",
  "X-Correlation-ID",
  "X-Error-Type",
  "X-Total-Count",
  "X-Deleted-Count",
];

const ALLOWED_METHODS = "GET, POST, PUT, DELETE, OPTIONS";

/**
 * Options for createApp().
 */
export interface AppOptions {
  /** Route prefix (default: "") */
  basePath?: string;
  /** CORS policy (default: no origins allowed) */
  cors?: CorsConfig;
}

/**
 * CORS for a fixed origin list. "*" in the list allows any origin; the
 * origin is still echoed so credentials keep working.
 */
export function corsMiddleware(config: CorsConfig): RequestHandler {
  const allowAny = config.origins.includes("*");
  const allowed = new Set(config.origins);

  return (req, res, next) => {
    const origin = req.get("Origin");
    if (!origin || !(allowAny || allowed.has(origin))) {
      next();
      return;
    }

    res.set("Access-Control-Allow-Origin", origin);
    res.vary("Origin");
    if (config.credentials) {
      res.set("Access-Control-Allow-Credentials", "true");
    }
    res.set("Access-Control-Expose-Headers", EXPOSED_HEADERS.join(", "));

    if (req.method === "OPTIONS") {
      res.set("Access-Control-Allow-Methods", ALLOWED_METHODS);
      res.set(
        "Access-Control-Allow-Headers",
        req.get("Access-Control-Request-Headers") ?? "Content-Type",
      );
      res.set("Access-Control-Max-Age", String(config.maxAge));
      res.sendStatus(204);
      return;
    }

    next();
  };
}

/**
 * Build the express app serving the todo API.
 *
 * @example
 * ```typescript
 * const app = createApp(new TodoService(), { basePath: "/api" });
 * app.listen(8080);
 * ```
 */
export function createApp(
  service: TodoService,
  options: AppOptions = {},
): Express {
  const basePath = options.basePath ?? "";
  const app = express();

  app.disable("x-powered-by");
  app.use(requestContext());

  // Add security headers
  app.use((_req, res, next) => {
    res.set("X-Content-Type-Options", "nosniff");
    res.set("X-Frame-Options", "DENY");
    next();
  });

  if (options.cors) {
    app.use(corsMiddleware(options.cors));
  }

  app.use(express.json({ limit: "100kb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", todos: service.countTotal() });
  });

  app.use(basePath || "/", createTodoRouter(service, basePath));

  app.use((req, _res, next) => {
    next(
      new TodoError(`Route not found: ${req.method} ${req.path}`, "NOT_FOUND", {
        statusCode: 404,
      }),
    );
  });

  app.use(errorHandler);

  return app;
}
