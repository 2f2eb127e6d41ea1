/**
 * HTTP Application
 *
 * Builds the Hono app around a broker. Kept apart from index.ts so tests
 * can drive it with app.request() without opening a port.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { Broker } from "./broker/broker.js";
import { registerAdminMiddleware, registerAdminRoutes } from "./routes/admin.js";
import { errorResponse } from "./routes/errors.js";
import { registerGenerateRoutes } from "./routes/generate.js";

export interface AppOptions {
  adminToken: string | null;
}

export function createApp(broker: Broker, options: AppOptions): Hono {
  const app = new Hono();

  app.use("*", cors());
  registerAdminMiddleware(app, options.adminToken);

  registerGenerateRoutes(app, broker);
  registerAdminRoutes(app, broker);

  app.notFound((c) => c.json({ error: "not_found", message: `No route for ${c.req.method} ${c.req.path}` }, 404));
  app.onError((err) => errorResponse(err));

  return app;
}
