import express from "express";
import bodyParser from "body-parser";
import { createApiRouter } from "./api.js";
import type { AppContext } from "./context.js";
import { createDocsRouter } from "./web/docs.js";

export function createApp(ctx: AppContext, options: { docs?: boolean } = {}): express.Application {
  const app = express();
  app.use(bodyParser.json());
  app.use(createApiRouter(ctx));
  if (options.docs !== false) app.use(createDocsRouter());
  return app;
}
