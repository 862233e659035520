import { Router } from "express";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import swaggerUi from "swagger-ui-express";
import { isRecord } from "../utils/isRecord.js";

// swagger.json is not compiled; it is read from the source tree next to this module's sources
const swaggerPath = fileURLToPath(new URL("../../src/web/swagger.json", import.meta.url));

const swaggerOptions = {
  customCss: `
    .swagger-ui .topbar { display: none }
  `,
  customSiteTitle: "Tow Monitor API Documentation",
  swaggerOptions: {
    docExpansion: "none",
    defaultModelsExpandDepth: 1,
    tryItOutEnabled: true,
  },
};

export function createDocsRouter(): Router {
  const router = Router();
  const swaggerDocument: unknown = JSON.parse(readFileSync(swaggerPath, "utf8"));
  if (!isRecord(swaggerDocument)) {
    throw new Error(`${swaggerPath} does not contain an OpenAPI document`);
  }
  router.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument, swaggerOptions));
  return router;
}
