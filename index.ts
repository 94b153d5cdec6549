import express, { Application, Request, Response, NextFunction } from "express";
import path from "node:path";
import fs from "node:fs";
import swaggerUi from "swagger-ui-express";
import helmet from "helmet";
import { loadEnv } from "./src/config/env";
import { createServices } from "./src/pipeline/factory";
import { createRouter } from "./src/routes";

const env = loadEnv();
const services = createServices(env);

const app: Application = express();
const port = env.PORT;

app.use(helmet());
app.use(express.json({ limit: "1mb" }));

// dist/index.js sits one level below swagger.json; tsx runs index.ts beside it.
const swaggerCandidates = [path.resolve(__dirname, "..", "swagger.json"), path.resolve(__dirname, "swagger.json")];
const swaggerPath = swaggerCandidates.find((candidate) => fs.existsSync(candidate)) ?? swaggerCandidates[0];
let swaggerDocument: Record<string, unknown> | null = null;

if (fs.existsSync(swaggerPath)) {
  try {
    swaggerDocument = JSON.parse(fs.readFileSync(swaggerPath, "utf-8"));
  } catch (error) {
    console.error("Failed to parse swagger.json", error);
  }
} else {
  console.warn(`Swagger definition not found at ${swaggerPath}. /docs route disabled.`);
}

if (swaggerDocument) {
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
}

app.get("/health", (_req: Request, res: Response) => {
  res.json({ status: "ok", uptime: process.uptime() });
});

app.use(createRouter(services, { maxConcurrentRequests: env.MAX_CONCURRENT_REQUESTS }));

// Basic error handler for uncaught errors within the request pipeline.
app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  console.error("Unhandled error", err);
  res.status(500).json({ message: "Unexpected server error" });
});

const server = app.listen(port, () => {
  console.log(`Float query service listening on port ${port}`);
});

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

process.on("SIGTERM", () => {
  console.log("Received SIGTERM, shutting down.");
  server.close(() => {
    const closing = services.pool ? services.pool.end() : Promise.resolve();
    closing
      .catch((error: unknown) => console.error("Failed to close the database pool", error))
      .finally(() => process.exit(0));
  });
});
