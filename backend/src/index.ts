import cors from "cors";
import express from "express";
import { config } from "./config";
import { createFeedFetchers } from "./feeds";
import { getFeedTelemetry } from "./feeds/feedClient";
import { buildRouteConditions } from "./services/routeConditions";
import { AppError, safeErrorMessage } from "./utils/errors";
import { logger } from "./utils/logger";
import { parseRouteConditionsQuery } from "./utils/requestParams";

const app = express();

app.use(cors());
app.use(express.json());

const fetchers = createFeedFetchers();

app.get("/api/route-conditions", async (req, res) => {
  try {
    const request = parseRouteConditionsQuery(req.query);
    const response = await buildRouteConditions(request, fetchers);
    return res.json(response);
  } catch (error) {
    if (error instanceof AppError) {
      logger.warn("Route conditions request rejected", { code: error.code, message: error.message });
      return res.status(error.status).json({ error: error.code, message: error.message });
    }
    logger.error("Failed to build route conditions", { message: safeErrorMessage(error) });
    return res.status(500).json({ error: "internal_error", message: "Unable to build route conditions" });
  }
});

app.get("/api/health", (_req, res) => {
  res.json({
    status: "ok",
    timestamp: new Date().toISOString(),
    googleConfigured: Boolean(config.googleApiKey),
    tomorrowConfigured: Boolean(config.tomorrowApiKey),
    feeds: getFeedTelemetry(),
  });
});

const server = app.listen(config.port, () => {
  logger.info(`Backend server listening on http://localhost:${config.port}`);
});

const shutdown = () => {
  logger.info("Shutting down server...");
  server.close(() => {
    process.exit(0);
  });
};

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
