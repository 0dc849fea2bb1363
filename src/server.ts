import express, { Express } from "express";
import { logger } from "./utils/logger";
import { MediaRepository } from "./types";

/**
 * Builds the Express app used for health checks
 */
export function createServer(media: MediaRepository): Express {
  const app = express();

  // Basic route for health check
  app.get("/", (req, res) => {
    res.send("Media search bot is running!");
  });

  app.get("/health", async (req, res) => {
    try {
      const files = await media.count();
      res.json({ status: "ok", files });
    } catch (error) {
      logger.error({ err: error }, "Health check failed");
      res.status(503).json({ status: "error" });
    }
  });

  return app;
}

/**
 * Initialize and start the Express server
 */
export function initServer(media: MediaRepository, port: number): Express {
  const app = createServer(media);

  // Start the Express server
  app.listen(port, () => {
    logger.info(`Server listening at http://localhost:${port}`);
  });

  return app;
}
