import express, { type Request, type Response, type NextFunction } from "express";
import { randomUUID } from "crypto";
import { registerRoutes } from "./routes";
import { config } from "./config";
import { logger, withSource } from "./logger";

const app = express();
app.use(express.json({ limit: "10mb" }));

// Attach a per-request ID early for structured logging and tracing
app.use((_req, res, next) => {
  const id = randomUUID();
  res.locals.requestId = id;
  res.setHeader("X-Request-Id", id);
  next();
});

app.use((req, res, next) => {
  const start = Date.now();
  res.on("finish", () => {
    if (req.path.startsWith("/api")) {
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - start,
          requestId: res.locals.requestId,
        },
        "request completed"
      );
    }
  });
  next();
});

const bootLog = withSource("boot");
bootLog.info({ env: config.nodeEnv, port: config.port }, "starting server");
// Startup configuration summary
bootLog.info(
  {
    pipeline: {
      shingleSize: config.pipeline.shingleSize,
      numHashes: config.pipeline.numHashes,
      similarityThreshold: config.pipeline.similarityThreshold,
      seeded: config.pipeline.hashSeed !== undefined,
      pairwisePartitions: config.pipeline.pairwisePartitions,
    },
    maxRequestDocuments: config.api.maxRequestDocuments,
  },
  "configuration summary"
);

const server = registerRoutes(app);

app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const fields: object = typeof err === "object" && err !== null ? err : {};
  const status =
    "status" in fields && typeof fields.status === "number"
      ? fields.status
      : "statusCode" in fields && typeof fields.statusCode === "number"
        ? fields.statusCode
        : 500;
  const message = err instanceof Error ? err.message : "Internal Server Error";
  const requestId: unknown = res.locals.requestId;

  // Log with structured context; do not rethrow
  logger.error(
    {
      err,
      requestId,
      status,
      method: req.method,
      path: req.path,
    },
    "unhandled error"
  );

  res.status(status).json({ message, requestId });
});

function setupShutdown() {
  const stop = () => {
    bootLog.info("shutting down");
    server.close(err => {
      if (err) {
        bootLog.error({ err }, "error while closing server");
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);
}
setupShutdown();

server.listen(config.port, "0.0.0.0", () => {
  bootLog.info({ port: config.port }, "serving");
});
