import type { Express, Response } from "express";
import { createServer, type Server } from "http";
import { readFileSync } from "fs";
import path from "path";
import { performance } from "perf_hooks";
import { config } from "./config";
import { withSource } from "./logger";
import { metrics } from "./metrics";
import { validateSimilarityRequest } from "./middleware/validateRequest";
import {
  createErrorResponse,
  isSimilarityError,
  logError,
  toError,
  type ErrorContext,
} from "./types/errors";
import { basicNormalize } from "./utils/corpus/normalizer";
import {
  SimilarityPipeline,
  createSeededEntropy,
  cryptoEntropy,
  renderReport,
  type CorpusDocument,
  type EntropySource,
} from "./utils/similarity";

const startedAt = Date.now();

function requestIdOf(res: Response): string | undefined {
  const id: unknown = res.locals?.requestId;
  return typeof id === "string" ? id : undefined;
}

/**
 * Centralized error handling function for API endpoints
 */
function handleApiError(
  error: Error,
  res: Response,
  operation: string,
  context?: ErrorContext
): number {
  const log = withSource("api-error");
  const requestId = requestIdOf(res);

  logError(log, error, { operation, requestId, ...context });

  const status = isSimilarityError(error) ? error.statusCode : 500;
  if (!res.headersSent) {
    res.status(status).json(createErrorResponse(error, requestId));
  }
  return status;
}

function resolveEntropy(seed: number | undefined): EntropySource {
  const effective = seed ?? config.pipeline.hashSeed;
  return effective === undefined ? cryptoEntropy : createSeededEntropy(effective);
}

function readVersion(): string | null {
  try {
    const raw = readFileSync(path.resolve(process.cwd(), "package.json"), "utf-8");
    const pkg: unknown = JSON.parse(raw);
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return null;
  } catch {
    return null;
  }
}

export function registerRoutes(app: Express): Server {
  // Dev-only Prometheus metrics endpoint
  app.get("/metrics", async (_req, res) => {
    if (!config.isDev) {
      res.status(404).json({ error: "Not found" });
      return;
    }
    try {
      const content = await metrics.getMetricsContent();
      res.setHeader("Content-Type", metrics.register.contentType);
      res.send(content);
    } catch (err) {
      withSource("metrics").error({ err }, "failed to render metrics");
      res.status(500).json({ error: "Metrics error" });
    }
  });

  // Health check endpoint
  app.get("/api/healthz", (_req, res) => {
    res.json({
      status: "ok",
      version: readVersion(),
      uptimeSec: Math.round((Date.now() - startedAt) / 1000),
    });
  });

  // Estimate pairwise similarity for the posted documents
  app.post("/api/similarity", validateSimilarityRequest, async (req, res) => {
    const start = performance.now();
    const log = withSource("similarity-api");
    const body = req.validated?.body;
    if (!body) {
      res.status(400).json({ error: "Invalid payload" });
      return;
    }

    // Abort the pairwise stage when the client disconnects mid-run
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controller.abort();
    };
    res.on("close", onClose);

    let status = 200;
    try {
      const pipeline = new SimilarityPipeline(
        {
          shingleSize: body.shingleSize ?? config.pipeline.shingleSize,
          numHashes: body.numHashes ?? config.pipeline.numHashes,
          similarityThreshold: body.similarityThreshold ?? config.pipeline.similarityThreshold,
        },
        { entropy: resolveEntropy(body.seed) }
      );

      const documents: CorpusDocument[] = body.documents.map((doc, index) => ({
        id: doc.id ?? index + 1,
        text: body.normalize ? basicNormalize(doc.text) : doc.text,
      }));

      const result = await pipeline.runAsync(documents, {
        signal: controller.signal,
        partitions: config.pipeline.pairwisePartitions,
      });

      log.debug(
        { requestId: requestIdOf(res), documentCount: documents.length },
        "similarity request completed"
      );

      res.json({
        shingleSize: pipeline.options.shingleSize,
        numHashes: pipeline.options.numHashes,
        similarityThreshold: pipeline.options.similarityThreshold,
        documents: result.documents.map(doc => ({
          id: doc.id,
          shingleCount: doc.shingles.size,
        })),
        results: result.results,
        report: renderReport(result.results, {
          threshold: pipeline.options.similarityThreshold,
          documentIds: result.signatures.documentIds,
        }),
        stats: result.stats,
      });
    } catch (err) {
      if (controller.signal.aborted) {
        // Client went away; nobody is left to answer
        log.info({ requestId: requestIdOf(res) }, "similarity request cancelled by client");
        status = 499;
      } else {
        status = handleApiError(toError(err), res, "similarity", {
          documentCount: body.documents.length,
        });
      }
    } finally {
      res.off("close", onClose);
      metrics.observeApiRequest("/api/similarity", "POST", status, performance.now() - start);
    }
  });

  return createServer(app);
}
