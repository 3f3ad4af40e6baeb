/**
 * Scan a directory of text files and print similar document pairs.
 *
 * Usage: tsx server/scan.ts [directory] [--exact]
 *   directory  defaults to CORPUS_DIR
 *   --exact    also compute exact Jaccard similarity and log the estimate error
 */

import { config } from "./config";
import { withSource } from "./logger";
import { logError, toError } from "./types/errors";
import { loadCorpus } from "./utils/corpus/loader";
import {
  SimilarityPipeline,
  createSeededEntropy,
  cryptoEntropy,
  exactSimilarities,
  meanAbsoluteError,
  renderReport,
} from "./utils/similarity";

const log = withSource("scan");

async function main() {
  const args = process.argv.slice(2);
  const exact = args.includes("--exact");
  const directory = args.find(arg => !arg.startsWith("--")) ?? config.corpus.directory;

  if (!directory) {
    log.error("No corpus directory given. Pass one as an argument or set CORPUS_DIR.");
    process.exit(1);
  }

  try {
    const pipeline = new SimilarityPipeline(
      {
        shingleSize: config.pipeline.shingleSize,
        numHashes: config.pipeline.numHashes,
        similarityThreshold: config.pipeline.similarityThreshold,
      },
      {
        entropy:
          config.pipeline.hashSeed === undefined
            ? cryptoEntropy
            : createSeededEntropy(config.pipeline.hashSeed),
      }
    );

    const corpus = await loadCorpus(directory, {
      extension: config.corpus.extension,
      onError: config.corpus.onError,
    });
    if (corpus.failures.length > 0) {
      log.warn({ failures: corpus.failures }, "some documents were skipped");
    }

    const result = pipeline.run(corpus.documents);
    const lines = renderReport(result.results, {
      threshold: pipeline.options.similarityThreshold,
      documentIds: result.signatures.documentIds,
    });
    for (const line of lines) {
      process.stdout.write(`${line}\n`);
    }

    if (exact) {
      const error = meanAbsoluteError(result.results, exactSimilarities(result.documents));
      log.info(
        { meanAbsoluteError: error, numHashes: pipeline.options.numHashes },
        "estimate error against exact Jaccard"
      );
    }

    log.info({ reported: lines.length, ...result.stats }, "scan completed");
    process.exit(0);
  } catch (err) {
    logError(log, toError(err), { operation: "scan", directory });
    process.exit(1);
  }
}

void main();
