import client, { Registry, Counter, Histogram } from 'prom-client';

// Dedicated registry to avoid default global pollution
const register = new Registry();
client.collectDefaultMetrics({ register, prefix: 'app_' });

// Buckets tuned for ms latencies of in-memory batch stages
const LATENCY_BUCKETS = [1, 5, 10, 20, 50, 100, 200, 500, 1000, 2000, 5000, 20000];

// Metrics definitions
const stageDurationMs = new Histogram({
  name: 'similarity_stage_duration_ms',
  help: 'Duration of similarity pipeline stages in milliseconds',
  labelNames: ['stage'], // shingle | signature | pairwise
  buckets: LATENCY_BUCKETS,
  registers: [register],
});

const documentsProcessedTotal = new Counter({
  name: 'similarity_documents_total',
  help: 'Total documents shingled and signed',
  registers: [register],
});

const pairsComparedTotal = new Counter({
  name: 'similarity_pairs_compared_total',
  help: 'Total signature pairs compared',
  registers: [register],
});

const corpusLoadFailuresTotal = new Counter({
  name: 'corpus_load_failures_total',
  help: 'Total corpus documents that could not be read',
  labelNames: ['policy'], // skip | abort
  registers: [register],
});

// HTTP API request latency and totals
const apiRequestLatencyMs = new Histogram({
  name: 'api_request_latency_ms',
  help: 'Latency of API requests in milliseconds',
  labelNames: ['endpoint', 'method', 'status'],
  buckets: LATENCY_BUCKETS,
  registers: [register],
});

const apiRequestsTotal = new Counter({
  name: 'api_requests_total',
  help: 'Total API requests by endpoint, method, and status',
  labelNames: ['endpoint', 'method', 'status'],
  registers: [register],
});

// Helpers
function observeStage(stage: 'shingle' | 'signature' | 'pairwise', durationMs: number) {
  stageDurationMs.labels(stage).observe(durationMs);
}

function recordDocuments(count: number) {
  documentsProcessedTotal.inc(count);
}

function recordPairs(count: number) {
  pairsComparedTotal.inc(count);
}

function recordLoadFailure(policy: 'skip' | 'abort') {
  corpusLoadFailuresTotal.labels(policy).inc();
}

function observeApiRequest(endpoint: string, method: string, status: number, durationMs: number) {
  const statusStr = String(status);
  apiRequestLatencyMs.labels(endpoint, method, statusStr).observe(durationMs);
  apiRequestsTotal.labels(endpoint, method, statusStr).inc();
}

async function getMetricsContent(): Promise<string> {
  return await register.metrics();
}

export const metrics = {
  register,
  stageDurationMs,
  documentsProcessedTotal,
  pairsComparedTotal,
  corpusLoadFailuresTotal,
  apiRequestLatencyMs,
  apiRequestsTotal,
  observeStage,
  recordDocuments,
  recordPairs,
  recordLoadFailure,
  observeApiRequest,
  getMetricsContent,
};
