import type { Express } from 'express';
import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const metrics = {
  latencyLlm: new Histogram({
    name: 'paper_digest_latency_llm_ms',
    help: 'Completion API call latency',
    labelNames: ['task'],
    buckets: [250, 500, 1000, 2500, 5000, 10000, 20000, 40000],
    registers: [registry]
  }),
  dispatchAttempts: new Counter({
    name: 'paper_digest_dispatch_attempts_total',
    help: 'Completion dispatch attempts by outcome',
    labelNames: ['task', 'outcome'],
    registers: [registry]
  }),
  rateLimitWaits: new Counter({
    name: 'paper_digest_rate_limit_waits_total',
    help: 'Admissions delayed by the sliding window or a server cooldown',
    labelNames: ['reason'],
    registers: [registry]
  }),
  extractionFailures: new Counter({
    name: 'paper_digest_extraction_failures_total',
    help: 'Chunks skipped because their completion could not be parsed',
    labelNames: ['task'],
    registers: [registry]
  }),
  flashcardsGenerated: new Counter({
    name: 'paper_digest_flashcards_generated_total',
    help: 'Flashcards returned to callers',
    registers: [registry]
  })
};

export function initMetricsRoute(app: Express) {
  app.get('/metrics', async (_req, res) => {
    res.setHeader('Content-Type', registry.contentType);
    res.send(await registry.metrics());
  });
}
