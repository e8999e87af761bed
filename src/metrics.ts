import type { NextFunction, Request, RequestHandler, Response } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics.
 *
 * prom-client Histogram.startTimer() measures seconds; the *_ms histograms here are fed
 * true milliseconds from process.hrtime instead.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'callstream_voice_runtime_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [register],
});

// stt / agent / tool / tts_first_audio
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Pipeline stage duration in milliseconds',
  labelNames: ['stage'] as const,
  buckets: [5, 10, 25, 50, 100, 200, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by pipeline stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

const inboundAudioFramesTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_total`,
  help: 'Inbound audio frames received from the media stream',
  registers: [register],
});

const inboundAudioFramesDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_dropped_total`,
  help: 'Inbound audio frames dropped before STT',
  labelNames: ['reason'] as const,
  registers: [register],
});

const outboundAudioFramesDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}outbound_audio_frames_dropped_total`,
  help: 'Outbound audio frames dropped on queue overflow',
  registers: [register],
});

const bargeInsTotal = new client.Counter({
  name: `${METRICS_PREFIX}barge_ins_total`,
  help: 'Caller barge-ins that interrupted playback',
  registers: [register],
});

const activeCalls = new client.Gauge({
  name: `${METRICS_PREFIX}active_calls`,
  help: 'Call sessions currently running',
  registers: [register],
});

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls completed (teardown)',
  labelNames: ['outcome'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration in seconds',
  buckets: [5, 10, 30, 60, 120, 300, 600],
  registers: [register],
});

const callTurns = new client.Histogram({
  name: `${METRICS_PREFIX}call_turns`,
  help: 'Number of caller turns per call',
  buckets: [0, 1, 2, 3, 5, 10, 20],
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  const routePath =
    route && typeof route === 'object' && typeof (route as { path?: unknown }).path === 'string'
      ? (route as { path: string }).path
      : undefined;

  if (routePath) return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b(CA|MZ)[0-9a-f]{32}\b/gi, ':sid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

/**
 * Starts a stage timer and returns an end() function that records milliseconds and
 * returns them.
 */
export function startStageTimer(stage: string): () => number {
  const start = nowNs();
  return () => {
    const durationMs = nsToMs(nowNs() - start);
    stageDurationMs.observe({ stage }, durationMs);
    return durationMs;
  };
}

export function observeStageDuration(stage: string, durationMs: number): void {
  stageDurationMs.observe({ stage }, durationMs);
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

export function incInboundAudioFrames(count = 1): void {
  inboundAudioFramesTotal.inc(count);
}

export function incInboundAudioFramesDropped(reason: string, count = 1): void {
  const label = reason.trim() !== '' ? reason : 'unknown';
  inboundAudioFramesDroppedTotal.inc({ reason: label }, count);
}

export function incOutboundAudioFramesDropped(count = 1): void {
  outboundAudioFramesDroppedTotal.inc(count);
}

export function incBargeIns(): void {
  bargeInsTotal.inc();
}

export function setActiveCalls(count: number): void {
  activeCalls.set(count);
}

export function recordCallMetrics(opts: { outcome: string; durationMs: number; turns: number }): void {
  callCompletionsTotal.inc({ outcome: opts.outcome });
  callDurationSeconds.observe(opts.durationMs / 1000);
  callTurns.observe(opts.turns);
}
