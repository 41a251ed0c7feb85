import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';
import { log } from './log';

/**
 * Runtime Prometheus metrics.
 *
 * prom-client Histogram.startTimer() measures seconds; this module records
 * true milliseconds to match the *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_bridge_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

// Pipeline stage duration in milliseconds (stt/llm/tts/greeting)
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Stage duration in milliseconds (stt/llm/tts/greeting)',
  labelNames: ['stage'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

const inboundAudioFramesTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_total`,
  help: 'Inbound media frames received after the handshake',
  registers: [register],
});

const inboundAudioFramesDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}inbound_audio_frames_dropped_total`,
  help: 'Inbound media frames that never reached the turn segmenter',
  labelNames: ['reason'] as const,
  registers: [register],
});

const outboundAudioFramesTotal = new client.Counter({
  name: `${METRICS_PREFIX}outbound_audio_frames_total`,
  help: 'Outbound media frames sent to the provider',
  registers: [register],
});

const sessionsActive = new client.Gauge({
  name: `${METRICS_PREFIX}sessions_active`,
  help: 'Media sessions currently attached',
  registers: [register],
});

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls completed (teardown)',
  labelNames: ['direction', 'reason'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration in seconds',
  labelNames: ['direction'] as const,
  buckets: [5, 10, 30, 60, 120, 300, 600],
  registers: [register],
});

const callTurns = new client.Histogram({
  name: `${METRICS_PREFIX}call_turns`,
  help: 'Number of conversation turns per call',
  buckets: [0, 1, 2, 3, 5, 10, 20],
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;
  }

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\/v1\/voice\/stream\/[^/?]+/, '/v1/voice/stream/:streamId')
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b\d{6,}\b/g, ':n');
}

// ---------- exports used by server ----------

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    try {
      httpRequestDurationMs.observe(
        { method: req.method, route: getRouteLabel(req), code: String(res.statusCode) },
        nsToMs(nowNs() - start),
      );
    } catch (error) {
      log.debug({ err: error }, 'http metric not recorded');
    }
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

// ---------- stage timing API ----------

/** Starts a stage timer and returns an end() function recording milliseconds. */
export function startStageTimer(stage: string): () => void {
  const start = nowNs();
  return () => {
    try {
      stageDurationMs.observe({ stage }, nsToMs(nowNs() - start));
    } catch (error) {
      log.debug({ err: error, stage }, 'stage metric not recorded');
    }
  };
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

export function incInboundAudioFrames(count = 1): void {
  inboundAudioFramesTotal.inc(count);
}

export function incInboundAudioFramesDropped(reason: string, count = 1): void {
  const label = reason && reason.trim() !== '' ? reason : 'unknown';
  inboundAudioFramesDroppedTotal.inc({ reason: label }, count);
}

export function incOutboundAudioFrames(count = 1): void {
  outboundAudioFramesTotal.inc(count);
}

export function setSessionsActive(count: number): void {
  sessionsActive.set(count);
}

/** Per-call metrics at teardown. */
export function recordCallMetrics(opts: {
  direction: string;
  reason: string;
  durationMs: number;
  turns: number;
}): void {
  try {
    callCompletionsTotal.inc({ direction: opts.direction, reason: opts.reason });
    callDurationSeconds.observe({ direction: opts.direction }, opts.durationMs / 1000);
    callTurns.observe(opts.turns);
  } catch (error) {
    log.debug({ err: error }, 'call metrics not recorded');
  }
}
