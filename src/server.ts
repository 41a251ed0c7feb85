import { randomUUID } from 'crypto';
import express, { type NextFunction, type Request, type Response } from 'express';
import http from 'http';
import { WebSocketServer } from 'ws';
import { ChannelAlertNotifier, type AlertNotifier } from './alerts/channelAlerts';
import { createSessionBackends } from './calls/backends';
import { RedisCallRecordStore, type CallRecordStore } from './calls/callRecords';
import type { SessionBackends, SessionTiming } from './calls/callSession';
import { PreloadBroker } from './calls/preloadBroker';
import { SessionManager, POLICY_VIOLATION_CLOSE_CODE } from './calls/sessionManager';
import { StreamRegistry } from './calls/streamRegistry';
import { loadVoiceConfig, type VoiceConfig } from './config/voiceConfig';
import { env } from './env';
import { log } from './log';
import { WsMediaSocket } from './media/mediaSocket';
import { buildMediaStreamUrl, parseMediaStreamPath } from './media/streamUrl';
import { metricsHandler, metricsMiddleware } from './metrics';
import { getRedisClient } from './redis/client';
import { createCallsRouter } from './routes/calls';
import { createHealthRouter } from './routes/health';
import { createVoiceWebhookRouter } from './routes/voiceWebhook';
import { TelnyxClient } from './telnyx/telnyxClient';
import type { CallControl } from './telnyx/types';

/** A connecting socket may beat the commit of an outbound reservation by this much. */
const STREAM_RESOLVE_WAIT_MS = 3000;

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'invalid_json' });
    return;
  }
  log.error({ err }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

export interface ServerDeps {
  callControl: CallControl;
  records: CallRecordStore;
  alerts: AlertNotifier | null;
  loadConfig: () => Promise<Readonly<VoiceConfig>>;
  createBackends: (config: Readonly<VoiceConfig>) => SessionBackends;
  registry: StreamRegistry;
  preloads: PreloadBroker;
  publicBaseUrl: string;
  mediaToken: string;
  apiToken?: string;
  connectionId?: string;
  defaultFrom?: string;
  sessionTiming?: Partial<SessionTiming>;
}

export interface BuiltServer {
  app: express.Express;
  server: http.Server;
  sessionManager: SessionManager;
  registry: StreamRegistry;
  preloads: PreloadBroker;
  /** Stops accepting connections, drains sessions and stops sweepers. */
  close: () => Promise<void>;
}

function buildAlertNotifier(): AlertNotifier | null {
  if (!env.ALERT_BASE_URL || !env.ALERT_ADMIN_TOKEN) {
    return null;
  }
  return new ChannelAlertNotifier({
    baseUrl: env.ALERT_BASE_URL,
    adminToken: env.ALERT_ADMIN_TOKEN,
    channelName: env.ALERT_CHANNEL_NAME,
    cache: getRedisClient(),
    cachePrefix: env.ALERTCHAN_PREFIX,
  });
}

function resolveDeps(overrides: Partial<ServerDeps>): ServerDeps {
  return {
    callControl: overrides.callControl ?? new TelnyxClient(),
    records: overrides.records ?? new RedisCallRecordStore(),
    alerts: overrides.alerts === undefined ? buildAlertNotifier() : overrides.alerts,
    loadConfig: overrides.loadConfig ?? (() => loadVoiceConfig()),
    createBackends: overrides.createBackends ?? createSessionBackends,
    registry: overrides.registry ?? new StreamRegistry({ ttlMs: env.STREAM_REGISTRATION_TTL_SECONDS * 1000 }),
    preloads: overrides.preloads ?? new PreloadBroker({ ttlMs: env.PRELOAD_TTL_SECONDS * 1000 }),
    publicBaseUrl: overrides.publicBaseUrl ?? env.PUBLIC_BASE_URL,
    mediaToken: overrides.mediaToken ?? env.MEDIA_STREAM_TOKEN,
    apiToken: 'apiToken' in overrides ? overrides.apiToken : env.API_TOKEN,
    connectionId: overrides.connectionId ?? env.TELNYX_CONNECTION_ID,
    defaultFrom: overrides.defaultFrom ?? env.TELNYX_FROM_NUMBER,
    sessionTiming: overrides.sessionTiming ?? { handshakeTimeoutMs: env.HANDSHAKE_TIMEOUT_MS },
  };
}

function attachMediaWebSocketServer(
  server: http.Server,
  deps: ServerDeps,
  sessionManager: SessionManager,
): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    const parsed = parseMediaStreamPath(request.url, request.headers.host);
    if (!parsed || !parsed.token || parsed.token !== deps.mediaToken) {
      log.warn({ event: 'media_upgrade_rejected', path_ok: parsed !== null }, 'media upgrade rejected');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      const streamId = parsed.streamId;
      const mediaSocket = new WsMediaSocket(ws, { stream_id: streamId });

      deps.registry
        .resolve(streamId, { waitMs: STREAM_RESOLVE_WAIT_MS })
        .then(async (context) => {
          if (!context) {
            log.warn({ event: 'media_stream_unknown', stream_id: streamId }, 'unknown or replayed stream id');
            await mediaSocket.close(POLICY_VIOLATION_CLOSE_CODE, 'unknown_stream');
            return;
          }
          await sessionManager.attach(mediaSocket, streamId, context);
        })
        .catch((error: unknown) => {
          log.error({ event: 'media_connection_failed', err: error, stream_id: streamId }, 'media connection failed');
        });
    });
  });

  return wss;
}

export function buildServer(overrides: Partial<ServerDeps> = {}): BuiltServer {
  const deps = resolveDeps(overrides);
  const app = express();
  const buildStreamUrl = (streamId: string): string =>
    buildMediaStreamUrl(deps.publicBaseUrl, streamId, deps.mediaToken);

  const sessionManager = new SessionManager({
    preloads: deps.preloads,
    callControl: deps.callControl,
    records: deps.records,
    alerts: deps.alerts,
    loadConfig: deps.loadConfig,
    createBackends: deps.createBackends,
    timing: deps.sessionTiming,
  });

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(express.json());
  app.use(metricsMiddleware);

  app.use('/health', createHealthRouter(sessionManager));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use(
    '/v1/voice/webhook',
    createVoiceWebhookRouter({
      token: deps.mediaToken,
      registry: deps.registry,
      preloads: deps.preloads,
      callControl: deps.callControl,
      records: deps.records,
      loadConfig: deps.loadConfig,
      createBackends: deps.createBackends,
      buildStreamUrl,
    }),
  );
  app.use(
    '/v1/calls',
    createCallsRouter({
      apiToken: deps.apiToken,
      registry: deps.registry,
      preloads: deps.preloads,
      callControl: deps.callControl,
      records: deps.records,
      loadConfig: deps.loadConfig,
      createBackends: deps.createBackends,
      buildStreamUrl,
      connectionId: deps.connectionId,
      defaultFrom: deps.defaultFrom,
    }),
  );

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachMediaWebSocketServer(server, deps, sessionManager);

  const close = async (): Promise<void> => {
    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    await sessionManager.shutdown();
    wss.close();
    deps.registry.stop();
    deps.preloads.stop();
    await closed;
  };

  return { app, server, sessionManager, registry: deps.registry, preloads: deps.preloads, close };
}
