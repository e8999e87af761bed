import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { WebSocketServer, type RawData } from 'ws';
import { createAgentService } from './agent';
import { CallSession } from './calls/callSession';
import { SessionManager, type SessionFactory } from './calls/sessionManager';
import { sessionSettingsFromEnv } from './calls/settings';
import { env } from './env';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createOutcomeSink } from './outcomes/outcomeSink';
import type { OutcomeSink } from './outcomes/types';
import { createHealthRouter } from './routes/health';
import { MEDIA_STREAM_PATH, createTwilioWebhookRouter, type TwilioWebhookDeps } from './routes/twilioWebhook';
import { getSttProvider } from './stt/registry';
import { InMemoryCalendar } from './tools/calendar';
import { TwilioMediaTransport } from './transport/twilioMediaTransport';
import { createTtsProvider } from './tts';
import { createTwilioClient } from './twilio/twilioClient';

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  log.error({ err, requestId: res.locals.requestId }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export function isAuthorizedMediaRequest(request: http.IncomingMessage, token: string = env.MEDIA_STREAM_TOKEN): boolean {
  if (!request.url) {
    return false;
  }
  const host = request.headers.host ?? 'localhost';
  const url = new URL(request.url, `http://${host}`);
  return url.pathname === MEDIA_STREAM_PATH && url.searchParams.get('token') === token;
}

/** The production session factory: providers and clients configured from the environment. */
export function createSessionFactory(outcomeSink: OutcomeSink): SessionFactory {
  const sttProvider = getSttProvider();
  const ttsProvider = createTtsProvider();
  const agent = createAgentService();
  const calendar = new InMemoryCalendar();
  const settings = sessionSettingsFromEnv();

  return (transport, startInfo) =>
    new CallSession({
      transport,
      startInfo,
      sttProvider,
      ttsProvider,
      agent,
      outcomeSink,
      calendar,
      callControl: createTwilioClient({ call_sid: startInfo.callSid, stream_sid: startInfo.streamSid }),
      settings,
    });
}

function attachMediaWebSocketServer(server: http.Server, sessionManager: SessionManager): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.on('upgrade', (request, socket, head) => {
    if (!isAuthorizedMediaRequest(request)) {
      log.warn({ event: 'media_upgrade_rejected', url: request.url?.split('?')[0] }, 'media upgrade rejected');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
    });
  });

  wss.on('connection', (ws) => {
    const transport = new TwilioMediaTransport({
      socket: ws,
      inboundQueueFrames: env.INBOUND_QUEUE_FRAMES,
      outboundQueueFrames: env.OUTBOUND_QUEUE_FRAMES,
      inputSampleRateHz: env.STT_SAMPLE_RATE,
    });

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        return;
      }
      transport.handleMessage(rawDataToString(data));
    });

    ws.on('close', (code) => {
      transport.handleSocketClosed(code);
    });

    ws.on('error', (error) => {
      log.error({ event: 'media_websocket_error', err: error, transport_id: transport.id }, 'media websocket error');
    });

    sessionManager.attachTransport(transport).catch((error: unknown) => {
      log.error({ event: 'media_attach_failed', err: error, transport_id: transport.id }, 'media attach failed');
      ws.close(1011, 'session_start_failed');
    });
  });

  return wss;
}

export interface BuildServerOptions {
  sessionManager?: SessionManager;
  webhook?: Omit<TwilioWebhookDeps, 'sessionManager'>;
}

export function buildServer(options: BuildServerOptions = {}): {
  app: express.Express;
  server: http.Server;
  sessionManager: SessionManager;
  wss: WebSocketServer;
} {
  const app = express();
  const sessionManager =
    options.sessionManager ??
    (() => {
      const outcomeSink = createOutcomeSink();
      return new SessionManager({
        createSession: createSessionFactory(outcomeSink),
        outcomeSink,
        idleTtlMinutes: env.SESSION_IDLE_TTL_MINUTES,
      });
    })();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.use('/health', createHealthRouter(() => sessionManager.activeCount()));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });
  app.use('/v1/twilio', createTwilioWebhookRouter({ ...options.webhook, sessionManager }));

  app.use(errorHandler);

  const server = http.createServer(app);
  const wss = attachMediaWebSocketServer(server, sessionManager);

  return { app, server, sessionManager, wss };
}
