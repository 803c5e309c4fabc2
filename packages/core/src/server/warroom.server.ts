import { WebSocketServer, WebSocket } from 'ws';
import type {
  ClientMessage,
  Incident,
  ReasoningProvider,
  ServerMessage,
  WarRoomConfig,
} from '@warroom/shared';
import { createCommander } from '../agents/commander.factory.js';
import { toRecord } from '../events/agent.event.js';
import { recordInvestigation } from '../logs/investigation.recorder.js';
import type { RunLogger } from '../logs/run.logger.js';
import { parseIncident } from '../scenarios/incident.parser.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WarRoomServerOptions {
  config: WarRoomConfig;
  provider: ReasoningProvider;
  /** WebSocket port. Defaults to 7433. */
  port?: number;
  /** Persist every finished investigation through this logger. */
  logger?: RunLogger;
}

function parseClientMessage(raw: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (
    parsed === null ||
    typeof parsed !== 'object' ||
    !('type' in parsed) ||
    parsed.type !== 'RUN_INVESTIGATION' ||
    !('payload' in parsed) ||
    parsed.payload === null ||
    typeof parsed.payload !== 'object' ||
    !('incident' in parsed.payload)
  ) {
    return null;
  }
  const incident = parseIncident(parsed.payload.incident);
  return incident ? { type: 'RUN_INVESTIGATION', payload: { incident } } : null;
}

// ---------------------------------------------------------------------------
// WarRoomServer
// ---------------------------------------------------------------------------

/**
 * Streams a live war room to any WebSocket client.
 *
 * A client sends RUN_INVESTIGATION; the server runs a fresh commander, pushes
 * each event as AGENT_EVENT to every connected client, then announces the
 * result with INVESTIGATION_COMPLETE. One investigation runs at a time.
 *
 * Lifecycle:
 *   new WarRoomServer(options) → server.start() → server.close()
 */
export class WarRoomServer {
  private readonly wss: WebSocketServer;
  private readonly config: WarRoomConfig;
  private readonly provider: ReasoningProvider;
  private readonly logger?: RunLogger;
  private running = false;

  /** The port this server listens on. */
  readonly port: number;

  constructor(options: WarRoomServerOptions) {
    this.config = options.config;
    this.provider = options.provider;
    this.logger = options.logger;
    this.port = options.port ?? 7433;

    this.wss = new WebSocketServer({ port: this.port });
  }

  start(): void {
    this.wss.on('connection', (ws) => this.handleConnection(ws));
  }

  /** Gracefully close the WS server. */
  close(): Promise<void> {
    return new Promise((resolve) => {
      for (const client of this.wss.clients) {
        client.terminate();
      }
      this.wss.close(() => resolve());
    });
  }

  // ---------------------------------------------------------------------------
  // Connection handling
  // ---------------------------------------------------------------------------

  private handleConnection(ws: WebSocket): void {
    this.send(ws, { type: 'CONNECTED', payload: { model: this.provider.model } });

    ws.on('message', (raw) => {
      const msg = parseClientMessage(raw.toString());
      if (!msg) {
        this.send(ws, { type: 'ERROR', payload: { message: 'Invalid message' } });
        return;
      }

      this.runInvestigation(msg.payload.incident).catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.send(ws, { type: 'ERROR', payload: { message } });
      });
    });
  }

  private async runInvestigation(incident: Incident): Promise<void> {
    if (this.running) {
      throw new Error('An investigation is already running');
    }
    this.running = true;

    try {
      const commander = createCommander(this.config, this.provider);
      commander.addEventListener((event) => {
        this.broadcast({ type: 'AGENT_EVENT', payload: toRecord(event) });
      });

      const run = await recordInvestigation(
        commander,
        { incident },
        { logger: this.logger, retention: this.config.logs.retention },
      );

      this.broadcast({
        type: 'INVESTIGATION_COMPLETE',
        payload: { incidentId: incident.id ?? run.id, result: run.result },
      });
    } finally {
      this.running = false;
    }
  }

  // ---------------------------------------------------------------------------
  // Broadcast helpers
  // ---------------------------------------------------------------------------

  /** Send a message to all connected clients. */
  private broadcast(msg: ServerMessage): void {
    const json = JSON.stringify(msg);
    this.wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(json);
      }
    });
  }

  /** Send a message to a single client. */
  private send(ws: WebSocket, msg: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(msg));
    }
  }
}
