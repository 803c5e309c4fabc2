import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import * as net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import { WebSocket } from 'ws';
import type { ServerMessage, WarRoomConfig } from '@warroom/shared';
import { WarRoomServer } from './warroom.server.js';
import { UnconfiguredProvider } from '../providers/unconfigured.provider.js';
import { RunLogger } from '../logs/run.logger.js';
import { DEFAULT_CONFIG } from '../config/config.defaults.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function getFreePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const srv = net.createServer();
    srv.listen(0, '127.0.0.1', () => {
      const addr = srv.address();
      if (!addr || typeof addr === 'string') {
        srv.close(() => reject(new Error('no port')));
        return;
      }
      const port = addr.port;
      srv.close(() => resolve(port));
    });
    srv.on('error', reject);
  });
}

function makeConfig(delegationDelayMs = 0): WarRoomConfig {
  return {
    ...DEFAULT_CONFIG,
    provider: { name: 'none' },
    commander: { delegation_delay_ms: delegationDelayMs, synthesis_delay_ms: 0 },
    logs: { retention: 10 },
  };
}

const INCIDENT = { id: 'INC-7', symptom: 'p99 latency spike', severity: 'high' };

/**
 * Connect a fresh WS client and collect messages until `predicate` is true
 * or `timeout` ms elapse.
 */
function collectUntil(
  port: number,
  predicate: (msgs: ServerMessage[]) => boolean,
  onOpen?: (ws: WebSocket) => void,
  timeout = 8000,
): Promise<{ msgs: ServerMessage[]; ws: WebSocket }> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    const msgs: ServerMessage[] = [];

    const done = () => resolve({ msgs, ws });

    const timer = setTimeout(done, timeout);

    ws.on('open', () => {
      onOpen?.(ws);
    });

    ws.on('message', (raw) => {
      try {
        const msg = JSON.parse(raw.toString()) as ServerMessage;
        msgs.push(msg);
        if (predicate(msgs)) {
          clearTimeout(timer);
          done();
        }
      } catch {
        /* ignore */
      }
    });

    ws.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });
  });
}

function isComplete(msgs: ServerMessage[]): boolean {
  return msgs.some((m) => m.type === 'INVESTIGATION_COMPLETE');
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('WarRoomServer', () => {
  let port: number;
  let server: WarRoomServer | undefined;
  const openClients: WebSocket[] = [];

  beforeEach(async () => {
    port = await getFreePort();
  });

  afterEach(async () => {
    for (const ws of openClients) {
      if (ws.readyState === WebSocket.OPEN) ws.terminate();
    }
    openClients.length = 0;
    if (server) await server.close();
    server = undefined;
  });

  function startServer(config: WarRoomConfig = makeConfig(), logger?: RunLogger): WarRoomServer {
    server = new WarRoomServer({ config, provider: new UnconfiguredProvider(), port, logger });
    server.start();
    return server;
  }

  it('reports the correct port', () => {
    expect(startServer().port).toBe(port);
  });

  it('greets each client with the active model', async () => {
    startServer();
    const { msgs, ws } = await collectUntil(port, (m) => m.length >= 1);
    openClients.push(ws);

    expect(msgs[0]).toEqual({ type: 'CONNECTED', payload: { model: null } });
  });

  it('answers malformed frames with ERROR', async () => {
    startServer();
    const { msgs, ws } = await collectUntil(
      port,
      (m) => m.some((msg) => msg.type === 'ERROR'),
      (ws) => ws.send('not json'),
    );
    openClients.push(ws);

    expect(msgs.find((m) => m.type === 'ERROR')).toEqual({
      type: 'ERROR',
      payload: { message: 'Invalid message' },
    });
  });

  it('rejects incidents with mistyped fields', async () => {
    startServer();
    const { msgs, ws } = await collectUntil(
      port,
      (m) => m.some((msg) => msg.type === 'ERROR'),
      (ws) =>
        ws.send(JSON.stringify({ type: 'RUN_INVESTIGATION', payload: { incident: { symptom: 1 } } })),
    );
    openClients.push(ws);

    expect(msgs.some((m) => m.type === 'AGENT_EVENT')).toBe(false);
    expect(msgs.some((m) => m.type === 'ERROR')).toBe(true);
  });

  it('streams agent events and then the verdict', async () => {
    startServer();
    const { msgs, ws } = await collectUntil(port, isComplete, (ws) =>
      ws.send(JSON.stringify({ type: 'RUN_INVESTIGATION', payload: { incident: INCIDENT } })),
    );
    openClients.push(ws);

    const events = msgs.filter((m) => m.type === 'AGENT_EVENT');
    expect(events[0]).toMatchObject({
      type: 'AGENT_EVENT',
      payload: { agent: 'Commander', type: 'thinking', content: 'Beginning incident assessment...' },
    });

    const last = msgs[msgs.length - 1];
    expect(last?.type).toBe('INVESTIGATION_COMPLETE');
    if (last?.type === 'INVESTIGATION_COMPLETE') {
      expect(last.payload.incidentId).toBe('INC-7');
      expect(last.payload.result).toMatchObject({
        status: 'resolved',
        rootCause: 'Database connection pool exhaustion due to recent config change',
        confidence: 0.5,
      });
    }
  });

  it('refuses a second investigation while one is running', async () => {
    startServer(makeConfig(200));
    const frame = JSON.stringify({ type: 'RUN_INVESTIGATION', payload: { incident: INCIDENT } });
    const { msgs, ws } = await collectUntil(port, isComplete, (ws) => {
      ws.send(frame);
      ws.send(frame);
    });
    openClients.push(ws);

    expect(msgs.filter((m) => m.type === 'ERROR')).toEqual([
      { type: 'ERROR', payload: { message: 'An investigation is already running' } },
    ]);
    expect(msgs.filter(isCompleteMessage)).toHaveLength(1);
  });

  it('persists finished runs through the logger', async () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'warroom-server-'));
    try {
      const logger = new RunLogger(root);
      startServer(makeConfig(), logger);
      const { ws } = await collectUntil(port, isComplete, (ws) =>
        ws.send(JSON.stringify({ type: 'RUN_INVESTIGATION', payload: { incident: INCIDENT } })),
      );
      openClients.push(ws);

      const runs = await logger.listRuns();
      expect(runs).toHaveLength(1);
      expect(runs[0]?.incident).toEqual(INCIDENT);
    } finally {
      fs.rmSync(root, { recursive: true, force: true });
    }
  });
});

function isCompleteMessage(msg: ServerMessage): boolean {
  return msg.type === 'INVESTIGATION_COMPLETE';
}
