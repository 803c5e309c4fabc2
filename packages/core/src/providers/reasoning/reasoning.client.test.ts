import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import http from 'node:http';
import type { ReasoningChunk } from '@warroom/shared';
import { ReasoningClient, type ReasoningClientOptions } from './reasoning.client.js';
import { ConfigurationError, TransportError } from '../../errors.js';

// ---------------------------------------------------------------------------
// Mock OpenAI-compatible backend
// ---------------------------------------------------------------------------

let server: http.Server;
let serverPort: number;
let lastBody: Record<string, unknown> = {};

type Delta = { reasoning_content?: string; content?: string };

const DEFAULT_DELTAS: Delta[] = [
  { reasoning_content: 'a' },
  { reasoning_content: 'b' },
  { content: 'c' },
  { content: 'd' },
];

const INTERLEAVED_DELTAS: Delta[] = [
  { reasoning_content: 'x' },
  { content: 'y' },
  { reasoning_content: 'z', content: 'w' },
];

function lastUserContent(body: Record<string, unknown>): string {
  const messages = Array.isArray(body.messages) ? body.messages : [];
  const last: unknown = messages[messages.length - 1];
  if (last !== null && typeof last === 'object' && 'content' in last) {
    return String(last.content);
  }
  return '';
}

function startMockServer(): Promise<void> {
  return new Promise((resolve) => {
    server = http.createServer((req, res) => {
      if (req.url !== '/chat/completions' || req.method !== 'POST') {
        res.writeHead(404);
        res.end();
        return;
      }

      let body = '';
      req.on('data', (chunk: Buffer) => {
        body += chunk.toString();
      });
      req.on('end', () => {
        lastBody = JSON.parse(body) as Record<string, unknown>;

        if (lastBody.model === 'broken-model') {
          res.writeHead(500, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ error: { message: 'backend exploded' } }));
          return;
        }

        const deltas = lastUserContent(lastBody) === 'interleave' ? INTERLEAVED_DELTAS : DEFAULT_DELTAS;

        if (lastBody.stream) {
          res.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            Connection: 'keep-alive',
          });
          deltas.forEach((delta, i) => {
            const chunk = {
              id: 'chatcmpl-test',
              object: 'chat.completion.chunk',
              created: Math.floor(Date.now() / 1000),
              model: 'test-model',
              choices: [
                { index: 0, delta, finish_reason: i === deltas.length - 1 ? 'stop' : null },
              ],
            };
            res.write(`data: ${JSON.stringify(chunk)}\n\n`);
          });
          res.write('data: [DONE]\n\n');
          res.end();
          return;
        }

        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(
          JSON.stringify({
            id: 'chatcmpl-test',
            object: 'chat.completion',
            created: Math.floor(Date.now() / 1000),
            model: 'test-model',
            choices: [
              {
                index: 0,
                message: { role: 'assistant', content: 'cd', reasoning_content: 'ab' },
                finish_reason: 'stop',
              },
            ],
          }),
        );
      });
    });

    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      serverPort = typeof addr === 'object' && addr !== null ? addr.port : 0;
      resolve();
    });
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeClient(overrides: ReasoningClientOptions = {}): ReasoningClient {
  return new ReasoningClient({
    apiKey: 'test-key',
    baseURL: `http://127.0.0.1:${serverPort}`,
    model: 'test-model',
    ...overrides,
  });
}

async function collect(stream: AsyncGenerator<ReasoningChunk>): Promise<ReasoningChunk[]> {
  const chunks: ReasoningChunk[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}

const EXPECTED_CHUNKS: ReasoningChunk[] = [
  { kind: 'reasoning', text: 'a', model: 'test-model' },
  { kind: 'reasoning', text: 'b', model: 'test-model' },
  { kind: 'content', text: 'c', model: 'test-model' },
  { kind: 'content', text: 'd', model: 'test-model' },
];

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ReasoningClient', () => {
  beforeAll(async () => {
    await startMockServer();
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    lastBody = {};
  });

  // --- Streaming ---

  it('labels streamed chunks as reasoning or content in arrival order', async () => {
    const chunks = await collect(makeClient().respond([{ role: 'user', content: 'why?' }]));
    expect(chunks).toEqual(EXPECTED_CHUNKS);
  });

  it('tags interleaved chunks by their declared field, not their position', async () => {
    const chunks = await collect(makeClient().respond([{ role: 'user', content: 'interleave' }]));
    expect(chunks.map((c) => [c.kind, c.text])).toEqual([
      ['reasoning', 'x'],
      ['content', 'y'],
      ['reasoning', 'z'],
      ['content', 'w'],
    ]);
  });

  it('simpleQuery drops reasoning and concatenates content', async () => {
    expect(await makeClient().simpleQuery('why?')).toBe('cd');
  });

  // --- Request shape ---

  it('prepends the reasoning directive when no system turn is present', async () => {
    await collect(makeClient().respond([{ role: 'user', content: 'why?' }]));
    expect(lastBody.messages).toEqual([
      { role: 'system', content: '/think' },
      { role: 'user', content: 'why?' },
    ]);
  });

  it('keeps the caller system turn instead of adding the directive', async () => {
    await makeClient().simpleQuery('why?', 'You are an SRE.');
    expect(lastBody.messages).toEqual([
      { role: 'system', content: 'You are an SRE.' },
      { role: 'user', content: 'why?' },
    ]);
  });

  it('sends no synthetic system turn when the directive is disabled', async () => {
    await collect(makeClient({ reasoningDirective: null }).respond([{ role: 'user', content: 'q' }]));
    expect(lastBody.messages).toEqual([{ role: 'user', content: 'q' }]);
  });

  it('uses a custom reasoning directive', async () => {
    await collect(
      makeClient({ reasoningDirective: 'detailed thinking on' }).respond([
        { role: 'user', content: 'q' },
      ]),
    );
    expect(lastBody.messages).toEqual([
      { role: 'system', content: 'detailed thinking on' },
      { role: 'user', content: 'q' },
    ]);
  });

  it('sends the thinking budget and sampling defaults', async () => {
    await collect(
      makeClient({ minThinkingTokens: 256, maxThinkingTokens: 1024 }).respond([
        { role: 'user', content: 'q' },
      ]),
    );
    expect(lastBody).toMatchObject({
      model: 'test-model',
      temperature: 0.6,
      top_p: 0.95,
      max_tokens: 2048,
      stream: true,
      min_thinking_tokens: 256,
      max_thinking_tokens: 1024,
    });
  });

  it('lets per-call options override sampling settings', async () => {
    await collect(
      makeClient().respond([{ role: 'user', content: 'q' }], {
        temperature: 0.1,
        topP: 0.5,
        maxTokens: 64,
      }),
    );
    expect(lastBody).toMatchObject({ temperature: 0.1, top_p: 0.5, max_tokens: 64 });
  });

  // --- Non-streaming ---

  it('partitions a one-shot response the same way when streaming is off', async () => {
    const chunks = await collect(
      makeClient({ stream: false }).respond([{ role: 'user', content: 'why?' }]),
    );
    expect(lastBody.stream).toBe(false);
    expect(chunks).toEqual([
      { kind: 'reasoning', text: 'ab', model: 'test-model' },
      { kind: 'content', text: 'cd', model: 'test-model' },
    ]);
  });

  // --- Failures ---

  it('surfaces backend failures as TransportError carrying the status', async () => {
    const client = makeClient({ model: 'broken-model' });
    const error = await collect(client.respond([{ role: 'user', content: 'q' }])).catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 500 });
  });

  it('simpleQuery fails with the same TransportError', async () => {
    await expect(makeClient({ model: 'broken-model' }).simpleQuery('q')).rejects.toBeInstanceOf(
      TransportError,
    );
  });

  it('yields nothing for an already-aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const chunks = await collect(
      makeClient().respond([{ role: 'user', content: 'q' }], { signal: controller.signal }),
    );
    expect(chunks).toEqual([]);
  });

  // --- Credentials ---

  it('fails fast with ConfigurationError when no API key can be resolved', () => {
    vi.stubEnv('NVIDIA_API_KEY', '');
    vi.stubEnv('NGC_API_KEY', '');
    expect(() => new ReasoningClient()).toThrow(ConfigurationError);
  });

  it('falls back to NGC_API_KEY when NVIDIA_API_KEY is unset', () => {
    vi.stubEnv('NVIDIA_API_KEY', '');
    vi.stubEnv('NGC_API_KEY', 'test-ngc-key');
    const client = new ReasoningClient();
    expect(client.configured).toBe(true);
    expect(client.model).toBe('nvidia/llama-3.3-nemotron-super-49b-v1.5');
  });
});
