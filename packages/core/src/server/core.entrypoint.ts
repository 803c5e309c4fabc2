#!/usr/bin/env node
/**
 * warroom-core: standalone war room server
 *
 * Loads config, builds the reasoning provider and serves live investigations
 * over WebSocket.
 *
 * Usage:
 *   warroom-core [--port <number>] [--project-root <path>]
 */
import { loadConfig } from '../config/config.loader.js';
import { createReasoningProvider } from '../providers/provider.factory.js';
import { RunLogger } from '../logs/run.logger.js';
import { WarRoomServer } from './warroom.server.js';

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

function parseArgs(argv: string[]): { port: number; projectRoot: string } {
  const args = argv.slice(2);
  let port = 7433;
  let projectRoot = process.cwd();

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--port' && value) {
      port = parseInt(value, 10);
      i++;
    } else if (args[i] === '--project-root' && value) {
      projectRoot = value;
      i++;
    }
  }

  return { port, projectRoot };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const { port, projectRoot } = parseArgs(process.argv);

  const config = await loadConfig();
  const provider = createReasoningProvider(config);

  const server = new WarRoomServer({
    config,
    provider,
    port,
    logger: new RunLogger(projectRoot),
  });
  server.start();

  // Signal any reader of stdout that the server is ready
  process.stdout.write(JSON.stringify({ type: 'ready', port }) + '\n');

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err: unknown) => {
  process.stderr.write(`[warroom] ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
