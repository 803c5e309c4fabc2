#!/usr/bin/env node
/**
 * warroom: watch an incident investigation unfold in the terminal
 *
 * Usage:
 *   warroom [--simple] [--no-llm] [--scenario <file.json>]
 *
 * Without NVIDIA_API_KEY / NGC_API_KEY the commander falls back to its
 * rule-based verdict instead of refusing to start.
 */
import React from 'react';
import { render } from 'ink';
import type { ReasoningProvider, WarRoomConfig } from '@warroom/shared';
import {
  ConfigurationError,
  RunLogger,
  UnconfiguredProvider,
  createCommander,
  createReasoningProvider,
  loadConfig,
  loadScenario,
  recordInvestigation,
} from '@warroom/core';
import { WarRoom } from './components/WarRoom.js';
import { SimpleVisualizer } from './simple.visualizer.js';

interface CliOptions {
  simple: boolean;
  noLlm: boolean;
  scenario?: string;
}

function parseArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);
  const options: CliOptions = { simple: false, noLlm: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--simple') {
      options.simple = true;
    } else if (arg === '--no-llm') {
      options.noLlm = true;
    } else if (arg === '--scenario') {
      const value = args[i + 1];
      if (!value) throw new Error('--scenario needs a file path');
      options.scenario = value;
      i++;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

function buildProvider(config: WarRoomConfig, noLlm: boolean): ReasoningProvider {
  if (noLlm) return new UnconfiguredProvider();
  try {
    return createReasoningProvider(config);
  } catch (err: unknown) {
    if (!(err instanceof ConfigurationError)) throw err;
    process.stderr.write(`[warroom] ${err.message} - using rule-based reasoning\n`);
    return new UnconfiguredProvider();
  }
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv);
  const config = await loadConfig();
  const provider = buildProvider(config, options.noLlm);
  const incident = await loadScenario(options.scenario);

  const commander = createCommander(config, provider);
  const logger = new RunLogger(process.cwd());
  const retention = config.logs.retention;

  if (options.simple) {
    const visualizer = new SimpleVisualizer();
    visualizer.printIncident(incident);
    commander.addEventListener(visualizer.onEvent);
    const run = await recordInvestigation(commander, { incident }, { logger, retention });
    visualizer.printResult(run.result);
    return;
  }

  const { waitUntilExit } = render(
    React.createElement(WarRoom, { commander, incident, model: provider.model, logger, retention }),
  );
  await waitUntilExit();
}

main().catch((err: unknown) => {
  process.stderr.write(
    (err instanceof Error ? err.message : String(err)) + '\n',
  );
  process.exit(1);
});
