#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Usage: mcp-envelope [request|response|message] < messages.ndjson
 */

import 'dotenv/config';
import readline from 'node:readline';
import { isCliMode, reportFatalError, runCli, CLI_MODES } from './cli.js';
import { loadConfig } from './config.js';
import { MessageDecoder } from './decoder.js';
import { ConsoleLogger, JsonLogger } from './logger.js';
import { DecoderMetrics } from './metrics.js';

async function main() {
  const config = loadConfig();
  const loggerOptions = { level: config.logLevel, redactParams: config.redactParams };
  const logger = config.logFormat === 'json'
    ? new JsonLogger(loggerOptions)
    : new ConsoleLogger(loggerOptions);

  const mode = process.argv[2] ?? 'request';
  if (!isCliMode(mode)) {
    logger.error(`Unknown mode '${mode}', expected one of: ${CLI_MODES.join(', ')}`);
    process.exit(2);
  }

  const metrics = new DecoderMetrics({ enabled: config.metricsEnabled, prefix: config.metricsPrefix });
  const decoder = new MessageDecoder({ logger, metrics });

  const input = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });
  const exitCode = await runCli(decoder, mode, input, line => {
    process.stdout.write(`${line}\n`);
  });

  if (config.metricsEnabled) {
    process.stderr.write(await metrics.getMetrics());
  }
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  process.exit(reportFatalError(new ConsoleLogger(), error));
});
