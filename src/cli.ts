/**
 * Line-oriented decode loop behind the `mcp-envelope` command
 */

import type { MessageDecoder } from './decoder.js';
import { getErrorDetails, toJsonRpcError, type DecodeResult } from './errors.js';
import type { Logger } from './logger.js';
import { NULL_ID } from './identifier.js';
import { encodeErrorResponse, encodeMessage, encodeRequest, encodeResponse } from './serializer.js';
import { JSONRPC_VERSION } from './constants.js';

export const CLI_MODES = ['request', 'response', 'message'] as const;

export type CliMode = (typeof CLI_MODES)[number];

export interface LineOutcome {
  ok: boolean;
  output: string;
}

export function isCliMode(value: string): value is CliMode {
  return CLI_MODES.some(mode => mode === value);
}

/**
 * Decode one line and produce either its canonical encoding or a JSON-RPC
 * error response with a null id
 */
export function processLine(decoder: MessageDecoder, mode: CliMode, line: string): LineOutcome {
  switch (mode) {
    case 'request':
      return render(decoder.decodeRequest(line), encodeRequest);
    case 'response':
      return render(decoder.decodeResponse(line), encodeResponse);
    case 'message':
      return render(decoder.decodeMessage(line), encodeMessage);
  }
}

function render<T>(result: DecodeResult<T>, encode: (value: T) => string): LineOutcome {
  if (result.ok) {
    return { ok: true, output: encode(result.value) };
  }
  return {
    ok: false,
    output: encodeErrorResponse({
      protocolVersion: JSONRPC_VERSION,
      id: NULL_ID,
      error: toJsonRpcError(result.error),
    }),
  };
}

/**
 * Run every non-blank line through processLine.
 * Returns the process exit code: 1 if any line failed.
 */
export async function runCli(
  decoder: MessageDecoder,
  mode: CliMode,
  lines: AsyncIterable<string> | Iterable<string>,
  write: (line: string) => void
): Promise<number> {
  let exitCode = 0;
  for await (const line of lines) {
    if (line.trim() === '') continue;
    const outcome = processLine(decoder, mode, line);
    if (!outcome.ok) exitCode = 1;
    write(outcome.output);
  }
  return exitCode;
}

/**
 * Log a startup or stream failure with its structured details.
 * Returns the exit code the process should end with.
 */
export function reportFatalError(logger: Logger, error: unknown): number {
  logger.error('Fatal error', undefined, getErrorDetails(error));
  return 1;
}
