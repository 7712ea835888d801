// Filesystem implementation of AppendOnlyLog.
// Uses Node.js fs module for local NDJSON files.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { CapabilityAdapterGate, EvidenceRef, JsonObject } from '@ledgerline/protocol';
import { countNdjsonLines, stringifyNdjsonLine } from '@ledgerline/protocol';
import type { AppendOnlyLog } from '../interfaces/index.js';
import type { LogContext } from '../interfaces/index.js';
import { enforceCapabilityGate } from '../gate.js';

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readIfExists(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return '';
    }
    throw error;
  }
}

/**
 * Create an AppendOnlyLog backed by an NDJSON file.
 * The file and its parent directory are created on first append.
 *
 * Single writer only: each append reads the file to find its line number, so
 * appends must be awaited one after another. Two appends in flight on the
 * same file can be handed the same `@N` ref.
 */
export function createFilesystemLog(filePath: string): AppendOnlyLog {
  const name = path.basename(filePath);

  return {
    name,

    async append(record: JsonObject, gate: CapabilityAdapterGate): Promise<EvidenceRef> {
      enforceCapabilityGate(`append to ${name}`, gate);

      const existing = await readIfExists(filePath);
      const lineNumber = countNdjsonLines(existing) + 1;

      // Logs may have been concatenated without a trailing newline
      const separator = existing.length > 0 && !existing.endsWith('\n') ? '\n' : '';

      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.appendFile(filePath, separator + stringifyNdjsonLine(record), 'utf-8');

      return { kind: 'jsonl', ref: `${name}@${lineNumber}` };
    },

    async read(): Promise<string> {
      return readIfExists(filePath);
    },
  };
}

/**
 * Paths for the two log streams.
 */
export type FilesystemLogPaths = {
  predictionLogPath: string;
  haltLogPath: string;
};

/**
 * Create a LogContext backed by two NDJSON files.
 */
export function createFilesystemLogContext(paths: FilesystemLogPaths): LogContext {
  return {
    predictions: createFilesystemLog(paths.predictionLogPath),
    halts: createFilesystemLog(paths.haltLogPath),
  };
}
