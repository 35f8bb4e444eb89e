/**
 * Command-line front end: loads a PDF and prints its transcript.
 *
 * Usage:
 *   npx tsx src/main.ts [pdf-path] [--strict-superscript]
 */

import fs from 'fs';
import path from 'path';

import { PdfLibDocumentSource } from './transcript/PdfLibDocumentSource';
import { extractTranscript } from './transcript/TranscriptPipeline';
import { formatTranscriptError } from './transcript/errors';
import type { NoSignalPolicy, TranscriptLogger } from './transcript/types';

export const DEFAULT_INPUT_PATH = 'test.pdf';

export interface CliOptions {
  inputPath: string;
  noSignalPolicy: NoSignalPolicy;
}

export interface CliIO extends TranscriptLogger {
  error: (...data: unknown[]) => void;
  readFile: (filePath: string) => Uint8Array;
}

const defaultIO: CliIO = {
  log: (...data: unknown[]) => console.log(...data),
  warn: (...data: unknown[]) => console.warn(...data),
  error: (...data: unknown[]) => console.error(...data),
  readFile: (filePath) => fs.readFileSync(filePath),
};

export function parseCliArgs(args: string[]): CliOptions {
  const positional = args.filter(arg => !arg.startsWith('--'));
  return {
    inputPath: positional[0] ?? DEFAULT_INPUT_PATH,
    noSignalPolicy: args.includes('--strict-superscript') ? 'fail' : 'skip',
  };
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(args: string[], io: CliIO = defaultIO): Promise<number> {
  const options = parseCliArgs(args);
  const pdfPath = path.resolve(options.inputPath);

  let source: PdfLibDocumentSource;
  try {
    source = await PdfLibDocumentSource.load(io.readFile(pdfPath));
  } catch (e) {
    io.error(`Failed to open PDF ${pdfPath}:`, e);
    return 1;
  }

  const result = extractTranscript(source, { noSignalPolicy: options.noSignalPolicy, logger: io });
  if (!result.ok) {
    io.error(formatTranscriptError(result.error));
    return 1;
  }

  for (const line of result.value.lines) {
    io.log(line);
  }
  return 0;
}
