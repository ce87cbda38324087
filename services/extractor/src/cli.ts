/**
 * Extractor CLI
 *
 * Prompts for a PDF path, runs the full pipeline with default settings and
 * prints the extracted JSON on stdout.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline/promises';
import { pathToFileURL } from 'node:url';
import { config, ExtractionError, type ExtractionOutput } from '@scanfields/shared';
import { extract } from './lib/pipeline';

export const PATH_PROMPT = 'Enter path to PDF: ';

export interface CliIo {
  question: (prompt: string) => Promise<string>;
  readFile: (filePath: string) => Promise<Uint8Array>;
  extract: (pdfBytes: Uint8Array, filename: string) => Promise<ExtractionOutput>;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

/**
 * One interactive extraction. Resolves to the process exit code.
 */
export async function runExtractionCli(io: CliIo): Promise<number> {
  const answer = (await io.question(PATH_PROMPT)).trim();

  if (!answer) {
    io.stderr('No PDF path provided.');
    return 1;
  }

  try {
    const pdfBytes = await io.readFile(answer);
    const result = await io.extract(pdfBytes, path.basename(answer));
    io.stdout(JSON.stringify(result));
    return 0;
  } catch (error) {
    io.stderr(ExtractionError.getErrorMessage(error));
    return 1;
  }
}

async function main(): Promise<void> {
  // Keep stdout to the JSON result unless asked otherwise
  if (!process.env.LOG_LEVEL) {
    config.logLevel = 'warn';
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    process.exitCode = await runExtractionCli({
      question: (prompt) => rl.question(prompt),
      readFile: (filePath) => readFile(filePath),
      extract: (pdfBytes, filename) => extract(pdfBytes, filename),
      stdout: (line) => console.log(line),
      stderr: (line) => console.error(line),
    });
  } finally {
    rl.close();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    console.error(ExtractionError.getErrorMessage(error));
    process.exit(1);
  });
}
