#!/usr/bin/env node
/**
 * reasonbench CLI entry point.
 *
 * Usage:
 *   reasonbench create --benchmark arith-basic --strategy chain-of-thought --model openai/gpt-4o-mini
 *   reasonbench run <evaluation-id> --concurrency 8
 *   reasonbench export <evaluation-id> --format csv --output results.csv
 */

import { writeFile } from 'node:fs/promises';
import { runCli, USAGE, type CliIO } from './cli/commands.js';
import { getProductionContainer } from './container.production.js';

const io: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  writeFile: (path, content) => writeFile(path, content, 'utf8'),
  onInterrupt: (handler) => {
    process.on('SIGINT', handler);
    return () => process.off('SIGINT', handler);
  },
};

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  // Help needs no configuration
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    console.log(USAGE);
    return;
  }
  process.exitCode = await runCli(argv, getProductionContainer(), io);
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
