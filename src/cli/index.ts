#!/usr/bin/env node

import { Command } from 'commander';
import { registerScrapeCommand } from './commands/scrape.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('studio-scrape')
    .description('Extract facility records from studio listing pages')
    .version('0.1.0');

  registerScrapeCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
