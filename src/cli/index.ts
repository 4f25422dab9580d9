#!/usr/bin/env node

import { Command } from 'commander';
import { registerCheckGapsCommand } from './commands/check-gaps.js';
import { registerCheckMediaCommand } from './commands/check-media.js';
import { registerConvertCommand } from './commands/convert.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('tweetsheet')
    .description('Turn scraped tweet JSON files into a CSV table and a media lookup')
    .version('0.1.0');

  registerConvertCommand(program);
  registerCheckMediaCommand(program);
  registerCheckGapsCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
