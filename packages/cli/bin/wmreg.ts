#!/usr/bin/env node
import { Command } from 'commander';
import { runCommand } from '../src/commands/run.js';
import { configCommand } from '../src/commands/config.js';
import { vocabCommand } from '../src/commands/vocab.js';

const program = new Command();

program
  .name('wmreg')
  .description('wmreg - working-memory flag and slot registers')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(vocabCommand);
program.addCommand(configCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
