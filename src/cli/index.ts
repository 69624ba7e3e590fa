#!/usr/bin/env node
import { Command } from 'commander';
import { checkCommand } from './commands/check.js';

const program = new Command()
  .name('tracecheck')
  .description('Assertion checks for recorded LLM agent conversations')
  .version('0.1.0');

program.addCommand(checkCommand);

program.parse();
