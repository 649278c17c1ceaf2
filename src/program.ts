import { Command } from 'commander';
import { createAllocateCommand } from './commands/allocate.js';
import { createInitCommand } from './commands/init.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stratalloc')
    .description('Sample size and allocation calculator for stratified sampling')
    .version('0.1.0');

  program.addCommand(createInitCommand());
  program.addCommand(createAllocateCommand());

  return program;
}
