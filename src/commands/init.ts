import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import yaml from 'js-yaml';
import { DEFAULT_SURVEY_FILE, EXAMPLE_SURVEY } from '../survey/index.js';

interface InitOptions {
  force?: boolean;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Write an example survey design file')
    .argument('[file]', 'Where to write the survey file', DEFAULT_SURVEY_FILE)
    .option('--force', 'Overwrite an existing file')
    .action((file: string, options: InitOptions) => {
      const target = resolve(process.cwd(), file);

      if (existsSync(target) && !options.force) {
        console.error(chalk.red(`Error: ${file} already exists. Use --force to overwrite.`));
        process.exit(1);
      }

      try {
        writeFileSync(target, yaml.dump(EXAMPLE_SURVEY, { lineWidth: 80 }));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(chalk.red(`Failed to create ${file}: ${message}`));
        process.exit(1);
      }

      console.log(chalk.green(`✓ Created ${file}`));
      console.log(chalk.cyan('\nNext steps:'));
      console.log(`  1. Edit the strata and precision in ${file}`);
      console.log(`  2. Run \`stratalloc allocate ${file}\` to compute allocations`);
    });
}
