#!/usr/bin/env node
/**
 * postlens CLI
 *
 * Commands:
 *   annotate  - Label every post in a JSON file
 *   models    - Show the model catalog and its quotas
 *   doctor    - Diagnose configuration issues
 *   version   - Show version and runtime info
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { annotateCommand } from './commands/annotate.js';
import { modelsCommand } from './commands/models.js';
import { doctorCommand } from './commands/doctor.js';

const VERSION = '0.1.0';

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('\n  ✗ unhandled error'));
  console.error(chalk.gray(`  ${reason}\n`));
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  console.error(chalk.red('\n  ✗ unexpected error'));
  console.error(chalk.gray(`  ${error.message}\n`));
  process.exit(1);
});

const program = new Command();

program
  .name('postlens')
  .description('label crawled social posts with an LLM, one conversation per post')
  .version(VERSION);

program
  .command('annotate')
  .description('annotate every post in a JSON file')
  .argument('<input>', 'JSON array of posts')
  .option('-o, --output <file>', 'where to write annotated posts (default: <input>.annotated.json)')
  .option('-l, --limit <n>', 'annotate only the first n posts')
  .action(annotateCommand);

program
  .command('models')
  .description('show the model catalog in fallback order')
  .action(modelsCommand);

program
  .command('doctor')
  .description('diagnose common issues')
  .action(doctorCommand);

program
  .command('version')
  .description('show version and runtime info')
  .action(() => {
    console.log(chalk.cyan('\n  postlens') + chalk.gray(` v${VERSION}`));
    console.log(chalk.gray(`  runtime: node ${process.versions.node}\n`));
  });

await program.parseAsync();
