/**
 * Doctor Command - Diagnose common issues
 *
 * Checks:
 * - Environment file
 * - Anthropic API key
 * - Numeric orchestration settings
 * - Model catalog
 */

import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'fs/promises';
import * as path from 'path';
import { getConfig, validateConfig } from '../../config.js';
import { loadModelCatalog } from '../../config/index.js';
import { toError } from '../../infra/errors.js';

interface CheckResult {
  ok: boolean;
  message: string;
}

interface Check {
  name: string;
  check: () => Promise<CheckResult>;
}

export async function doctorCommand(): Promise<void> {
  console.log('\n');
  console.log(chalk.cyan('  ─── postlens doctor ───'));
  console.log(chalk.gray(`  runtime: node ${process.versions.node}`));
  console.log('\n');

  const checks: Check[] = [
    { name: 'environment file', check: checkEnvFile },
    { name: 'anthropic api key', check: checkAnthropicKey },
    { name: 'orchestration settings', check: checkSettings },
    { name: 'model catalog', check: checkCatalog },
  ];

  let allPassed = true;

  for (const { name, check } of checks) {
    const spinner = ora({ text: name, prefixText: '  ' }).start();

    try {
      const result = await check();
      if (result.ok) {
        spinner.succeed(chalk.green(name) + chalk.gray(` - ${result.message}`));
      } else {
        spinner.fail(chalk.red(name) + chalk.gray(` - ${result.message}`));
        allPassed = false;
      }
    } catch (error) {
      spinner.fail(chalk.red(name) + chalk.gray(` - ${toError(error).message}`));
      allPassed = false;
    }
  }

  const { warnings } = validateConfig();
  for (const warning of warnings) {
    console.log(chalk.yellow(`  ⚠ ${warning}`));
  }

  console.log('\n');

  if (allPassed) {
    console.log(chalk.green('  ✓ all checks passed\n'));
    console.log(chalk.gray('  ready to run: postlens annotate <posts.json>\n'));
  } else {
    console.log(chalk.yellow('  ⚠ some checks failed\n'));
    process.exitCode = 1;
  }
}

async function checkEnvFile(): Promise<CheckResult> {
  const envPath = path.join(process.cwd(), '.env');
  try {
    await fs.access(envPath);
    return { ok: true, message: '.env file found' };
  } catch {
    return { ok: true, message: 'no .env file, using process environment' };
  }
}

async function checkAnthropicKey(): Promise<CheckResult> {
  const key = process.env.ANTHROPIC_API_KEY?.trim();
  if (!key) {
    return { ok: false, message: 'ANTHROPIC_API_KEY not set' };
  }
  if (!key.startsWith('sk-ant-')) {
    return { ok: false, message: 'invalid key format' };
  }
  return { ok: true, message: 'key configured' };
}

async function checkSettings(): Promise<CheckResult> {
  const config = getConfig();
  return {
    ok: true,
    message:
      `${config.retryMaxNum} retries, ${config.retryDelayMs / 1000}s delay, ` +
      `${config.maxAttempts} attempts per call`,
  };
}

async function checkCatalog(): Promise<CheckResult> {
  const config = getConfig();
  const catalog = await loadModelCatalog(config.catalogPath ?? undefined);
  return {
    ok: true,
    message: `${catalog.length} model(s), primary ${catalog[0].name}`,
  };
}
