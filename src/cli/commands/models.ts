/**
 * Models Command - show the effective catalog
 */

import chalk from 'chalk';
import { getConfig } from '../../config.js';
import { getModelChain, loadModelCatalog } from '../../config/index.js';

export async function modelsCommand(): Promise<void> {
  const config = getConfig();
  const catalog = await loadModelCatalog(config.catalogPath ?? undefined);

  console.log('\n');
  console.log(chalk.cyan('  model catalog') + chalk.gray(` (${config.catalogPath ?? 'built-in'})`));
  console.log(chalk.gray('  ─────────────────────────────────'));

  catalog.forEach((model, index) => {
    const marker = index === 0 ? chalk.green('primary ') : chalk.gray('fallback');
    console.log(
      `  ${marker}  ${chalk.white(model.name)}` +
      chalk.gray(`  ${model.maxCallsPerMinute}/min  ${model.maxCallsPerDay}/day`)
    );
  });

  console.log(chalk.gray(`\n  chain: ${getModelChain(catalog).join(' → ')}\n`));
}
