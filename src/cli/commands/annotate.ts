/**
 * Annotate Command - label every post in a JSON file
 *
 * All sessions of one run share a quota ledger, since they call through the
 * same API key.
 */

import chalk from 'chalk';
import ora from 'ora';
import { getConfig, logConfig } from '../../config.js';
import { loadModelCatalog } from '../../config/index.js';
import { annotatePosts, AnnotationRunError, createAnnotationSession } from '../../annotator/index.js';
import { QuotaLedger, type OrchestratorEvent } from '../../infra/index.js';
import { createAnthropicTransport } from '../../clients/anthropic/client.js';
import { annotatedPathFor, loadPosts, savePosts } from '../../store/posts.js';

interface AnnotateOptions {
  output?: string;
  limit?: string;
}

function describeEvent(event: OrchestratorEvent): string {
  switch (event.type) {
    case 'attempt':
      return `${event.label} on ${event.model} (attempt ${event.attempt})`;
    case 'succeeded':
      return `${event.label} done on ${event.model}`;
    case 'minute_wait':
      return `minute quota reached on ${event.model}, waiting ${Math.ceil(event.waitMs / 1000)}s`;
    case 'retry_scheduled':
      return `${event.label} failed on ${event.model}, retrying in ${Math.ceil(event.delayMs / 1000)}s`;
    case 'model_switched':
      return `switched ${event.from} → ${event.to} (${event.reason})`;
  }
}

function parseLimit(limit: string | undefined): number | null {
  if (limit === undefined) return null;
  const value = Number(limit);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`--limit must be a positive integer, got "${limit}"`);
  }
  return value;
}

export async function annotateCommand(input: string, options: AnnotateOptions): Promise<void> {
  const outputPath = options.output ?? annotatedPathFor(input);
  const limit = parseLimit(options.limit);

  const config = getConfig();
  const catalog = await loadModelCatalog(config.catalogPath ?? undefined);
  const allPosts = await loadPosts(input);
  const posts = limit === null ? allPosts : allPosts.slice(0, limit);

  logConfig();
  console.log(chalk.cyan('  postlens annotate'));
  console.log(chalk.gray(`  ${posts.length} post(s) from ${input}`));
  console.log(chalk.gray(`  primary model: ${catalog[0].name}\n`));

  const transport = createAnthropicTransport(config.apiKey ?? undefined);
  const ledger = new QuotaLedger();
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  const spinner = ora({ text: 'starting', prefixText: '  ' }).start();
  let done = 0;
  const progress = () => chalk.gray(`[${done}/${posts.length}]`);

  try {
    const annotated = await annotatePosts(posts, {
      signal: controller.signal,
      openSession: (content) =>
        createAnnotationSession(content, {
          transport,
          catalog,
          quotaLedger: ledger,
          signal: controller.signal,
          onEvent: (event) => {
            spinner.text = `${progress()} ${describeEvent(event)}`;
          },
        }),
      onProgress: (count, _total, post) => {
        done = count;
        spinner.text = `${progress()} ${post.link}`;
      },
    });

    await savePosts(outputPath, annotated);
    spinner.succeed(chalk.green(`annotated ${annotated.length} post(s)`) + chalk.gray(` → ${outputPath}`));
    console.log('');
  } catch (error) {
    if (error instanceof AnnotationRunError) {
      await savePosts(outputPath, error.completed);
      spinner.fail(chalk.red(error.message));
      console.log(chalk.gray(`  saved ${error.completed.length} finished post(s) → ${outputPath}`));
      if (error.poolExhausted) {
        console.log(chalk.yellow('  every model in the catalog is exhausted; try again tomorrow'));
      } else if (!error.orchestrationFailed) {
        console.log(chalk.yellow('  run `postlens doctor` to check the configuration'));
      }
      console.log('');
      process.exitCode = 1;
      return;
    }
    spinner.fail(chalk.red('annotation failed'));
    throw error;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
