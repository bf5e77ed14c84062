/**
 * Models Command
 *
 *   docchat models          - List free-tier models from the catalog
 *   docchat models --json   - Same, as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { loadConfig } from '../../config/index.js';
import { fetchModelCatalog, type ModelDescriptor } from '../../providers/index.js';
import type { CommandContext } from '../types.js';

/**
 * Two aligned columns: name and context length, with the id dimmed below.
 */
export function formatModelList(models: readonly ModelDescriptor[], defaultModel: string): string {
  const width = Math.max(...models.map((model) => model.name.length), 0);

  return models
    .map((model) => {
      const isDefault = defaultModel !== '' && (model.id === defaultModel || model.name === defaultModel);
      const marker = isDefault ? chalk.green('*') : ' ';
      const context = `${model.contextLength.toLocaleString('en-US')} tokens`;
      return `${marker} ${model.name.padEnd(width)}  ${chalk.dim(context)}\n    ${chalk.dim(model.id)}`;
    })
    .join('\n');
}

export function createModelsCommand(getContext: () => CommandContext): Command {
  return new Command('models')
    .description('List free-tier chat models')
    .action(async () => {
      const ctx = getContext();
      const config = loadConfig();

      const spinner = ctx.options.json ? null : ora('Fetching models...').start();
      let models: ModelDescriptor[];
      try {
        models = await fetchModelCatalog({
          url: config.models.catalog_url,
          maxPricePerMillion: config.models.max_price_per_million,
        });
      } finally {
        spinner?.stop();
      }

      if (ctx.options.json) {
        console.log(JSON.stringify(models, null, 2));
        return;
      }

      if (models.length === 0) {
        ctx.log(chalk.yellow('No free models found.'));
        ctx.log(chalk.dim(`Catalog: ${config.models.catalog_url}`));
        return;
      }

      ctx.log(chalk.bold(`Free models (${models.length}):`));
      ctx.log('');
      ctx.log(formatModelList(models, config.default_model));
    });
}
