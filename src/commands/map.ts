import { Command } from 'commander';
import chalk from 'chalk';
import * as ConfigService from '../services/config.service';
import { listSources } from '../sources';
import { actionNames } from '../actions/dispatcher';
import { errorMessage } from '../errors';
import { logSuccess } from '../ui/logger';

function knownActions(): Set<string> {
  const names = new Set<string>(['default']);
  for (const source of listSources()) {
    for (const name of actionNames(source.kind)) names.add(name);
  }
  return names;
}

export const mapCommand = new Command('map')
  .description('Show or change the picker key mappings')
  .argument('[key]', 'Single key to bind')
  .argument('[action]', 'Action name, or "none" to remove the binding')
  .action(async (key?: string, action?: string) => {
    try {
      const config = await ConfigService.load();

      if (key === undefined) {
        for (const [k, name] of Object.entries(config.mappings)) {
          console.log(`${chalk.bold(k)}  ${name}`);
        }
        process.exit(0);
      } else {
        if (key.length !== 1 || key === 'q' || key === ' ') {
          console.error(chalk.red(`Cannot bind "${key}": use one key other than q or space.`));
          process.exit(1);
        } else if (action === undefined) {
          console.log(config.mappings[key] ?? chalk.dim('(unbound)'));
          process.exit(0);
        } else if (action !== 'none' && !knownActions().has(action)) {
          console.error(chalk.red(`Unknown action "${action}".`));
          process.exit(1);
        } else {
          const mappings = { ...config.mappings };
          if (action === 'none') delete mappings[key];
          else mappings[key] = action;
          await ConfigService.save({ ...config, mappings });
          logSuccess(action === 'none' ? `Unbound ${key}.` : `Bound ${key} to ${action}.`);
          process.exit(0);
        }
      }
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exit(2);
    }
  });
