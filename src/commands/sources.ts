import { Command } from 'commander';
import chalk from 'chalk';
import { listSources } from '../sources';
import { getKind } from '../kinds';
import { actionNames } from '../actions/dispatcher';

export const sourcesCommand = new Command('sources')
  .description('List the available sources and the actions of their candidates')
  .action(() => {
    for (const source of listSources()) {
      const kind = getKind(source.kind);
      console.log(chalk.bold(source.name));
      console.log(`  ${chalk.dim(source.description)}`);
      const actions = actionNames(kind.name).map((name) =>
        name === kind.defaultAction ? `${name} ${chalk.dim('(default)')}` : name
      );
      console.log(`  actions: ${actions.join(', ')}`);
    }
  });
