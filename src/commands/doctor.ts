import { Command } from 'commander';
import chalk from 'chalk';
import * as ConfigService from '../services/config.service';
import { GitService } from '../services/git.service';
import { editorCommand, pagerCommand } from '../services/editor.service';
import { resolveRoot } from '../sources';
import { errorMessage } from '../errors';

interface Check {
  label: string;
  run: () => Promise<{ ok: boolean; detail: string }>;
}

const PASS = chalk.green('PASS');
const FAIL = chalk.red('FAIL');

const checks: Check[] = [
  {
    label: 'git installed',
    run: async () => {
      try {
        const version = await new GitService(process.cwd()).getVersion();
        return { ok: true, detail: `git ${version}` };
      } catch (err) {
        return { ok: false, detail: errorMessage(err) };
      }
    },
  },
  {
    label: 'Inside a work tree',
    run: async () => {
      try {
        return { ok: true, detail: await resolveRoot(process.cwd()) };
      } catch (err) {
        return { ok: false, detail: errorMessage(err) };
      }
    },
  },
  {
    label: 'Config file valid',
    run: async () => {
      try {
        await ConfigService.load();
        return { ok: true, detail: ConfigService.getConfigPath() };
      } catch (err) {
        return { ok: false, detail: errorMessage(err) };
      }
    },
  },
  {
    label: 'Editor and pager',
    run: async () => ({ ok: true, detail: `${editorCommand()} / ${pagerCommand()}` }),
  },
];

export const doctorCommand = new Command('doctor')
  .description('Run diagnostic checks on your gitsift setup')
  .action(async () => {
    console.log();
    console.log(chalk.bold('gitsift doctor'));
    console.log(chalk.dim('─'.repeat(50)));
    console.log();

    let allPassed = true;

    for (const check of checks) {
      const result = await check.run();
      const badge = result.ok ? PASS : FAIL;
      console.log(`  ${badge}  ${check.label}`);
      console.log(`         ${chalk.dim(result.detail)}`);
      if (!result.ok) allPassed = false;
    }

    console.log();
    if (allPassed) {
      console.log(chalk.green('All checks passed.'));
    } else {
      console.log(chalk.yellow('Some checks failed. See the details above.'));
    }
    console.log();

    process.exit(allPassed ? 0 : 1);
  });
