import { createRequire } from 'module';
import { Command } from 'commander';
import { pickCommand } from './commands/pick';
import { sourcesCommand } from './commands/sources';
import { mapCommand } from './commands/map';
import { doctorCommand } from './commands/doctor';
import { setVerbose } from './ui/logger';

const require = createRequire(import.meta.url);
const { version } = require('../package.json') as { version: string };

const program = new Command();

program
  .name('gitsift')
  .version(version)
  .description('Git log, status and changed-file sources with actions for fuzzy finders')
  .option('--verbose', 'Log every git invocation to stderr');

program.hook('preAction', () => {
  if (program.opts<{ verbose?: boolean }>().verbose) setVerbose(true);
});

program.addCommand(pickCommand, { isDefault: true });
program.addCommand(sourcesCommand);
program.addCommand(mapCommand);
program.addCommand(doctorCommand);

program.addHelpText('after', `
Sources:
  $ gitsift gitstatus             Changed and untracked files
  $ gitsift gitlog -f src/app.ts  Commits touching a file
  $ gitsift gitlog:all            Commits on every branch
  $ gitsift gitlog::fix           Commits whose message mentions "fix"
  $ gitsift gitchanged            Files that differ from HEAD

Scripting:
  $ gitsift gitstatus --plain
  $ gitsift gitstatus --action add --select 1,3
`);

program.parse(process.argv);
