import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { listCommand } from './cmd/list';
import { createRunCommand } from './cmd/run';
import { Installation } from './installation';

export async function cli(args: string[]): Promise<void> {
  await yargs(hideBin(['node', 'cli', ...args]))
    .scriptName('scriptunit')
    .usage('$0 <command> [options]')
    .command(createRunCommand(args))
    .command(listCommand)
    .demandCommand(1, 'You need to specify a command')
    .strictCommands()
    .help()
    .alias('h', 'help')
    .version(Installation.VERSION)
    .parse();
}
