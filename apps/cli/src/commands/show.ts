import { Command } from 'commander';
import * as out from '../output.js';
import { openSession, resolveTaskId, $try } from '../helpers.js';

export function createShowCommand(): Command {
  return new Command('show')
    .description('Show one task in detail')
    .argument('<id>', 'Task id or unique id prefix')
    .option('--json', 'Print the stored JSON record')
    .action((id: string, opts: { json?: boolean }, cmd: Command) => $try(() => {
      const { manager } = openSession(cmd);
      const record = resolveTaskId(manager, id).toRecord();

      if (opts.json) {
        console.log(JSON.stringify(record, null, 2));
        return;
      }
      out.printTaskDetail(record);
    }));
}
