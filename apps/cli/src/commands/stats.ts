import { Command } from 'commander';
import * as out from '../output.js';
import { openSession, $try } from '../helpers.js';

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show task statistics')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const { manager } = openSession(cmd);
      out.printStats(manager.getStats());
    }));
}
