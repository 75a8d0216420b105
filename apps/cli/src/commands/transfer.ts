import { Command } from 'commander';
import * as out from '../output.js';
import { openSession, $try } from '../helpers.js';

export function createExportCommand(): Command {
  return new Command('export')
    .description('Export all tasks to a CSV file')
    .argument('<path>', 'CSV file to write')
    .action((path: string, _opts: unknown, cmd: Command) => $try(() => {
      const { manager } = openSession(cmd);
      if (!manager.exportToCsv(path)) {
        throw new Error(`Could not export tasks to ${path}`);
      }
      out.success(`Exported ${manager.size} task(s) to ${path}`);
    }));
}

export function createImportCommand(): Command {
  return new Command('import')
    .description('Replace all tasks with a CSV file, or merge in a JSON task file')
    .argument('<path>', 'CSV file, or JSON task file with --merge')
    .option('-m, --merge', 'Add tasks from a JSON task file whose ids are new')
    .action((path: string, opts: { merge?: boolean }, cmd: Command) => $try(() => {
      const { manager, save } = openSession(cmd);

      if (opts.merge) {
        const added = manager.mergeFromFile(path);
        save();
        out.success(`Merged ${added} new task(s) from ${path}`);
        return;
      }

      if (!manager.importFromCsv(path)) {
        throw new Error(`Could not import tasks from ${path}`);
      }
      save();
      out.success(`Imported ${manager.size} task(s) from ${path}`);
    }));
}
