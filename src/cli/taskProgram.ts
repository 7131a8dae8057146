import path from 'node:path';
import type { Command } from 'commander';
import type { TaskStatus } from '../model.js';
import { createLogger, type Logger } from '../log.js';
import { JsonStore } from '../store/jsonStore.js';
import { TaskService, formatTask, type UpdateOutcome } from '../tasks/taskService.js';
import { baseProgram, consoleOutput, parseFormat, parsePositiveInt, parseStatus, type Output, type OutputFormat } from './shared.js';

export interface TaskProgramDeps {
  /** Used unless --file is given. */
  tasksFile: string;
  out?: Output;
  logger?: Logger;
  now?: () => Date;
}

export function createTaskProgram(deps: TaskProgramDeps): Command {
  const out = deps.out ?? consoleOutput;
  const logger = deps.logger ?? createLogger('silent');

  const program = baseProgram('task-cli', 'Track tasks in a local JSON file', out).option(
    '-f, --file <path>',
    'Task file (default: tasks.json or TASKPULSE_TASKS_FILE)',
  );

  const service = () => {
    const file = program.opts<{ file?: string }>().file;
    const store = new JsonStore(file ? path.resolve(file) : deps.tasksFile);
    logger.debug(`task file ${store.getPath()}`);
    return new TaskService(store, { now: deps.now, logger });
  };

  const reportUpdate = (outcome: UpdateOutcome) => {
    switch (outcome.kind) {
      case 'updated':
        out.log(`Task ${outcome.task.id} updated.`);
        return;
      case 'no-changes':
        out.log('No changes provided.');
        return;
      case 'not-found':
        out.log(`Task ${outcome.id} not found.`);
        return;
    }
  };

  program
    .command('add')
    .description('Add a new task')
    .argument('<description...>', 'Task description')
    .action(async (words: string[]) => {
      const task = await service().add(words.join(' '));
      out.log(`Task added successfully (ID: ${task.id})`);
    });

  program
    .command('update')
    .description('Update a task description and/or status')
    .argument('<id>', 'Task id', parsePositiveInt)
    .argument('[description...]', 'New description (multi-word allowed)')
    .option('-s, --status <status>', 'New status: todo|in-progress|done', parseStatus)
    .action(async (id: number, words: string[], opts: { status?: TaskStatus }) => {
      const description = words.length ? words.join(' ') : undefined;
      reportUpdate(await service().update(id, { description, status: opts.status }));
    });

  program
    .command('delete')
    .description('Delete a task')
    .argument('<id>', 'Task id', parsePositiveInt)
    .action(async (id: number) => {
      const outcome = await service().delete(id);
      out.log(outcome.kind === 'deleted' ? `Task ${id} deleted.` : `Task ${id} not found.`);
    });

  program
    .command('list')
    .description('List tasks, optionally only those with a status')
    .argument('[status]', 'Filter: todo|in-progress|done', parseStatus)
    .option('--format <format>', 'Output format: pretty|json', parseFormat, 'pretty')
    .action(async (status: TaskStatus | undefined, opts: { format: OutputFormat }) => {
      const tasks = await service().list(status);
      if (opts.format === 'json') {
        out.log(JSON.stringify(tasks, null, 2));
        return;
      }
      if (!tasks.length) {
        out.log('No tasks found.');
        return;
      }
      for (const t of tasks) out.log(formatTask(t));
    });

  program
    .command('mark-in-progress')
    .description('Mark a task as in-progress')
    .argument('<id>', 'Task id', parsePositiveInt)
    .action(async (id: number) => {
      reportUpdate(await service().markInProgress(id));
    });

  program
    .command('mark-done')
    .description('Mark a task as done')
    .argument('<id>', 'Task id', parsePositiveInt)
    .action(async (id: number) => {
      reportUpdate(await service().markDone(id));
    });

  return program;
}
