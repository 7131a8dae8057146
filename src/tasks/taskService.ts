import type { Task, TaskChanges, TaskStatus } from '../model.js';
import { createLogger, type Logger } from '../log.js';
import { nextTaskId, type JsonStore } from '../store/jsonStore.js';

export type UpdateOutcome =
  | { kind: 'updated'; task: Task }
  | { kind: 'no-changes'; task: Task }
  | { kind: 'not-found'; id: number };

export type DeleteOutcome = { kind: 'deleted'; task: Task } | { kind: 'not-found'; id: number };

export interface TaskServiceOptions {
  /** Source of timestamps; read once per operation. */
  now?: () => Date;
  logger?: Logger;
}

/**
 * Task operations. Each call is a full load → mutate → save cycle; nothing is
 * cached between calls.
 */
export class TaskService {
  private now: () => Date;
  private logger: Logger;

  constructor(
    private store: JsonStore,
    opts: TaskServiceOptions = {},
  ) {
    this.now = opts.now ?? (() => new Date());
    this.logger = opts.logger ?? createLogger('silent');
  }

  async add(description: string): Promise<Task> {
    const tasks = await this.store.load();
    const ts = this.now().toISOString();
    const task: Task = {
      id: nextTaskId(tasks),
      description,
      status: 'todo',
      created_at: ts,
      updated_at: ts,
    };
    tasks.push(task);
    await this.store.save(tasks);
    this.logger.debug(`added task ${task.id}`, { file: this.store.getPath() });
    return task;
  }

  async update(id: number, changes: TaskChanges = {}): Promise<UpdateOutcome> {
    const tasks = await this.store.load();
    const task = tasks.find((t) => t.id === id);
    if (!task) return { kind: 'not-found', id };

    let changed = false;
    if (changes.description) {
      task.description = changes.description;
      changed = true;
    }
    if (changes.status) {
      task.status = changes.status;
      changed = true;
    }
    if (!changed) return { kind: 'no-changes', task };

    task.updated_at = this.now().toISOString();
    await this.store.save(tasks);
    this.logger.debug(`updated task ${id}`, changes);
    return { kind: 'updated', task };
  }

  markInProgress(id: number): Promise<UpdateOutcome> {
    return this.update(id, { status: 'in-progress' });
  }

  markDone(id: number): Promise<UpdateOutcome> {
    return this.update(id, { status: 'done' });
  }

  async delete(id: number): Promise<DeleteOutcome> {
    const tasks = await this.store.load();
    const task = tasks.find((t) => t.id === id);
    if (!task) return { kind: 'not-found', id };

    await this.store.save(tasks.filter((t) => t.id !== id));
    this.logger.debug(`deleted task ${id}`);
    return { kind: 'deleted', task };
  }

  async list(status?: TaskStatus): Promise<Task[]> {
    const tasks = await this.store.load();
    if (!status) return tasks;
    return tasks.filter((t) => t.status === status);
  }
}

export function formatTask(task: Task): string {
  return `${task.id}: ${task.description} [${task.status}] (Created: ${task.created_at}, Updated: ${task.updated_at})`;
}
