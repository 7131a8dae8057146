import { z } from 'zod';
import { TASK_STATUSES, type Task } from '../model.js';
import { StoreError, readJsonFile, writeJsonFile } from './jsonFile.js';

export const TaskSchema = z.object({
  id: z.number().int().positive(),
  description: z.string(),
  status: z.enum(TASK_STATUSES),
  created_at: z.string(),
  updated_at: z.string(),
});

const TaskFileSchema = z.array(TaskSchema);

/**
 * The task list persisted as one JSON array. Every load reads the whole file
 * and every save rewrites it.
 */
export class JsonStore {
  constructor(private filePath: string) {}

  getPath() {
    return this.filePath;
  }

  async load(): Promise<Task[]> {
    const data = await readJsonFile(this.filePath);
    if (data === undefined) return [];

    const parsed = TaskFileSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? ` at ${issue.path.join('.') || '(root)'}: ${issue.message}` : '';
      throw new StoreError(`${this.filePath} does not hold a task list${where}`, this.filePath, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async save(tasks: Task[]): Promise<void> {
    await writeJsonFile(this.filePath, tasks);
  }
}

export function nextTaskId(tasks: readonly Task[]): number {
  if (!tasks.length) return 1;
  return Math.max(...tasks.map((t) => t.id)) + 1;
}
