import { describe, expect, it, vi } from 'vitest';
import path from 'node:path';
import { mkdtemp, readFile } from 'node:fs/promises';
import os from 'node:os';
import { JsonStore } from '../src/store/jsonStore.js';
import { TaskService, formatTask } from '../src/tasks/taskService.js';

function clock(start = Date.parse('2026-03-01T10:00:00.000Z')) {
  let t = start;
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}

async function setup() {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'taskpulse-'));
  const file = path.join(dir, 'tasks.json');
  const store = new JsonStore(file);
  const service = new TaskService(store, { now: clock() });
  return { file, store, service };
}

describe('TaskService', () => {
  it('adds todo tasks with sequential ids and one timestamp per call', async () => {
    const { service, store } = await setup();

    const a = await service.add('write tests');
    const b = await service.add('ship it');

    expect(a).toEqual({
      id: 1,
      description: 'write tests',
      status: 'todo',
      created_at: '2026-03-01T10:00:00.000Z',
      updated_at: '2026-03-01T10:00:00.000Z',
    });
    expect(b.id).toBe(2);
    expect(b.created_at).toBe('2026-03-01T10:00:01.000Z');
    expect(await store.load()).toEqual([a, b]);
  });

  it('never reuses the id of a deleted task while a higher one exists', async () => {
    const { service } = await setup();
    await service.add('one');
    await service.add('two');
    await service.add('three');

    await service.delete(2);
    expect((await service.add('four')).id).toBe(4);

    await service.delete(4);
    await service.delete(3);
    // the max is now 1 again
    expect((await service.add('five')).id).toBe(2);
  });

  it('updates description and status and refreshes updated_at', async () => {
    const { service } = await setup();
    await service.add('draft');

    const outcome = await service.update(1, { description: 'final', status: 'in-progress' });

    expect(outcome).toEqual({
      kind: 'updated',
      task: {
        id: 1,
        description: 'final',
        status: 'in-progress',
        created_at: '2026-03-01T10:00:00.000Z',
        updated_at: '2026-03-01T10:00:01.000Z',
      },
    });
    expect((await service.list()).map((t) => t.description)).toEqual(['final']);
  });

  it('reports no changes and does not save when no field is given', async () => {
    const { service, store } = await setup();
    const added = await service.add('keep');
    const save = vi.spyOn(store, 'save');

    const outcome = await service.update(1, {});

    expect(outcome).toEqual({ kind: 'no-changes', task: added });
    expect(save).not.toHaveBeenCalled();
    expect(await service.list()).toEqual([added]);
  });

  it('treats an empty description as not provided', async () => {
    const { service } = await setup();
    await service.add('keep');
    expect((await service.update(1, { description: '' })).kind).toBe('no-changes');
  });

  it('reports an unknown id on update without saving', async () => {
    const { service, store } = await setup();
    await service.add('only');
    const save = vi.spyOn(store, 'save');

    expect(await service.update(9, { status: 'done' })).toEqual({ kind: 'not-found', id: 9 });
    expect(save).not.toHaveBeenCalled();
  });

  it('leaves the file byte-for-byte unchanged when deleting an unknown id', async () => {
    const { service, file } = await setup();
    await service.add('a');
    await service.add('b');
    const before = await readFile(file, 'utf8');

    expect(await service.delete(42)).toEqual({ kind: 'not-found', id: 42 });
    expect(await readFile(file, 'utf8')).toBe(before);
  });

  it('deletes a task', async () => {
    const { service } = await setup();
    await service.add('a');
    await service.add('b');

    const outcome = await service.delete(1);

    expect(outcome.kind).toBe('deleted');
    expect((await service.list()).map((t) => t.description)).toEqual(['b']);
  });

  it('lists exactly the tasks with a status, in insertion order', async () => {
    const { service } = await setup();
    for (const d of ['a', 'b', 'c', 'd', 'e']) await service.add(d);
    await service.markDone(4);
    await service.markInProgress(2);
    await service.markDone(1);

    expect((await service.list('done')).map((t) => t.id)).toEqual([1, 4]);
    expect((await service.list('in-progress')).map((t) => t.id)).toEqual([2]);
    expect((await service.list('todo')).map((t) => t.id)).toEqual([3, 5]);
    expect((await service.list()).map((t) => t.id)).toEqual([1, 2, 3, 4, 5]);
  });

  it('mark helpers are status updates', async () => {
    const { service } = await setup();
    await service.add('x');

    const r1 = await service.markInProgress(1);
    expect(r1.kind === 'updated' && r1.task.status).toBe('in-progress');
    const r2 = await service.markDone(1);
    expect(r2.kind === 'updated' && r2.task.status).toBe('done');
    expect(await service.markDone(2)).toEqual({ kind: 'not-found', id: 2 });
  });
});

describe('formatTask', () => {
  it('renders one line per task', () => {
    expect(
      formatTask({
        id: 3,
        description: 'water plants',
        status: 'in-progress',
        created_at: '2026-03-01T10:00:00.000Z',
        updated_at: '2026-03-02T08:30:00.000Z',
      }),
    ).toBe('3: water plants [in-progress] (Created: 2026-03-01T10:00:00.000Z, Updated: 2026-03-02T08:30:00.000Z)');
  });
});
