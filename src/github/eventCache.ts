import type { EventsBody } from '../model.js';
import { StoreError, readJsonFile, writeJsonFile } from '../store/jsonFile.js';

/** Raw events from the last successful fetch. Each save overwrites the file. */
export class EventCache {
  constructor(private filePath: string) {}

  getPath() {
    return this.filePath;
  }

  /** `undefined` when nothing has been cached yet. */
  async load(): Promise<EventsBody | undefined> {
    const data = await readJsonFile(this.filePath);
    if (data === undefined) return undefined;
    if (!isEventsBody(data)) throw new StoreError(`${this.filePath} does not hold cached events`, this.filePath);
    return data;
  }

  async save(events: EventsBody): Promise<void> {
    await writeJsonFile(this.filePath, events);
  }
}

// anything JSON.parse can produce
function isEventsBody(v: unknown): v is EventsBody {
  return v === null || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean' || typeof v === 'object';
}
