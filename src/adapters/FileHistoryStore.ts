import path from 'node:path';
import { HistoryEntry, HistoryStore } from '../ports/HistoryStore';
import { createJsonFile } from '../lib/json-file';

const pad = (value: number) => String(value).padStart(2, '0');

/** `20261019_142501`, in local time. */
export function historyStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class FileHistoryStore implements HistoryStore {
  constructor(private readonly root: string) {}

  // Other processes may write in the same second, so the suffix moves on until a name is free.
  async append(entry: HistoryEntry): Promise<string> {
    const stamp = historyStamp(new Date(entry.timestamp));
    for (let sequence = 1; ; sequence++) {
      const filePath = path.join(this.root, entry.channelName, `query_${stamp}_${sequence}.json`);
      if (await createJsonFile(filePath, entry)) return filePath;
    }
  }
}
