import { Answer } from '../core/answer';

export interface HistoryEntry {
  channelName: string;
  query: string;
  response: Answer;
  timestamp: string;
}

export interface HistoryStore {
  append(entry: HistoryEntry): Promise<string>;
}
