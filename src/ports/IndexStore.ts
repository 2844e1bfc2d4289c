import { IndexSnapshot } from '../core/vector-index';

export interface IndexStore {
  /** Replaces the channel's published index. Readers see the old snapshot or the new one, never a mix. */
  save(snapshot: IndexSnapshot): Promise<void>;
  load(channelName: string): Promise<IndexSnapshot | undefined>;
  close(): Promise<void>;
}
