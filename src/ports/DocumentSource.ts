import { VideoDocument } from '../core/document';

export interface DocumentSource {
  listVideoIds(channelName: string): Promise<string[]>;
  load(channelName: string, videoId: string): Promise<VideoDocument | undefined>;
}
