import path from 'node:path';
import { DocumentSource } from '../ports/DocumentSource';
import { VideoDocument, videoDocumentSchema } from '../core/document';
import { listFiles, readJsonFile } from '../lib/json-file';

const SUMMARY_FILE = 'processed_videos_summary.json';

export class FileDocumentSource implements DocumentSource {
  constructor(private readonly root: string) {}

  async listVideoIds(channelName: string): Promise<string[]> {
    const files = await listFiles(path.join(this.root, channelName));
    return files
      .filter((file) => file.endsWith('.json') && file !== SUMMARY_FILE)
      .map((file) => file.slice(0, -'.json'.length));
  }

  async load(channelName: string, videoId: string): Promise<VideoDocument | undefined> {
    const filePath = path.join(this.root, channelName, `${videoId}.json`);
    const raw = await readJsonFile(filePath);
    if (raw === undefined) return undefined;

    const parsed = videoDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid processed document ${filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
