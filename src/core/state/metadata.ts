import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { MetadataMap, SourceSnapshot, VideoMetadata, VideoProbe } from '../../types/index.js';
import { isNotFound } from '../pipeline/layout.js';

/**
 * Video metadata of one dated run, kept as JSON beside the downloads so that
 * a later merge-only run can recover titles without re-probing.
 */
export class MetadataStore {
  private metadataPath: string;
  private metadata: MetadataMap = {};

  constructor(metadataPath: string) {
    this.metadataPath = metadataPath;
  }

  async load(): Promise<MetadataMap> {
    let content: string;
    try {
      content = await readFile(this.metadataPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.metadata = {};
        return this.metadata;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    this.metadata = parseMetadataMap(parsed);
    return this.metadata;
  }

  async save(): Promise<void> {
    await mkdir(dirname(this.metadataPath), { recursive: true });
    await writeFile(this.metadataPath, JSON.stringify(this.metadata, null, 2));
  }

  async record(probe: VideoProbe): Promise<void> {
    this.metadata[probe.id] = {
      title: probe.title,
      url: probe.url,
      duration: probe.duration,
      uploader: probe.uploader,
    };
    await this.save();
  }

  get(videoId: string): VideoMetadata | null {
    return this.metadata[videoId] ?? null;
  }

  getAll(): MetadataMap {
    return this.metadata;
  }

  size(): number {
    return Object.keys(this.metadata).length;
  }
}

export async function writeSourceSnapshot(path: string, snapshot: SourceSnapshot): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(snapshot, null, 2));
}

function parseMetadataMap(value: unknown): MetadataMap {
  if (!isRecord(value)) return {};

  const result: MetadataMap = {};
  for (const [id, record] of Object.entries(value)) {
    if (!isRecord(record)) continue;
    result[id] = {
      title: typeof record.title === 'string' ? record.title : id,
      url: typeof record.url === 'string' ? record.url : '',
      duration: typeof record.duration === 'number' ? record.duration : null,
      uploader: typeof record.uploader === 'string' ? record.uploader : '',
    };
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
