import * as path from 'path';
import { atomicWriteFile, type GcsStorageService, type Logger } from '@cinefeed/shared';

export interface OutputMirror {
  storage: GcsStorageService;
  bucket: string;
}

const CONTENT_TYPES: Record<string, string> = {
  '.xml': 'application/rss+xml; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.html': 'text/html; charset=utf-8',
};

export function contentTypeFor(name: string): string {
  return CONTENT_TYPES[path.extname(name).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Writes published files into the output directory and, when a bucket is
 * configured, mirrors them to Cloud Storage.
 */
export class OutputWriter {
  constructor(
    readonly outDir: string,
    private readonly logger: Logger,
    private readonly mirror?: OutputMirror
  ) {}

  path(name: string): string {
    return path.join(this.outDir, name);
  }

  async write(name: string, contents: string): Promise<void> {
    await atomicWriteFile(this.path(name), contents);

    if (!this.mirror) return;
    const { storage, bucket } = this.mirror;
    try {
      await storage.upload(bucket, name, Buffer.from(contents, 'utf-8'), contentTypeFor(name));
      this.logger.debug({ bucket, name }, 'output_mirrored');
    } catch (error) {
      // The local copy is already in place
      this.logger.warn({ err: error, bucket, name }, 'output_mirror_failed');
    }
  }
}
