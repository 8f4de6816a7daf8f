import { Storage } from '@google-cloud/storage';

export interface GcsStorageService {
  upload(bucket: string, objectName: string, data: Buffer, contentType: string): Promise<void>;
}

/**
 * Google Cloud Storage client used to mirror the output directory.
 * Credentials come from ADC (Application Default Credentials).
 */
export function createGcsStorage(storage?: Storage): GcsStorageService {
  const client = storage ?? new Storage();

  return {
    async upload(bucket: string, objectName: string, data: Buffer, contentType: string): Promise<void> {
      await client.bucket(bucket).file(objectName).save(data, {
        contentType,
        resumable: false,
        metadata: { cacheControl: 'no-cache, max-age=0' },
      });
    },
  };
}
