import { Storage } from '@google-cloud/storage';
import { logger } from '../logger.js';
import type { ObjectStorage, StoredObject } from './objectStorage.js';

export class GoogleCloudStorage implements ObjectStorage {
  constructor(
    private readonly bucketName: string,
    private readonly client: Storage = new Storage()
  ) {}

  uri(objectPath: string): string {
    return `gs://${this.bucketName}/${objectPath}`;
  }

  async uploadFile(localPath: string, objectPath: string): Promise<StoredObject> {
    await this.client.bucket(this.bucketName).upload(localPath, { destination: objectPath });
    logger.info({ bucket: this.bucketName, objectPath }, 'Uploaded file to GCS');
    return { objectPath, uri: this.uri(objectPath) };
  }

  async downloadFile(objectPath: string, localPath: string): Promise<void> {
    await this.client.bucket(this.bucketName).file(objectPath).download({ destination: localPath });
    logger.debug({ bucket: this.bucketName, objectPath, localPath }, 'Downloaded file from GCS');
  }
}
