export interface StoredObject {
  objectPath: string;
  uri: string;
}

export interface ObjectStorage {
  uploadFile(localPath: string, objectPath: string): Promise<StoredObject>;
  downloadFile(objectPath: string, localPath: string): Promise<void>;
  uri(objectPath: string): string;
}

