import { Storage } from "@google-cloud/storage";
import { config, parseServiceAccount } from "./config";

export interface BlobStore {
  /** Stores the object and returns its public URL. */
  put(objectName: string, data: Buffer, contentType: string): Promise<string>;
  publicUrl(objectName: string): string;
}

function buildStorage(): Storage {
  const { projectId, keyFilename, serviceAccountJson } = config.firestore;
  if (serviceAccountJson) return new Storage({ projectId, credentials: parseServiceAccount(serviceAccountJson) });
  if (keyFilename) return new Storage({ projectId, keyFilename });
  return new Storage({ projectId });
}

export class GcsBlobStore implements BlobStore {
  constructor(
    private readonly storage: Storage,
    private readonly bucket: string
  ) {}

  publicUrl(objectName: string): string {
    return `https://storage.googleapis.com/${this.bucket}/${encodeURI(objectName)}`;
  }

  async put(objectName: string, data: Buffer, contentType: string): Promise<string> {
    await this.storage.bucket(this.bucket).file(objectName).save(data, { contentType, resumable: false });
    return this.publicUrl(objectName);
  }
}

export class MemoryBlobStore implements BlobStore {
  readonly objects = new Map<string, { data: Buffer; contentType: string }>();

  constructor(private readonly bucket = "memory") {}

  publicUrl(objectName: string): string {
    return `https://storage.googleapis.com/${this.bucket}/${encodeURI(objectName)}`;
  }

  async put(objectName: string, data: Buffer, contentType: string): Promise<string> {
    this.objects.set(objectName, { data, contentType });
    return this.publicUrl(objectName);
  }
}

let blobInstance: BlobStore | null = null;

export function getBlobStore(): BlobStore {
  if (blobInstance) return blobInstance;
  if (config.firestore.forceMock) {
    // eslint-disable-next-line no-console
    console.warn("[storage] Using in-memory blob store (FORCE_FIRESTORE_MOCK=1)");
    blobInstance = new MemoryBlobStore(config.bucketName);
  } else {
    blobInstance = new GcsBlobStore(buildStorage(), config.bucketName);
  }
  return blobInstance;
}

export function setBlobStore(store: BlobStore | null): void {
  blobInstance = store;
}
