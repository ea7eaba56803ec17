import { BlobServiceClient, ContainerClient } from '@azure/storage-blob';
import logger from '../../utils/logger';
import type { LogStore } from './types';

const JSON_CONTENT_TYPE = 'application/json';

export class BlobLogStore implements LogStore {
  private readonly container: ContainerClient;

  constructor(connectionString: string, containerName: string) {
    this.container = BlobServiceClient.fromConnectionString(connectionString).getContainerClient(containerName);
  }

  /**
   * Creates the container when missing. Failures are logged; request logs
   * will then fail individually and be counted by the request logger.
   */
  async ensureContainer(): Promise<void> {
    try {
      const res = await this.container.createIfNotExists();
      if (res.succeeded) {
        logger.info({ container: this.container.containerName }, 'Created blob container');
      }
    } catch (err) {
      logger.error({ err: describeStorageError(err), container: this.container.containerName }, 'Failed to ensure blob container');
    }
  }

  async put(key: string, document: string): Promise<void> {
    await this.container.getBlockBlobClient(key).upload(document, Buffer.byteLength(document), {
      blobHTTPHeaders: { blobContentType: JSON_CONTENT_TYPE }
    });
  }

  async ping(): Promise<boolean> {
    return this.container.exists();
  }
}

/**
 * Storage SDK errors carry the request, including signed headers; keep the
 * status and message only.
 */
export function describeStorageError(err: unknown): { message: string; statusCode?: number; code?: string } {
  if (err instanceof Error) {
    const statusCode = 'statusCode' in err && typeof err.statusCode === 'number' ? err.statusCode : undefined;
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { message: err.message, statusCode, code };
  }
  return { message: String(err) };
}
