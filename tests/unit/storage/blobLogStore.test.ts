import { describe, it, expect, vi } from 'vitest';

const mocks = vi.hoisted(() => {
  const upload = vi.fn(async () => ({}));
  const getBlockBlobClient = vi.fn(() => ({ upload }));
  const createIfNotExists = vi.fn(async () => ({ succeeded: true }));
  const exists = vi.fn(async () => true);
  const getContainerClient = vi.fn(() => ({
    containerName: 'ai-api-logs',
    getBlockBlobClient,
    createIfNotExists,
    exists
  }));
  const fromConnectionString = vi.fn(() => ({ getContainerClient }));
  return { upload, getBlockBlobClient, createIfNotExists, exists, getContainerClient, fromConnectionString };
});

vi.mock('@azure/storage-blob', () => ({
  BlobServiceClient: { fromConnectionString: mocks.fromConnectionString }
}));

import { BlobLogStore, describeStorageError } from '../../../src/services/storage/blobLogStore';

describe('BlobLogStore', () => {
  it('opens the configured container from the connection string', () => {
    new BlobLogStore('UseDevelopmentStorage=true', 'ai-api-logs');

    expect(mocks.fromConnectionString).toHaveBeenCalledWith('UseDevelopmentStorage=true');
    expect(mocks.getContainerClient).toHaveBeenCalledWith('ai-api-logs');
  });

  it('uploads documents as JSON block blobs', async () => {
    const store = new BlobLogStore('UseDevelopmentStorage=true', 'ai-api-logs');

    await store.put('logs/20240305/abc.json', '{"a":1}');

    expect(mocks.getBlockBlobClient).toHaveBeenCalledWith('logs/20240305/abc.json');
    expect(mocks.upload).toHaveBeenCalledWith('{"a":1}', 7, {
      blobHTTPHeaders: { blobContentType: 'application/json' }
    });
  });

  it('propagates upload failures to the caller', async () => {
    mocks.upload.mockRejectedValueOnce(new Error('quota exceeded'));
    const store = new BlobLogStore('UseDevelopmentStorage=true', 'ai-api-logs');

    await expect(store.put('logs/20240305/abc.json', '{}')).rejects.toThrow('quota exceeded');
  });

  it('creates the container and tolerates failures doing so', async () => {
    const store = new BlobLogStore('UseDevelopmentStorage=true', 'ai-api-logs');

    await store.ensureContainer();
    expect(mocks.createIfNotExists).toHaveBeenCalledTimes(1);

    mocks.createIfNotExists.mockRejectedValueOnce(new Error('unreachable'));
    await expect(store.ensureContainer()).resolves.toBeUndefined();
  });

  it('reports reachability through container existence', async () => {
    const store = new BlobLogStore('UseDevelopmentStorage=true', 'ai-api-logs');

    await expect(store.ping()).resolves.toBe(true);
    mocks.exists.mockResolvedValueOnce(false);
    await expect(store.ping()).resolves.toBe(false);
  });
});

describe('describeStorageError', () => {
  it('keeps message, status and code only', () => {
    const err = Object.assign(new Error('forbidden'), {
      statusCode: 403,
      code: 'AuthorizationFailure',
      request: { headers: { authorization: 'SharedKey test-account:test-signature' } }
    });

    expect(describeStorageError(err)).toEqual({ message: 'forbidden', statusCode: 403, code: 'AuthorizationFailure' });
  });

  it('stringifies non-errors', () => {
    expect(describeStorageError('offline')).toEqual({ message: 'offline' });
  });
});
