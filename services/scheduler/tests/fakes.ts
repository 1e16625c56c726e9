import { vi } from 'vitest';

import { CredentialResolver } from '../src/credentials.js';
import type { ContainerRequest, ImageHost, ImageUpload, PlatformPublisher, PublishContainerRequest } from '../src/integrations/types.js';
import { Repository } from '../src/repository.js';
import { MediaHostingAdapter, type ReadFile } from '../src/services/mediaHosting.js';
import { Publisher } from '../src/services/publisher.js';

export const NOW = new Date('2025-03-01T12:00:00.000Z');

export const minutesFrom = (base: Date, minutes: number): Date => new Date(base.getTime() + minutes * 60_000);

export const TEST_CREDENTIALS = { userId: 'ig-user-1', accessToken: 'test-token' };

export const createFakePlatformPublisher = () => ({
  platform: 'instagram' as const,
  createContainer: vi.fn<(request: ContainerRequest) => Promise<string>>().mockResolvedValue('container-1'),
  publishContainer: vi.fn<(request: PublishContainerRequest) => Promise<string>>().mockResolvedValue('media-1'),
}) satisfies PlatformPublisher;

export const createFakeImageHost = () => ({
  upload: vi
    .fn<(file: ImageUpload) => Promise<string>>()
    .mockImplementation(async (file) => `https://images.example.com/${file.filename}`),
}) satisfies ImageHost;

export const createFakeReadFile = (files: Record<string, string>) =>
  vi.fn<ReadFile>().mockImplementation(async (filePath) => {
    const content = files[filePath];
    if (content === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, open '${filePath}'`), { code: 'ENOENT' });
    }
    return Buffer.from(content);
  });

/**
 * In-memory pipeline with fakes behind the remote interfaces and a
 * zero-length processing wait.
 */
export const createPipeline = (
  options: {
    environment?: { userId?: string; accessToken?: string };
    publicBaseUrl?: string;
    files?: Record<string, string>;
  } = {}
) => {
  const repository = new Repository(':memory:');
  const credentials = new CredentialResolver(repository, options.environment ? { instagram: options.environment } : {});
  const imageHost = createFakeImageHost();
  const readFile = createFakeReadFile(options.files ?? {});
  const mediaHosting = new MediaHostingAdapter(
    imageHost,
    { publicBaseUrl: options.publicBaseUrl ?? 'http://localhost:8000', mediaRoot: '/srv/media' },
    readFile
  );
  const platformPublisher = createFakePlatformPublisher();
  const wait = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  const publisher = new Publisher(repository, credentials, mediaHosting, platformPublisher, {
    processingWaitMs: 60000,
    wait,
    now: () => NOW,
  });
  return { repository, credentials, imageHost, readFile, mediaHosting, platformPublisher, wait, publisher };
};
