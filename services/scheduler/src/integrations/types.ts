import type { Platform } from '../types.js';

export interface ContainerRequest {
  userId: string;
  accessToken: string;
  /** Publicly fetchable HTTPS media URLs, in post order. */
  mediaUrls: string[];
  caption: string;
}

export interface PublishContainerRequest {
  userId: string;
  accessToken: string;
  containerId: string;
}

/**
 * Remote delivery for one platform: a staging container is created from the
 * media and caption, then published once the platform has ingested it.
 */
export interface PlatformPublisher {
  readonly platform: Platform;
  createContainer(request: ContainerRequest): Promise<string>;
  publishContainer(request: PublishContainerRequest): Promise<string>;
}

export interface ImageUpload {
  data: Buffer;
  filename: string;
}

export interface ImageHost {
  /** Uploads the image and returns its public HTTPS URL. */
  upload(file: ImageUpload): Promise<string>;
}
