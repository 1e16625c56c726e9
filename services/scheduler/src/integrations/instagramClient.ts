import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

import { PublishError, RemoteApiError, TimeoutError } from '../errors.js';
import { logger } from '../logger.js';
import type { ContainerRequest, PlatformPublisher, PublishContainerRequest } from './types.js';

/** Graph API error code for an invalid or expired access token. */
export const TOKEN_EXPIRED_CODE = 190;

export const MAX_CAROUSEL_ITEMS = 10;

const idResponseSchema = z.object({ id: z.string().min(1) });

const graphErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.number().optional(),
    type: z.string().optional(),
  }),
});

/**
 * Maps a failed Graph API call onto the publish error taxonomy. Expired
 * sessions are reported separately so callers can ask for a new token.
 */
export const classifyGraphError = (error: unknown, operation: string): PublishError => {
  if (error instanceof PublishError) {
    return error;
  }
  if (!axios.isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new RemoteApiError(`Instagram API error while ${operation}: ${message}`, 'other', {}, { cause: error });
  }
  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new TimeoutError(`Instagram API timed out while ${operation}`, { cause: error });
  }
  if (!error.response) {
    return new RemoteApiError(`Instagram API request failed while ${operation}: ${error.message}`, 'other', {}, { cause: error });
  }

  const status = error.response.status;
  const parsed = graphErrorSchema.safeParse(error.response.data);
  const message = (parsed.success ? parsed.data.error.message : undefined) ?? error.message;
  const code = parsed.success ? parsed.data.error.code : undefined;
  const type = parsed.success ? parsed.data.error.type : undefined;

  if (code === TOKEN_EXPIRED_CODE || /expired/i.test(message)) {
    return new RemoteApiError(
      `Instagram access token has expired. ${message}. Update INSTAGRAM_ACCESS_TOKEN or reconnect the Instagram channel.`,
      'token_expired',
      { status, code, type },
      { cause: error }
    );
  }
  return new RemoteApiError(
    `Instagram API error: ${message} (Code: ${code ?? 'n/a'}, Type: ${type ?? 'n/a'})`,
    'other',
    { status, code, type },
    { cause: error }
  );
};

/**
 * Instagram Graph API content publishing: media containers are created from
 * public image URLs, then published with `media_publish`.
 */
export class InstagramGraphClient implements PlatformPublisher {
  readonly platform = 'instagram' as const;
  private readonly client: AxiosInstance;

  constructor(
    options: {
      baseURL?: string;
      apiVersion?: string;
      timeout?: number;
    } = {}
  ) {
    const baseURL = (options.baseURL ?? 'https://graph.facebook.com').replace(/\/+$/, '');
    this.client = axios.create({
      baseURL: `${baseURL}/${options.apiVersion ?? 'v21.0'}`,
      timeout: options.timeout ?? 30000,
      headers: { 'Content-Type': 'application/json' },
    });

    this.client.interceptors.request.use((config) => {
      logger.debug({ method: config.method?.toUpperCase(), url: config.url }, 'Instagram API request');
      return config;
    });
  }

  async createContainer(request: ContainerRequest): Promise<string> {
    const { userId, accessToken, mediaUrls, caption } = request;
    if (mediaUrls.length > MAX_CAROUSEL_ITEMS) {
      throw new RemoteApiError(`Instagram carousels accept at most ${MAX_CAROUSEL_ITEMS} images`, 'other');
    }

    // Posts without media go out caption-only.
    if (mediaUrls.length <= 1) {
      const containerId = await this.postForId(
        `/${userId}/media`,
        { image_url: mediaUrls[0], caption: caption || undefined, access_token: accessToken },
        'creating media container'
      );
      logger.info({ containerId }, 'Instagram media container created');
      return containerId;
    }

    const children: string[] = [];
    for (const imageUrl of mediaUrls) {
      children.push(
        await this.postForId(
          `/${userId}/media`,
          { image_url: imageUrl, is_carousel_item: true, access_token: accessToken },
          'creating carousel item'
        )
      );
    }
    const containerId = await this.postForId(
      `/${userId}/media`,
      { media_type: 'CAROUSEL', children: children.join(','), caption: caption || undefined, access_token: accessToken },
      'creating carousel container'
    );
    logger.info({ containerId, items: children.length }, 'Instagram carousel container created');
    return containerId;
  }

  async publishContainer(request: PublishContainerRequest): Promise<string> {
    const mediaId = await this.postForId(
      `/${request.userId}/media_publish`,
      { creation_id: request.containerId, access_token: request.accessToken },
      'publishing media container'
    );
    logger.info({ containerId: request.containerId, mediaId }, 'Instagram media container published');
    return mediaId;
  }

  private async postForId(url: string, body: Record<string, unknown>, operation: string): Promise<string> {
    let data: unknown;
    try {
      const response = await this.client.post<unknown>(url, body);
      data = response.data;
    } catch (error) {
      const classified = classifyGraphError(error, operation);
      logger.error({ operation, code: classified.code, message: classified.message }, 'Instagram API call failed');
      throw classified;
    }

    const parsed = idResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new RemoteApiError(`Instagram API returned no id while ${operation}: ${JSON.stringify(data)}`, 'other');
    }
    return parsed.data.id;
  }
}
