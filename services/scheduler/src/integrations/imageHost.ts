import axios, { type AxiosInstance } from 'axios';
import FormData from 'form-data';
import { z } from 'zod';

import { HostingError, TimeoutError } from '../errors.js';
import { logger } from '../logger.js';
import type { ImageHost, ImageUpload } from './types.js';

const uploadResponseSchema = z.object({
  status_code: z.number().optional(),
  image: z.object({ url: z.string().optional() }).partial().optional(),
  error: z.union([z.object({ message: z.string().optional() }).passthrough(), z.string()]).optional(),
  status_txt: z.string().optional(),
});

type UploadResponse = z.infer<typeof uploadResponseSchema>;

const upstreamMessage = (body: UploadResponse | undefined): string | undefined => {
  if (!body) {
    return undefined;
  }
  if (typeof body.error === 'string') {
    return body.error;
  }
  return body.error?.message ?? body.status_txt;
};

/**
 * Freeimage.host uploader. Failures surface as HostingError and are never
 * retried here.
 */
export class FreeimageHost implements ImageHost {
  private readonly client: AxiosInstance;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly options: { uploadUrl?: string; timeout?: number } = {}
  ) {
    this.client = axios.create({
      timeout: options.timeout ?? 30000,
      headers: { 'User-Agent': 'VelvetQueue/1.0' },
    });
  }

  async upload(file: ImageUpload): Promise<string> {
    if (!this.apiKey) {
      throw new HostingError('Image hosting is not configured: FREEIMAGE_API_KEY is missing');
    }

    const uploadUrl = this.options.uploadUrl ?? 'https://freeimage.host/api/1/upload';
    const form = new FormData();
    form.append('source', file.data, { filename: file.filename });
    form.append('key', this.apiKey);
    form.append('format', 'json');

    logger.info({ filename: file.filename, bytes: file.data.length }, 'Uploading image to hosting service');

    let body: unknown;
    try {
      const response = await this.client.post<unknown>(uploadUrl, form, { headers: form.getHeaders() });
      body = response.data;
    } catch (error) {
      throw this.toHostingError(error);
    }

    const parsed = uploadResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new HostingError('Image host returned an unreadable response');
    }
    const url = parsed.data.image?.url;
    if (parsed.data.status_code !== 200 || !url) {
      const message = upstreamMessage(parsed.data) ?? 'Hosting service did not return a URL';
      throw new HostingError(`Failed to upload image: ${message}`, parsed.data.status_code);
    }
    if (!url.startsWith('https://')) {
      throw new HostingError(`Image host returned a non-HTTPS URL: ${url}`);
    }

    logger.info({ url }, 'Image uploaded to hosting service');
    return url;
  }

  private toHostingError(error: unknown): HostingError | TimeoutError {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new TimeoutError('Image upload timed out', { cause: error });
      }
      if (error.response) {
        const parsed = uploadResponseSchema.safeParse(error.response.data);
        const message = (parsed.success ? upstreamMessage(parsed.data) : undefined) ?? error.message;
        return new HostingError(`Failed to upload image: ${message}`, error.response.status, { cause: error });
      }
      return new HostingError(`Network error while uploading image: ${error.message}`, undefined, { cause: error });
    }
    return new HostingError(`Failed to upload image: ${error instanceof Error ? error.message : String(error)}`, undefined, {
      cause: error,
    });
  }
}
