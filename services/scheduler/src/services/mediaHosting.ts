import { readFile as readFileFromDisk } from 'node:fs/promises';
import path from 'node:path';

import { HostingError, PublishError } from '../errors.js';
import type { ImageHost } from '../integrations/types.js';
import { logger } from '../logger.js';
import type { Asset } from '../types.js';

export type ReadFile = (filePath: string) => Promise<Buffer>;

export interface MediaHostingOptions {
  /** Origin this service serves media from; a public HTTPS tunnel is used as-is. */
  publicBaseUrl: string;
  /** Directory URL paths of locally served media resolve under. */
  mediaRoot: string;
}

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

const isPrivateIpv4 = (host: string): boolean => {
  const match = IPV4_PATTERN.exec(host);
  if (!match) {
    return false;
  }
  const [a, b] = [Number(match[1]), Number(match[2])];
  return (
    a === 0 ||
    a === 10 ||
    a === 127 ||
    (a === 169 && b === 254) ||
    (a === 172 && b >= 16 && b <= 31) ||
    (a === 192 && b === 168)
  );
};

const isPrivateIpv6 = (host: string): boolean => {
  if (!host.includes(':')) {
    return false;
  }
  return host === '::1' || host === '::' || /^f[cd][0-9a-f]{0,2}:/.test(host) || /^fe[89ab][0-9a-f]?:/.test(host);
};

/** Loopback, private-range and link-local hosts, which remote platforms cannot fetch from. */
export const isPrivateHost = (hostname: string): boolean => {
  const host = hostname.toLowerCase().replace(/^\[|\]$/g, '');
  if (host === 'localhost' || host.endsWith('.localhost')) {
    return true;
  }
  return isPrivateIpv4(host) || isPrivateIpv6(host);
};

const parseUrl = (ref: string): URL | undefined => {
  try {
    return new URL(ref);
  } catch {
    return undefined;
  }
};

/** Pattern check only: HTTPS on a host outside the private ranges. */
export const isPubliclyReachable = (ref: string): boolean => {
  const url = parseUrl(ref);
  return url !== undefined && url.protocol === 'https:' && !isPrivateHost(url.hostname);
};

const trimTrailingSlash = (value: string): string => value.replace(/\/+$/, '');

/**
 * Makes media fetchable by remote platforms. Locally served files are either
 * reached through the configured public tunnel or uploaded to the image host.
 */
export class MediaHostingAdapter {
  private readonly mediaRoot: string;

  constructor(
    private readonly imageHost: ImageHost,
    private readonly options: MediaHostingOptions,
    private readonly readFile: ReadFile = readFileFromDisk
  ) {
    this.mediaRoot = path.resolve(options.mediaRoot);
  }

  resolveAssetUrl(asset: Pick<Asset, 'id' | 'filePath'>): string {
    if (/^https?:\/\//i.test(asset.filePath)) {
      return asset.filePath;
    }
    const relative = asset.filePath.replace(/\\/g, '/').replace(/^\/+/, '');
    return `${trimTrailingSlash(this.options.publicBaseUrl)}/${encodeURI(relative)}`;
  }

  async ensurePublic(ref: string): Promise<string> {
    if (isPubliclyReachable(ref)) {
      return ref;
    }

    const url = parseUrl(ref);
    if (url && isPrivateHost(url.hostname) && isPubliclyReachable(this.options.publicBaseUrl)) {
      const rewritten = `${trimTrailingSlash(this.options.publicBaseUrl)}${url.pathname}${url.search}`;
      logger.info({ from: ref, to: rewritten }, 'Rewrote local media URL to public base URL');
      return rewritten;
    }
    if (url && !isPrivateHost(url.hostname)) {
      // Remote URLs are not served from the media root.
      logger.warn({ ref }, 'Media URL is not HTTPS; passing it through unchanged');
      return ref;
    }

    try {
      return await this.upload(url ? url.pathname : ref);
    } catch (error) {
      if (error instanceof PublishError) {
        throw error;
      }
      throw new HostingError(
        `Failed to host media ${ref}: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error }
      );
    }
  }

  private async upload(urlPath: string): Promise<string> {
    const filePath = this.resolveLocalPath(urlPath);

    let data: Buffer;
    try {
      data = await this.readFile(filePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new HostingError(`Media file not found: ${urlPath}`, undefined, { cause: error });
      }
      throw error;
    }

    const hostedUrl = await this.imageHost.upload({ data, filename: path.basename(filePath) });
    logger.info({ filePath, hostedUrl }, 'Uploaded local media to image host');
    return hostedUrl;
  }

  private resolveLocalPath(urlPath: string): string {
    let decoded: string;
    try {
      decoded = decodeURIComponent(urlPath);
    } catch (error) {
      throw new HostingError(`Invalid media path: ${urlPath}`, undefined, { cause: error });
    }
    const resolved = path.resolve(this.mediaRoot, `.${path.posix.sep}${decoded.replace(/^\/+/, '')}`);
    const root = this.mediaRoot.endsWith(path.sep) ? this.mediaRoot : this.mediaRoot + path.sep;
    if (!resolved.startsWith(root)) {
      throw new HostingError(`Media path escapes the media root: ${urlPath}`);
    }
    return resolved;
  }
}
