import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import nock from 'nock';

import { HostingError } from '../errors.js';
import { FreeimageHost } from './imageHost.js';

const HOST = 'https://freeimage.host';
const image = { data: Buffer.from('jpeg-bytes'), filename: 'a.jpg' };

describe('FreeimageHost', () => {
  const host = new FreeimageHost('test-secret', { timeout: 1000 });

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('uploads the image as multipart and returns the hosted URL', async () => {
    const scope = nock(HOST)
      .post(
        '/api/1/upload',
        (body: string) =>
          body.includes('name="source"; filename="a.jpg"') &&
          body.includes('jpeg-bytes') &&
          body.includes('test-secret') &&
          body.includes('name="format"')
      )
      .reply(200, { status_code: 200, image: { url: 'https://iili.io/a.jpg' } });

    await expect(host.upload(image)).resolves.toBe('https://iili.io/a.jpg');
    expect(scope.isDone()).toBe(true);
  });

  it('rejects answers without a URL', async () => {
    nock(HOST).post('/api/1/upload').reply(200, { status_code: 400, error: { message: 'Invalid API key' } });

    const error = await host.upload(image).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(HostingError);
    expect(error).toMatchObject({ message: 'Failed to upload image: Invalid API key', status: 400 });
  });

  it('carries the upstream status of HTTP failures', async () => {
    nock(HOST).post('/api/1/upload').reply(500, { status_code: 500, error: { message: 'Server busy' } });

    await expect(host.upload(image)).rejects.toMatchObject({
      message: 'Failed to upload image: Server busy',
      status: 500,
    });
  });

  it('rejects non-HTTPS URLs', async () => {
    nock(HOST).post('/api/1/upload').reply(200, { status_code: 200, image: { url: 'http://iili.io/a.jpg' } });

    await expect(host.upload(image)).rejects.toThrow('Image host returned a non-HTTPS URL: http://iili.io/a.jpg');
  });

  it('requires an API key', async () => {
    await expect(new FreeimageHost(undefined).upload(image)).rejects.toThrow(
      'Image hosting is not configured: FREEIMAGE_API_KEY is missing'
    );
  });
});
