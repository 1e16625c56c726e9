import { Router } from 'express';
import { z } from 'zod';

import { DEFAULT_CHANNEL_NAME, sanitizeCredential } from '../credentials.js';
import { ValidationError } from '../errors.js';
import { logger } from '../logger.js';
import type { Repository } from '../repository.js';
import { PLATFORMS, type Channel } from '../types.js';
import { sendError } from './errors.js';

const ConnectChannelSchema = z.object({
  platform: z.enum(PLATFORMS),
  name: z.string().trim().min(1).default(DEFAULT_CHANNEL_NAME),
  userId: z.string(),
  accessToken: z.string(),
});

/** Channel as exposed over HTTP; credentials never leave the service. */
export const toPublicChannel = (channel: Channel) => ({
  id: channel.id,
  platform: channel.platform,
  name: channel.name,
  isActive: channel.isActive,
  createdAt: channel.createdAt,
  updatedAt: channel.updatedAt,
});

export function createChannelRoutes(context: { repository: Repository }): Router {
  const router = Router();
  const { repository } = context;

  router.get('/', (_req, res) => {
    const channels = repository.listChannels().map(toPublicChannel);
    res.json({ channels, count: channels.length });
  });

  router.post('/connect', (req, res) => {
    try {
      const body = ConnectChannelSchema.parse(req.body);
      const credentials = {
        userId: sanitizeCredential(body.userId),
        accessToken: sanitizeCredential(body.accessToken),
      };
      if (!credentials.userId || !credentials.accessToken) {
        throw new ValidationError('userId and accessToken are required');
      }
      const channel = repository.upsertChannel({ platform: body.platform, name: body.name, credentials });
      logger.info({ channelId: channel.id, platform: channel.platform }, 'Channel connected');
      res.status(201).json(toPublicChannel(channel));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
