import { Router } from 'express';
import { z } from 'zod';

import { ValidationError } from '../errors.js';
import { logger } from '../logger.js';
import type { Repository } from '../repository.js';
import type { Publisher } from '../services/publisher.js';
import { POST_STATUSES, type PostStatus } from '../types.js';
import { sendError } from './errors.js';

const isoDateTime = z.string().datetime({ offset: true, message: 'Expected an ISO 8601 date-time' });

const CreatePostSchema = z.object({
  content: z.string().default(''),
  mediaAssets: z.array(z.string().min(1)).default([]),
  channels: z.array(z.string().min(1)).default([]),
  platformSettings: z.record(z.unknown()).default({}),
  status: z.enum(['draft', 'scheduled']).default('draft'),
  scheduledTime: isoDateTime.optional(),
});

const UpdatePostSchema = z.object({
  content: z.string().optional(),
  mediaAssets: z.array(z.string().min(1)).optional(),
  channels: z.array(z.string().min(1)).optional(),
  platformSettings: z.record(z.unknown()).optional(),
  scheduledTime: isoDateTime.nullable().optional(),
});

const ScheduleSchema = z.object({
  scheduledTime: isoDateTime,
});

const StatusFilterSchema = z.union([z.literal('all'), z.enum(POST_STATUSES)]);

const ListQuerySchema = z.object({
  status: StatusFilterSchema.optional(),
});

const CalendarQuerySchema = z.object({
  start: isoDateTime,
  end: isoDateTime,
  status: StatusFilterSchema.default('all'),
});

/** `all` on the calendar means what is planned or already out. */
const CALENDAR_ALL: readonly PostStatus[] = ['scheduled', 'published'];

interface PostRoutesContext {
  repository: Repository;
  publisher: Pick<Publisher, 'publish'>;
  now?: () => Date;
}

export function createPostRoutes(context: PostRoutesContext): Router {
  const router = Router();
  const { repository, publisher } = context;
  const now = context.now ?? (() => new Date());

  router.post('/', (req, res) => {
    try {
      const body = CreatePostSchema.parse(req.body);
      const post = repository.createPost(
        {
          content: body.content,
          mediaAssets: body.mediaAssets,
          channels: body.channels,
          platformSettings: body.platformSettings,
          status: body.status,
          scheduledTime: body.scheduledTime ? new Date(body.scheduledTime) : null,
        },
        now()
      );
      logger.info({ postId: post.id, status: post.status }, 'Post created');
      res.status(201).json(post);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/', (req, res) => {
    try {
      const { status } = ListQuerySchema.parse(req.query);
      const posts = repository.listPosts(status === 'all' ? undefined : status);
      res.json({ posts, count: posts.length });
    } catch (error) {
      sendError(res, error);
    }
  });

  // Registered before '/:id' so "calendar" is not read as a post id.
  router.get('/calendar', (req, res) => {
    try {
      const query = CalendarQuerySchema.parse(req.query);
      const start = new Date(query.start);
      const end = new Date(query.end);
      if (start.getTime() > end.getTime()) {
        throw new ValidationError('start must not be after end');
      }
      const statuses = query.status === 'all' ? CALENDAR_ALL : [query.status];
      const posts = repository.listPostsInRange(start, end, statuses);
      res.json({ posts, count: posts.length });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/:id', (req, res) => {
    const post = repository.getPostById(req.params.id);
    if (!post) {
      res.status(404).json({ error: 'NOT_FOUND', message: `Post ${req.params.id} not found` });
      return;
    }
    res.json(post);
  });

  router.put('/:id', (req, res) => {
    try {
      const body = UpdatePostSchema.parse(req.body);
      const post = repository.updateDraft(
        req.params.id,
        {
          content: body.content,
          mediaAssets: body.mediaAssets,
          channels: body.channels,
          platformSettings: body.platformSettings,
          scheduledTime:
            body.scheduledTime === undefined ? undefined : body.scheduledTime === null ? null : new Date(body.scheduledTime),
        },
        now()
      );
      res.json(post);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/publish', async (req, res) => {
    try {
      const outcome = await publisher.publish(req.params.id);
      res.json({ ...outcome, post: repository.getPostById(req.params.id) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/:id/schedule', (req, res) => {
    try {
      const { scheduledTime } = ScheduleSchema.parse(req.body);
      const post = repository.schedulePost(req.params.id, new Date(scheduledTime), now());
      logger.info({ postId: post.id, scheduledTime }, 'Post scheduled');
      res.json(post);
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
