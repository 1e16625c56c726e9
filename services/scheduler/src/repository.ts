import { randomUUID } from 'node:crypto';
import Database from 'better-sqlite3';
import path from 'path';
import { z } from 'zod';

import { InvalidStateError, NotFoundError, ValidationError } from './errors.js';
import {
  isPlatform,
  isPostStatus,
  type Asset,
  type Channel,
  type ChannelCredentials,
  type Platform,
  type Post,
  type PostStatus,
} from './types.js';

interface PostRow {
  id: string;
  content: string;
  media_assets: string;
  channels: string;
  platform_settings: string;
  status: string;
  scheduled_time: string | null;
  last_error: string | null;
  remote_media_id: string | null;
  last_publish_attempt_at: string | null;
  created_at: string;
  updated_at: string;
}

interface ChannelRow {
  id: string;
  platform: string;
  name: string;
  credentials: string;
  is_active: number;
  created_at: string;
  updated_at: string;
}

interface AssetRow {
  id: string;
  file_path: string;
  prompt: string | null;
  created_at: string;
}

const stringListSchema = z.array(z.string());
const settingsSchema = z.record(z.unknown());
const credentialsSchema = z.object({
  userId: z.string().default(''),
  accessToken: z.string().default(''),
});

export interface CreatePostInput {
  content?: string;
  mediaAssets?: string[];
  channels: string[];
  platformSettings?: Record<string, unknown>;
  status?: Extract<PostStatus, 'draft' | 'scheduled'>;
  scheduledTime?: Date | null;
}

export type DraftUpdate = Partial<Pick<Post, 'content' | 'mediaAssets' | 'channels' | 'platformSettings' | 'scheduledTime'>>;

/** Statuses a new publish attempt may start from. */
export const CLAIMABLE_STATUSES: readonly PostStatus[] = ['draft', 'scheduled', 'failed'];

const UNPUBLISHED_STATUSES: readonly PostStatus[] = ['draft', 'scheduled', 'publishing', 'failed'];

/** Statuses a post may be (re)scheduled from. */
export const SCHEDULABLE_STATUSES: readonly PostStatus[] = ['draft', 'scheduled', 'failed'];

export class Repository {
  private readonly db: Database.Database;

  constructor(dbPath?: string) {
    const resolved = this.resolveDbPath(dbPath);
    this.db = new Database(resolved);
    this.db.pragma('journal_mode = WAL');
    this.initializeSchema();
  }

  close(): void {
    this.db.close();
  }

  // Posts

  createPost(input: CreatePostInput, now: Date = new Date()): Post {
    const status = input.status ?? 'draft';
    const scheduledTime = input.scheduledTime ?? null;
    if (status === 'scheduled') {
      this.assertFutureTime(scheduledTime, now);
    }

    const id = randomUUID();
    const timestamp = now.toISOString();
    this.db
      .prepare(
        'INSERT INTO posts (id, content, media_assets, channels, platform_settings, status, scheduled_time, created_at, updated_at) ' +
          'VALUES (@id, @content, @mediaAssets, @channels, @platformSettings, @status, @scheduledTime, @createdAt, @updatedAt)'
      )
      .run({
        id,
        content: input.content ?? '',
        mediaAssets: JSON.stringify(input.mediaAssets ?? []),
        channels: JSON.stringify(input.channels),
        platformSettings: JSON.stringify(input.platformSettings ?? {}),
        status,
        scheduledTime: scheduledTime ? scheduledTime.toISOString() : null,
        createdAt: timestamp,
        updatedAt: timestamp,
      });

    return this.requirePost(id);
  }

  getPostById(id: string): Post | undefined {
    const row = this.db.prepare<[string], PostRow>('SELECT * FROM posts WHERE id = ?').get(id);
    return row ? this.mapPost(row) : undefined;
  }

  listPosts(status?: PostStatus): Post[] {
    const rows = status
      ? this.db
          .prepare<{ status: string }, PostRow>(
            'SELECT * FROM posts WHERE status = @status ORDER BY scheduled_time ASC, created_at DESC'
          )
          .all({ status })
      : this.db.prepare<[], PostRow>('SELECT * FROM posts ORDER BY scheduled_time ASC, created_at DESC').all();
    return rows.map((row) => this.mapPost(row));
  }

  listPostsByStatus(status: PostStatus, limit = 50): Post[] {
    const rows = this.db
      .prepare<{ status: string; limit: number }, PostRow>(
        'SELECT * FROM posts WHERE status = @status ORDER BY scheduled_time ASC, id ASC LIMIT @limit'
      )
      .all({ status, limit });
    return rows.map((row) => this.mapPost(row));
  }

  /**
   * Calendar query. A post is placed on its scheduled time, or on its last
   * publish attempt when it was published without a schedule.
   */
  listPostsInRange(start: Date, end: Date, statuses: readonly PostStatus[]): Post[] {
    if (statuses.length === 0) {
      return [];
    }
    const params: Record<string, string> = { start: start.toISOString(), end: end.toISOString() };
    const placeholders = statuses.map((status, index) => {
      params[`status${index}`] = status;
      return `@status${index}`;
    });
    const rows = this.db
      .prepare<Record<string, string>, PostRow>(
        'SELECT * FROM posts WHERE status IN (' +
          placeholders.join(', ') +
          ') AND COALESCE(scheduled_time, last_publish_attempt_at) BETWEEN @start AND @end ' +
          'ORDER BY COALESCE(scheduled_time, last_publish_attempt_at) ASC, id ASC'
      )
      .all(params);
    return rows.map((row) => this.mapPost(row));
  }

  /** Applies user edits; only drafts are editable. */
  updateDraft(id: string, updates: DraftUpdate, now: Date = new Date()): Post {
    const setClauses: string[] = [];
    const params: Record<string, string | null> = { id, updatedAt: now.toISOString() };

    if (updates.content !== undefined) {
      setClauses.push('content = @content');
      params.content = updates.content;
    }
    if (updates.mediaAssets !== undefined) {
      setClauses.push('media_assets = @mediaAssets');
      params.mediaAssets = JSON.stringify(updates.mediaAssets);
    }
    if (updates.channels !== undefined) {
      setClauses.push('channels = @channels');
      params.channels = JSON.stringify(updates.channels);
    }
    if (updates.platformSettings !== undefined) {
      setClauses.push('platform_settings = @platformSettings');
      params.platformSettings = JSON.stringify(updates.platformSettings);
    }
    if (updates.scheduledTime !== undefined) {
      setClauses.push('scheduled_time = @scheduledTime');
      params.scheduledTime = updates.scheduledTime ? updates.scheduledTime.toISOString() : null;
    }

    if (setClauses.length === 0) {
      return this.requirePost(id);
    }

    setClauses.push('updated_at = @updatedAt');
    const result = this.db
      .prepare<Record<string, string | null>>(`UPDATE posts SET ${setClauses.join(', ')} WHERE id = @id AND status = 'draft'`)
      .run(params);

    if (result.changes === 0) {
      const current = this.requirePost(id);
      throw new InvalidStateError(`Post ${id} is ${current.status}; only drafts can be edited`);
    }
    return this.requirePost(id);
  }

  schedulePost(id: string, scheduledTime: Date, now: Date = new Date()): Post {
    this.assertFutureTime(scheduledTime, now);
    const changed = this.transitionFrom(id, SCHEDULABLE_STATUSES, {
      status: 'scheduled',
      scheduled_time: scheduledTime.toISOString(),
      last_error: null,
      updated_at: now.toISOString(),
    });
    if (!changed) {
      const current = this.requirePost(id);
      throw new InvalidStateError(`Post ${id} is ${current.status} and cannot be scheduled`);
    }
    return this.requirePost(id);
  }

  /**
   * Atomically moves a post into `publishing` when its current status is one
   * of `fromStatuses`. Returns the claimed post, or undefined when the claim
   * was lost.
   */
  claimForPublishing(id: string, fromStatuses: readonly PostStatus[] = CLAIMABLE_STATUSES, at: Date = new Date()): Post | undefined {
    const timestamp = at.toISOString();
    const changed = this.transitionFrom(id, fromStatuses, {
      status: 'publishing',
      last_error: null,
      last_publish_attempt_at: timestamp,
      updated_at: timestamp,
    });
    return changed ? this.getPostById(id) : undefined;
  }

  /** Claims due scheduled posts, oldest scheduled time first, ties by id. */
  claimDuePosts(now: Date, limit: number): Post[] {
    const claim = this.db.transaction((cutoff: string, max: number): Post[] => {
      const due = this.db
        .prepare<{ now: string; limit: number }, { id: string }>(
          "SELECT id FROM posts WHERE status = 'scheduled' AND scheduled_time IS NOT NULL AND scheduled_time <= @now " +
            'ORDER BY scheduled_time ASC, id ASC LIMIT @limit'
        )
        .all({ now: cutoff, limit: max });

      const claimed: Post[] = [];
      for (const { id } of due) {
        const post = this.claimForPublishing(id, ['scheduled'], now);
        if (post) {
          claimed.push(post);
        }
      }
      return claimed;
    });
    return claim.immediate(now.toISOString(), limit);
  }

  /**
   * Records a confirmed remote publication. It also applies when the attempt
   * was meanwhile failed as interrupted; only an already published post is
   * left alone.
   */
  markPublished(id: string, remoteMediaId: string, platformSettings: Record<string, unknown>, now: Date = new Date()): boolean {
    return this.transitionFrom(id, UNPUBLISHED_STATUSES, {
      status: 'published',
      remote_media_id: remoteMediaId,
      platform_settings: JSON.stringify(platformSettings),
      last_error: null,
      updated_at: now.toISOString(),
    });
  }

  /** Records a failed attempt. A post that reached `published` is left alone. */
  markFailed(id: string, error: string, now: Date = new Date()): boolean {
    return this.transitionFrom(id, ['publishing'], {
      status: 'failed',
      last_error: error.trim() || 'Unknown error',
      updated_at: now.toISOString(),
    });
  }

  /** Fails every post still held in `publishing`, e.g. after a restart. */
  failInterrupted(message: string, now: Date = new Date()): number {
    const result = this.db
      .prepare<{ error: string; updatedAt: string }>(
        "UPDATE posts SET status = 'failed', last_error = @error, updated_at = @updatedAt WHERE status = 'publishing'"
      )
      .run({ error: message, updatedAt: now.toISOString() });
    return result.changes;
  }

  // Channels

  listChannels(): Channel[] {
    const rows = this.db.prepare<[], ChannelRow>('SELECT * FROM channels ORDER BY created_at ASC, id ASC').all();
    return rows.map((row) => this.mapChannel(row));
  }

  getChannel(id: string): Channel | undefined {
    const row = this.db.prepare<[string], ChannelRow>('SELECT * FROM channels WHERE id = ?').get(id);
    return row ? this.mapChannel(row) : undefined;
  }

  findActiveChannel(platform: Platform): Channel | undefined {
    const row = this.db
      .prepare<[string], ChannelRow>(
        'SELECT * FROM channels WHERE platform = ? AND is_active = 1 ORDER BY created_at ASC, id ASC LIMIT 1'
      )
      .get(platform);
    return row ? this.mapChannel(row) : undefined;
  }

  /** Inserts or refreshes the channel identified by platform and name. */
  upsertChannel(input: { platform: Platform; name: string; credentials: ChannelCredentials }, now: Date = new Date()): Channel {
    const timestamp = now.toISOString();
    this.db
      .prepare(
        'INSERT INTO channels (id, platform, name, credentials, is_active, created_at, updated_at) ' +
          'VALUES (@id, @platform, @name, @credentials, 1, @timestamp, @timestamp) ' +
          'ON CONFLICT(platform, name) DO UPDATE SET credentials = excluded.credentials, is_active = 1, updated_at = excluded.updated_at'
      )
      .run({
        id: randomUUID(),
        platform: input.platform,
        name: input.name,
        credentials: JSON.stringify(input.credentials),
        timestamp,
      });

    const row = this.db
      .prepare<[string, string], ChannelRow>('SELECT * FROM channels WHERE platform = ? AND name = ?')
      .get(input.platform, input.name);
    if (!row) {
      throw new NotFoundError(`Channel ${input.platform}/${input.name} not found after upsert`);
    }
    return this.mapChannel(row);
  }

  setChannelActive(id: string, isActive: boolean, now: Date = new Date()): boolean {
    const result = this.db
      .prepare<{ id: string; isActive: number; updatedAt: string }>(
        'UPDATE channels SET is_active = @isActive, updated_at = @updatedAt WHERE id = @id'
      )
      .run({ id, isActive: isActive ? 1 : 0, updatedAt: now.toISOString() });
    return result.changes > 0;
  }

  // Assets

  createAsset(input: { filePath: string; prompt?: string | null }, now: Date = new Date()): Asset {
    const id = randomUUID();
    this.db
      .prepare('INSERT INTO assets (id, file_path, prompt, created_at) VALUES (@id, @filePath, @prompt, @createdAt)')
      .run({ id, filePath: input.filePath, prompt: input.prompt ?? null, createdAt: now.toISOString() });
    return { id, filePath: input.filePath, prompt: input.prompt ?? null, createdAt: now };
  }

  getAsset(id: string): Asset | undefined {
    const row = this.db.prepare<[string], AssetRow>('SELECT * FROM assets WHERE id = ?').get(id);
    return row
      ? { id: row.id, filePath: row.file_path, prompt: row.prompt, createdAt: new Date(row.created_at) }
      : undefined;
  }

  private transitionFrom(
    id: string,
    fromStatuses: readonly PostStatus[],
    fields: Record<string, string | null>
  ): boolean {
    if (fromStatuses.length === 0) {
      return false;
    }
    const params: Record<string, string | null> = { id };
    const setClauses = Object.entries(fields).map(([column, value]) => {
      params[`set_${column}`] = value;
      return `${column} = @set_${column}`;
    });
    const placeholders = fromStatuses.map((status, index) => {
      params[`from${index}`] = status;
      return `@from${index}`;
    });
    const result = this.db
      .prepare<Record<string, string | null>>(
        `UPDATE posts SET ${setClauses.join(', ')} WHERE id = @id AND status IN (${placeholders.join(', ')})`
      )
      .run(params);
    return result.changes > 0;
  }

  private requirePost(id: string): Post {
    const post = this.getPostById(id);
    if (!post) {
      throw new NotFoundError(`Post ${id} not found`);
    }
    return post;
  }

  private assertFutureTime(scheduledTime: Date | null, now: Date): asserts scheduledTime is Date {
    if (!scheduledTime || Number.isNaN(scheduledTime.getTime())) {
      throw new ValidationError('scheduledTime is required for scheduled posts');
    }
    if (scheduledTime.getTime() <= now.getTime()) {
      throw new ValidationError('scheduledTime must be in the future');
    }
  }

  private resolveDbPath(dbPath?: string): string {
    if (dbPath) {
      return dbPath === ':memory:' ? ':memory:' : path.resolve(dbPath);
    }
    const envPath = process.env.DATABASE_PATH;
    if (envPath) {
      return envPath === ':memory:' ? ':memory:' : path.resolve(envPath);
    }
    return path.resolve(process.cwd(), 'velvetqueue.db');
  }

  private initializeSchema(): void {
    this.db.exec(
      'CREATE TABLE IF NOT EXISTS posts (' +
        'id TEXT PRIMARY KEY, ' +
        "content TEXT NOT NULL DEFAULT '', " +
        "media_assets TEXT NOT NULL DEFAULT '[]', " +
        "channels TEXT NOT NULL DEFAULT '[]', " +
        "platform_settings TEXT NOT NULL DEFAULT '{}', " +
        'status TEXT NOT NULL, ' +
        'scheduled_time TEXT, ' +
        'last_error TEXT, ' +
        'remote_media_id TEXT, ' +
        'last_publish_attempt_at TEXT, ' +
        'created_at TEXT NOT NULL, ' +
        'updated_at TEXT NOT NULL);' +
        'CREATE INDEX IF NOT EXISTS idx_posts_status_scheduled ON posts(status, scheduled_time);' +
        'CREATE TABLE IF NOT EXISTS channels (' +
        'id TEXT PRIMARY KEY, ' +
        'platform TEXT NOT NULL, ' +
        'name TEXT NOT NULL, ' +
        "credentials TEXT NOT NULL DEFAULT '{}', " +
        'is_active INTEGER NOT NULL DEFAULT 1, ' +
        'created_at TEXT NOT NULL, ' +
        'updated_at TEXT NOT NULL, ' +
        'UNIQUE(platform, name));' +
        'CREATE TABLE IF NOT EXISTS assets (' +
        'id TEXT PRIMARY KEY, ' +
        'file_path TEXT NOT NULL, ' +
        'prompt TEXT, ' +
        'created_at TEXT NOT NULL);'
    );
  }

  private mapPost = (row: PostRow): Post => {
    if (!isPostStatus(row.status)) {
      throw new InvalidStateError(`Post ${row.id} has unknown status ${row.status}`);
    }
    return {
      id: row.id,
      content: row.content,
      mediaAssets: stringListSchema.parse(JSON.parse(row.media_assets)),
      channels: stringListSchema.parse(JSON.parse(row.channels)),
      platformSettings: settingsSchema.parse(JSON.parse(row.platform_settings)),
      status: row.status,
      scheduledTime: row.scheduled_time ? new Date(row.scheduled_time) : null,
      lastError: row.last_error,
      remoteMediaId: row.remote_media_id,
      lastPublishAttemptAt: row.last_publish_attempt_at ? new Date(row.last_publish_attempt_at) : null,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  };

  private mapChannel = (row: ChannelRow): Channel => {
    if (!isPlatform(row.platform)) {
      throw new InvalidStateError(`Channel ${row.id} has unknown platform ${row.platform}`);
    }
    return {
      id: row.id,
      platform: row.platform,
      name: row.name,
      credentials: credentialsSchema.parse(JSON.parse(row.credentials)),
      isActive: row.is_active === 1,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  };
}
