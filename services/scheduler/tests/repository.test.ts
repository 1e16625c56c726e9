import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { InvalidStateError, NotFoundError, ValidationError } from '../src/errors.js';
import { Repository } from '../src/repository.js';
import { NOW, minutesFrom } from './fakes.js';

describe('Repository', () => {
  let repository: Repository;

  beforeEach(() => {
    repository = new Repository(':memory:');
  });

  afterEach(() => {
    repository.close();
  });

  const scheduled = (minutes: number, content = `post at +${minutes}`) =>
    repository.createPost(
      { content, channels: ['instagram'], status: 'scheduled', scheduledTime: minutesFrom(NOW, minutes) },
      NOW
    );

  describe('posts', () => {
    it('creates a draft with defaults', () => {
      const post = repository.createPost({ channels: ['instagram'] }, NOW);

      expect(post.status).toBe('draft');
      expect(post.content).toBe('');
      expect(post.mediaAssets).toEqual([]);
      expect(post.platformSettings).toEqual({});
      expect(post.scheduledTime).toBeNull();
      expect(post.lastError).toBeNull();
      expect(post.createdAt.toISOString()).toBe(NOW.toISOString());
      expect(repository.getPostById(post.id)).toEqual(post);
    });

    it('requires a future time for scheduled posts', () => {
      expect(() => repository.createPost({ channels: ['instagram'], status: 'scheduled' }, NOW)).toThrow(
        'scheduledTime is required for scheduled posts'
      );
      expect(() =>
        repository.createPost({ channels: ['instagram'], status: 'scheduled', scheduledTime: NOW }, NOW)
      ).toThrow(ValidationError);
    });

    it('lists posts by scheduled time, unscheduled newest first', () => {
      const olderDraft = repository.createPost({ content: 'older', channels: [] }, NOW);
      const newerDraft = repository.createPost({ content: 'newer', channels: [] }, minutesFrom(NOW, 1));
      const later = scheduled(30);
      const sooner = scheduled(10);

      expect(repository.listPosts().map((post) => post.id)).toEqual([newerDraft.id, olderDraft.id, sooner.id, later.id]);
      expect(repository.listPosts('scheduled').map((post) => post.id)).toEqual([sooner.id, later.id]);
      expect(repository.listPostsByStatus('scheduled', 1).map((post) => post.id)).toEqual([sooner.id]);
    });

    it('edits drafts only', () => {
      const draft = repository.createPost({ content: 'first', channels: ['instagram'] }, NOW);
      const edited = repository.updateDraft(draft.id, { content: 'second', mediaAssets: ['asset-1'] }, minutesFrom(NOW, 1));

      expect(edited.content).toBe('second');
      expect(edited.mediaAssets).toEqual(['asset-1']);
      expect(edited.updatedAt.toISOString()).toBe(minutesFrom(NOW, 1).toISOString());

      const post = scheduled(10);
      expect(() => repository.updateDraft(post.id, { content: 'nope' })).toThrow(InvalidStateError);
      expect(() => repository.updateDraft('missing', { content: 'nope' })).toThrow(NotFoundError);
    });

    it('schedules drafts and failed posts, clearing the last error', () => {
      const draft = repository.createPost({ channels: ['instagram'] }, NOW);
      repository.claimForPublishing(draft.id, ['draft'], NOW);
      repository.markFailed(draft.id, 'Upload failed', NOW);

      const rescheduled = repository.schedulePost(draft.id, minutesFrom(NOW, 45), NOW);

      expect(rescheduled.status).toBe('scheduled');
      expect(rescheduled.scheduledTime?.toISOString()).toBe(minutesFrom(NOW, 45).toISOString());
      expect(rescheduled.lastError).toBeNull();
      expect(() => repository.schedulePost(draft.id, minutesFrom(NOW, -1), NOW)).toThrow('scheduledTime must be in the future');
    });

    it('refuses to schedule a published post', () => {
      const post = repository.createPost({ channels: ['instagram'] }, NOW);
      repository.claimForPublishing(post.id, ['draft'], NOW);
      repository.markPublished(post.id, 'media-1', {}, NOW);

      expect(() => repository.schedulePost(post.id, minutesFrom(NOW, 10), NOW)).toThrow(InvalidStateError);
    });
  });

  describe('claims', () => {
    it('lets only one claim win', () => {
      const post = repository.createPost({ channels: ['instagram'] }, NOW);
      const attemptAt = minutesFrom(NOW, 2);

      const first = repository.claimForPublishing(post.id, undefined, attemptAt);
      const second = repository.claimForPublishing(post.id, undefined, attemptAt);

      expect(first?.status).toBe('publishing');
      expect(first?.lastPublishAttemptAt?.toISOString()).toBe(attemptAt.toISOString());
      expect(second).toBeUndefined();
    });

    it('claims due posts by scheduled time, then id', () => {
      const tieA = scheduled(5, 'tie a');
      const tieB = scheduled(5, 'tie b');
      const earliest = scheduled(1);
      const notDue = scheduled(60);

      const claimed = repository.claimDuePosts(minutesFrom(NOW, 10), 10);

      const ties = [tieA.id, tieB.id].sort();
      expect(claimed.map((post) => post.id)).toEqual([earliest.id, ...ties]);
      expect(claimed.every((post) => post.status === 'publishing')).toBe(true);
      expect(repository.getPostById(notDue.id)?.status).toBe('scheduled');
      expect(repository.claimDuePosts(minutesFrom(NOW, 10), 10)).toEqual([]);
    });

    it('respects the batch limit', () => {
      const first = scheduled(1);
      scheduled(2);

      const claimed = repository.claimDuePosts(minutesFrom(NOW, 10), 1);

      expect(claimed.map((post) => post.id)).toEqual([first.id]);
      expect(repository.listPosts('scheduled')).toHaveLength(1);
    });

    it('records publication once and failures only while publishing', () => {
      const post = repository.createPost({ channels: ['instagram'] }, NOW);
      expect(repository.markFailed(post.id, 'not claimed', NOW)).toBe(false);

      repository.claimForPublishing(post.id, undefined, NOW);
      expect(repository.markPublished(post.id, 'media-1', { instagram: { mediaId: 'media-1' } }, NOW)).toBe(true);
      expect(repository.markPublished(post.id, 'media-2', {}, NOW)).toBe(false);
      expect(repository.markFailed(post.id, 'late failure', NOW)).toBe(false);

      const published = repository.getPostById(post.id);
      expect(published?.status).toBe('published');
      expect(published?.remoteMediaId).toBe('media-1');
      expect(published?.platformSettings).toEqual({ instagram: { mediaId: 'media-1' } });
      expect(published?.lastError).toBeNull();
    });

    it('fails attempts interrupted by a restart', () => {
      const first = repository.createPost({ channels: ['instagram'] }, NOW);
      const second = repository.createPost({ channels: ['instagram'] }, NOW);
      repository.claimForPublishing(first.id, undefined, NOW);

      expect(repository.failInterrupted('interrupted', NOW)).toBe(1);
      expect(repository.getPostById(first.id)?.status).toBe('failed');
      expect(repository.getPostById(first.id)?.lastError).toBe('interrupted');
      expect(repository.getPostById(second.id)?.status).toBe('draft');
    });
  });

  it('records a publication confirmed after the attempt was failed as interrupted', () => {
    const post = repository.createPost({ channels: ['instagram'] }, NOW);
    repository.claimForPublishing(post.id, undefined, NOW);
    repository.failInterrupted('interrupted', NOW);

    expect(repository.markPublished(post.id, 'media-3', {}, NOW)).toBe(true);
    expect(repository.getPostById(post.id)).toMatchObject({ status: 'published', remoteMediaId: 'media-3', lastError: null });
  });

  describe('calendar range', () => {
    it('places published posts without a schedule on their attempt time', () => {
      const upcoming = scheduled(60);
      const manual = repository.createPost({ channels: ['instagram'] }, NOW);
      repository.claimForPublishing(manual.id, undefined, minutesFrom(NOW, 30));
      repository.markPublished(manual.id, 'media-9', {}, minutesFrom(NOW, 31));
      repository.createPost({ channels: ['instagram'] }, NOW);
      scheduled(600);

      const posts = repository.listPostsInRange(NOW, minutesFrom(NOW, 120), ['scheduled', 'published']);

      expect(posts.map((post) => post.id)).toEqual([manual.id, upcoming.id]);
      expect(repository.listPostsInRange(NOW, minutesFrom(NOW, 120), [])).toEqual([]);
    });
  });

  describe('channels and assets', () => {
    it('upserts channels by platform and name', () => {
      const first = repository.upsertChannel({
        platform: 'instagram',
        name: 'Default Account',
        credentials: { userId: 'user-1', accessToken: 'token-a' },
      });
      const second = repository.upsertChannel({
        platform: 'instagram',
        name: 'Default Account',
        credentials: { userId: 'user-1', accessToken: 'token-b' },
      });

      expect(second.id).toBe(first.id);
      expect(repository.listChannels()).toHaveLength(1);
      expect(repository.findActiveChannel('instagram')?.credentials.accessToken).toBe('token-b');

      expect(repository.setChannelActive(first.id, false)).toBe(true);
      expect(repository.findActiveChannel('instagram')).toBeUndefined();
    });

    it('stores assets', () => {
      const asset = repository.createAsset({ filePath: 'media/sunset.jpg', prompt: 'sunset' }, NOW);

      expect(repository.getAsset(asset.id)).toEqual({
        id: asset.id,
        filePath: 'media/sunset.jpg',
        prompt: 'sunset',
        createdAt: NOW,
      });
      expect(repository.getAsset('missing')).toBeUndefined();
    });
  });
});
