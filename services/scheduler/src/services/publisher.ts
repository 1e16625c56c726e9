import { sleep } from '@velvetqueue/shared/utils';

import type { CredentialResolver } from '../credentials.js';
import { describeError, NoChannelError, NotFoundError, PublishConflictError } from '../errors.js';
import type { PlatformPublisher } from '../integrations/types.js';
import { logger } from '../logger.js';
import { CLAIMABLE_STATUSES, type Repository } from '../repository.js';
import { isPlatform, isRecord, type Platform, type Post } from '../types.js';
import type { MediaHostingAdapter } from './mediaHosting.js';

export interface PublisherOptions {
  /** Delay between container creation and publish, giving the platform time to ingest media. */
  processingWaitMs?: number;
  wait?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface PublishOutcome {
  postId: string;
  remoteMediaId: string | null;
  alreadyPublished: boolean;
}

interface PublishTarget {
  platform: Platform;
  channelId?: string;
}

/**
 * Drives a post through the publishing state machine:
 * claim, credentials, media hosting, container, processing wait, publish.
 * Every failure after the claim is recorded on the post and re-thrown.
 */
export class Publisher {
  private readonly processingWaitMs: number;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly repository: Repository,
    private readonly credentials: CredentialResolver,
    private readonly mediaHosting: MediaHostingAdapter,
    private readonly platformPublisher: PlatformPublisher,
    options: PublisherOptions = {}
  ) {
    this.processingWaitMs = options.processingWaitMs ?? 60000;
    this.wait = options.wait ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  /** Manual publish. Safe to call on an already published post. */
  async publish(postId: string): Promise<PublishOutcome> {
    const post = this.repository.getPostById(postId);
    if (!post) {
      throw new NotFoundError(`Post ${postId} not found`);
    }
    if (post.status === 'published') {
      logger.info({ postId }, 'Post already published, skipping');
      return { postId, remoteMediaId: post.remoteMediaId, alreadyPublished: true };
    }

    const claimed = this.repository.claimForPublishing(postId, CLAIMABLE_STATUSES, this.now());
    if (!claimed) {
      const current = this.repository.getPostById(postId);
      if (current?.status === 'published') {
        return { postId, remoteMediaId: current.remoteMediaId, alreadyPublished: true };
      }
      throw new PublishConflictError(`Post ${postId} is already being published`);
    }

    return this.runClaimed(claimed);
  }

  /** Runs an attempt for a post the caller has already moved into `publishing`. */
  async runClaimed(post: Post): Promise<PublishOutcome> {
    const postLogger = logger.child({ postId: post.id });
    postLogger.info('Starting publish attempt');

    try {
      const target = this.resolveTarget(post);
      const credentials = this.credentials.resolve(target.platform, target.channelId);
      const mediaUrls = await this.hostMedia(post);

      const containerId = await this.platformPublisher.createContainer({
        userId: credentials.userId,
        accessToken: credentials.accessToken,
        mediaUrls,
        caption: post.content,
      });
      postLogger.info({ containerId, waitMs: this.processingWaitMs }, 'Media container created, waiting for processing');
      await this.wait(this.processingWaitMs);

      const remoteMediaId = await this.platformPublisher.publishContainer({
        userId: credentials.userId,
        accessToken: credentials.accessToken,
        containerId,
      });

      const platformSettings = this.withMediaId(post.platformSettings, target.platform, remoteMediaId);
      if (!this.repository.markPublished(post.id, remoteMediaId, platformSettings, this.now())) {
        postLogger.warn({ remoteMediaId }, 'Post was already recorded as published by another attempt');
      }
      postLogger.info({ remoteMediaId }, 'Post published');
      return { postId: post.id, remoteMediaId, alreadyPublished: false };
    } catch (error) {
      const message = describeError(error);
      const recorded = this.repository.markFailed(post.id, message, this.now());
      postLogger.error({ error: message, recorded }, 'Publish attempt failed');
      throw error;
    }
  }

  private resolveTarget(post: Post): PublishTarget {
    const targets: PublishTarget[] = [];
    for (const identifier of post.channels) {
      if (isPlatform(identifier)) {
        targets.push({ platform: identifier });
        continue;
      }
      const channel = this.repository.getChannel(identifier);
      if (channel) {
        targets.push({ platform: channel.platform, channelId: channel.id });
      } else {
        logger.warn({ postId: post.id, channel: identifier }, 'Unknown channel on post');
      }
    }

    const platform = this.platformPublisher.platform;
    for (const other of targets.filter((target) => target.platform !== platform)) {
      logger.warn({ postId: post.id, platform: other.platform }, 'Remote delivery is not supported for platform');
    }

    const target = targets.find((candidate) => candidate.platform === platform);
    if (!target) {
      throw new NoChannelError(`Post ${post.id} has no ${platform} channel to publish to`);
    }
    return target;
  }

  private async hostMedia(post: Post): Promise<string[]> {
    const urls: string[] = [];
    for (const assetId of post.mediaAssets) {
      const asset = this.repository.getAsset(assetId);
      if (!asset) {
        throw new NotFoundError(`Asset ${assetId} not found`);
      }
      urls.push(await this.mediaHosting.ensurePublic(this.mediaHosting.resolveAssetUrl(asset)));
    }
    return urls;
  }

  private withMediaId(settings: Record<string, unknown>, platform: Platform, mediaId: string): Record<string, unknown> {
    const current = settings[platform];
    return { ...settings, [platform]: { ...(isRecord(current) ? current : {}), mediaId } };
  }
}
