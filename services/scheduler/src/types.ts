export const POST_STATUSES = ['draft', 'scheduled', 'publishing', 'published', 'failed'] as const;

export type PostStatus = (typeof POST_STATUSES)[number];

export const PLATFORMS = ['instagram', 'linkedin', 'twitter'] as const;

export type Platform = (typeof PLATFORMS)[number];

export const isPlatform = (value: string): value is Platform =>
  PLATFORMS.some((platform) => platform === value);

export const isPostStatus = (value: string): value is PostStatus =>
  POST_STATUSES.some((status) => status === value);

export interface Post {
  id: string;
  content: string;
  mediaAssets: string[];
  /** Channel ids, or bare platform names meaning "the active account for that platform". */
  channels: string[];
  platformSettings: Record<string, unknown>;
  status: PostStatus;
  scheduledTime: Date | null;
  lastError: string | null;
  remoteMediaId: string | null;
  lastPublishAttemptAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChannelCredentials {
  userId: string;
  accessToken: string;
}

export interface Channel {
  id: string;
  platform: Platform;
  name: string;
  credentials: ChannelCredentials;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Asset {
  id: string;
  /** Path relative to the media root, or an absolute URL. */
  filePath: string;
  prompt: string | null;
  createdAt: Date;
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
