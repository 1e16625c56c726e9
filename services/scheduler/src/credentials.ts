import { NoCredentialsError } from './errors.js';
import { logger } from './logger.js';
import type { EnvCredentials } from './config.js';
import type { Repository } from './repository.js';
import { PLATFORMS, type Channel, type ChannelCredentials, type Platform } from './types.js';

export const DEFAULT_CHANNEL_NAME = 'Default Account';

export type CredentialSourceName = 'environment' | 'channel';

export interface ResolvedCredentials extends ChannelCredentials {
  platform: Platform;
  source: CredentialSourceName;
  channelId: string | null;
}

type CredentialSource = (platform: Platform, preferredChannelId?: string) => ResolvedCredentials | undefined;

const ENV_HINTS: Partial<Record<Platform, string>> = {
  instagram: 'Set INSTAGRAM_USER_ID and INSTAGRAM_ACCESS_TOKEN or connect an Instagram channel.',
};

/** Trims whitespace and the quotes that .env files tend to leave around values. */
export const sanitizeCredential = (value: string | undefined): string =>
  (value ?? '').trim().replace(/^["']+|["']+$/g, '').trim();

const usable = (credentials: ChannelCredentials): boolean =>
  credentials.userId.length > 0 && credentials.accessToken.length > 0;

/**
 * Resolves platform credentials through an ordered chain: environment
 * overrides first, then the persisted channel store. Environment hits are
 * written back to the platform's default channel.
 */
export class CredentialResolver {
  private readonly chain: CredentialSource[];

  constructor(
    private readonly repository: Repository,
    private readonly environment: Partial<Record<Platform, EnvCredentials>> = {}
  ) {
    this.chain = [
      (platform) => this.fromEnvironment(platform),
      (platform, preferredChannelId) => this.fromChannelStore(platform, preferredChannelId),
    ];
  }

  resolve(platform: Platform, preferredChannelId?: string): ResolvedCredentials {
    for (const source of this.chain) {
      const resolved = source(platform, preferredChannelId);
      if (resolved) {
        logger.debug({ platform, source: resolved.source, channelId: resolved.channelId }, 'Resolved platform credentials');
        return resolved;
      }
    }
    const hint = ENV_HINTS[platform] ?? `Connect a ${platform} channel.`;
    throw new NoCredentialsError(`No ${platform} credentials found. ${hint}`);
  }

  /** Upserts the default channel of every platform configured through the environment. */
  syncEnvironment(): Channel[] {
    const synced: Channel[] = [];
    for (const platform of PLATFORMS) {
      const credentials = this.environmentCredentials(platform);
      if (credentials) {
        synced.push(this.upsertDefaultChannel(platform, credentials));
      }
    }
    return synced;
  }

  private fromEnvironment(platform: Platform): ResolvedCredentials | undefined {
    const credentials = this.environmentCredentials(platform);
    if (!credentials) {
      return undefined;
    }
    const channel = this.upsertDefaultChannel(platform, credentials);
    return { ...credentials, platform, source: 'environment', channelId: channel.id };
  }

  private fromChannelStore(platform: Platform, preferredChannelId?: string): ResolvedCredentials | undefined {
    const preferred = preferredChannelId ? this.repository.getChannel(preferredChannelId) : undefined;
    const channel =
      preferred && preferred.platform === platform && preferred.isActive
        ? preferred
        : this.repository.findActiveChannel(platform);
    if (!channel) {
      return undefined;
    }

    const credentials = {
      userId: sanitizeCredential(channel.credentials.userId),
      accessToken: sanitizeCredential(channel.credentials.accessToken),
    };
    if (!usable(credentials)) {
      logger.warn({ platform, channelId: channel.id }, 'Channel credentials are incomplete');
      return undefined;
    }
    return { ...credentials, platform, source: 'channel', channelId: channel.id };
  }

  private environmentCredentials(platform: Platform): ChannelCredentials | undefined {
    const raw = this.environment[platform];
    if (!raw) {
      return undefined;
    }
    const credentials = {
      userId: sanitizeCredential(raw.userId),
      accessToken: sanitizeCredential(raw.accessToken),
    };
    return usable(credentials) ? credentials : undefined;
  }

  private upsertDefaultChannel(platform: Platform, credentials: ChannelCredentials): Channel {
    return this.repository.upsertChannel({ platform, name: DEFAULT_CHANNEL_NAME, credentials });
  }
}
