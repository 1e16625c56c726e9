export { createServices, type Services } from './app.js';
export { ConfigManager, getConfig, type Config } from './config.js';
export { CredentialResolver, DEFAULT_CHANNEL_NAME, type ResolvedCredentials } from './credentials.js';
export { PublishScheduler, type SchedulerStatus, type TickOutcome, type TickResult } from './cron.js';
export * from './errors.js';
export { FreeimageHost } from './integrations/imageHost.js';
export { classifyGraphError, InstagramGraphClient } from './integrations/instagramClient.js';
export type { ContainerRequest, ImageHost, ImageUpload, PlatformPublisher, PublishContainerRequest } from './integrations/types.js';
export { Repository, type CreatePostInput, type DraftUpdate } from './repository.js';
export { AppServer } from './server.js';
export { isPubliclyReachable, MediaHostingAdapter } from './services/mediaHosting.js';
export { Publisher, type PublishOutcome } from './services/publisher.js';
export * from './types.js';
