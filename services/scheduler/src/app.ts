import { ConfigManager, getConfig } from './config.js';
import { CredentialResolver } from './credentials.js';
import { PublishScheduler } from './cron.js';
import { FreeimageHost } from './integrations/imageHost.js';
import { InstagramGraphClient } from './integrations/instagramClient.js';
import { Repository } from './repository.js';
import { MediaHostingAdapter } from './services/mediaHosting.js';
import { Publisher } from './services/publisher.js';

export interface Services {
  configManager: ConfigManager;
  repository: Repository;
  credentials: CredentialResolver;
  mediaHosting: MediaHostingAdapter;
  publisher: Publisher;
  scheduler: PublishScheduler;
}

/** Wires the publishing pipeline from configuration. */
export const createServices = (configManager: ConfigManager = getConfig()): Services => {
  const { config } = configManager;

  const repository = new Repository(config.DATABASE_PATH);
  const credentials = new CredentialResolver(repository, { instagram: configManager.instagramCredentials });
  const imageHost = new FreeimageHost(config.FREEIMAGE_API_KEY, {
    uploadUrl: config.FREEIMAGE_API_URL,
    timeout: config.HTTP_TIMEOUT_MS,
  });
  const mediaHosting = new MediaHostingAdapter(imageHost, {
    publicBaseUrl: config.PUBLIC_BASE_URL,
    mediaRoot: config.MEDIA_ROOT,
  });
  const instagram = new InstagramGraphClient({
    baseURL: config.INSTAGRAM_GRAPH_URL,
    apiVersion: config.INSTAGRAM_API_VERSION,
    timeout: config.HTTP_TIMEOUT_MS,
  });
  const publisher = new Publisher(repository, credentials, mediaHosting, instagram, {
    processingWaitMs: config.PUBLISH_PROCESSING_WAIT_MS,
  });
  const scheduler = new PublishScheduler(repository, publisher, {
    intervalSeconds: config.SCHEDULER_INTERVAL_SECONDS,
    batchSize: config.SCHEDULER_BATCH_SIZE,
    timezone: configManager.timezone,
  });

  return { configManager, repository, credentials, mediaHosting, publisher, scheduler };
};
