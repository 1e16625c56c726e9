#!/usr/bin/env node

import { Command } from 'commander';

import { createServices, type Services } from './app.js';
import { describeError } from './errors.js';
import { logger } from './logger.js';
import { AppServer } from './server.js';
import { isPostStatus } from './types.js';

const program = new Command();

program
  .name('velvetqueue')
  .description('Social post publishing and scheduling service')
  .version('1.0.0');

const withServices = async (run: (services: Services) => Promise<void>): Promise<void> => {
  const services = createServices();
  try {
    await run(services);
  } finally {
    services.repository.close();
  }
};

program
  .command('serve')
  .description('Start the HTTP API and, when enabled, the publish scheduler')
  .option('-p, --port <port>', 'Port to listen on')
  .action((options: { port?: string }) => {
    const services = createServices();
    const { config } = services.configManager;

    const synced = services.credentials.syncEnvironment();
    if (synced.length > 0) {
      logger.info({ channels: synced.map((channel) => channel.platform) }, 'Synced channel credentials from environment');
    }

    const server = new AppServer({
      repository: services.repository,
      publisher: services.publisher,
      scheduler: services.scheduler,
      allowedOrigins: services.configManager.allowedOrigins,
    });
    server.start(options.port ? Number(options.port) : config.PORT);

    if (config.SCHEDULER_ENABLED) {
      services.scheduler.start();
    } else {
      logger.info('Publish scheduler disabled by SCHEDULER_ENABLED');
    }

    const shutdown = (signal: string) => {
      logger.info({ signal }, 'Shutting down');
      server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error: describeError(error) }, 'Shutdown failed');
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

program
  .command('publish <postId>')
  .description('Publish a post now')
  .action(async (postId: string) => {
    await withServices(async ({ publisher }) => {
      const outcome = await publisher.publish(postId);
      console.log(JSON.stringify(outcome, null, 2));
    });
  });

program
  .command('tick')
  .description('Run one scheduler pass over due posts')
  .action(async () => {
    await withServices(async ({ scheduler }) => {
      const result = await scheduler.tick();
      console.log(JSON.stringify(result, null, 2));
    });
  });

program
  .command('list')
  .description('List posts')
  .option('-s, --status <status>', 'Only posts with this status')
  .action(async (options: { status?: string }) => {
    const status = options.status;
    if (status !== undefined && !isPostStatus(status)) {
      throw new Error(`Unknown status: ${status}`);
    }
    await withServices(async ({ repository }) => {
      for (const post of repository.listPosts(status)) {
        const when = post.scheduledTime ? post.scheduledTime.toISOString() : '-';
        console.log(`${post.id}  ${post.status.padEnd(10)}  ${when}  ${post.content.slice(0, 60)}`);
      }
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error({ error: describeError(error) }, 'Command failed');
  console.error(describeError(error));
  process.exitCode = 1;
});
