import { createScopedLogger } from '@velvetqueue/shared/logger';

export const logger = createScopedLogger('scheduler');
