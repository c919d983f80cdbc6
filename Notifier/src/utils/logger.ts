/**
 * Logger for the notifier service.
 * Re-exports the shared Logger to avoid duplicating the implementation.
 */

export { Logger } from '@notifier/shared/Utils/logger.js';
export type { LogLevel } from '@notifier/shared/Utils/logger.js';

import { Logger } from '@notifier/shared/Utils/logger.js';

/** Default logger instance */
export const logger = new Logger('notifier');
