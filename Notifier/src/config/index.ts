import { ConfigSchema, type Config } from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError } from '@notifier/shared/Types/errors.js';
import {
  getEnvString,
  getEnvNumber,
  getEnvList,
  type EnvSource,
} from '@notifier/shared/Utils/config.js';

/**
 * Build and validate the configuration from environment variables.
 * The result is frozen; nothing re-reads the environment afterwards.
 */
export function loadConfig(env: EnvSource = process.env): Readonly<Config> {
  const rawConfig = {
    outlook: {
      clientId: getEnvString('OUTLOOK_CLIENT_ID', undefined, env),
      tenantId: getEnvString('OUTLOOK_TENANT_ID', undefined, env),
      username: getEnvString('OUTLOOK_USERNAME', undefined, env),
      password: getEnvString('OUTLOOK_PASSWORD', undefined, env),
      graphUrl: getEnvString('OUTLOOK_GRAPH_URL', undefined, env),
      mailbox: getEnvString('OUTLOOK_MAILBOX', undefined, env),
    },

    telegram: {
      apiId: getEnvNumber('TELEGRAM_API_ID', undefined, env),
      apiHash: getEnvString('TELEGRAM_API_HASH', undefined, env),
      appointmentBotToken: getEnvString('APPOINTMENT_BOT_TOKEN', undefined, env),
      mailBotToken: getEnvString('MAIL_BOT_TOKEN', undefined, env),
    },

    intervals: {
      updateSeconds: getEnvNumber('UPDATE_INTERVAL', undefined, env),
      appointmentRefreshSeconds: getEnvNumber('APPOINTMENT_REFRESH_INTERVAL', undefined, env),
      appointmentNotifySeconds: getEnvNumber('APPOINTMENT_NOTIFY_INTERVAL', undefined, env),
      mailRefreshSeconds: getEnvNumber('MAIL_REFRESH_INTERVAL', undefined, env),
    },

    allowedChatIds: getEnvList('ALLOWED_CHAT_IDS', env),
    adminChatId: getEnvString('ADMIN_CHAT_ID', undefined, env),
    localTimezone: getEnvString('LOCAL_TIMEZONE', undefined, env),
    keywords: getEnvList('KEYWORDS', env),
    mentionText: getEnvString('MENTION_TEXT', undefined, env),
    agendaTime: getEnvString('AGENDA_TIME', undefined, env),

    logLevel: getEnvString('LOG_LEVEL', undefined, env),
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.flatten();
    logger.error('Configuration validation failed', errors);
    throw new ConfigurationError('Invalid configuration', errors);
  }

  logger.info('Configuration loaded successfully', {
    allowedChats: result.data.allowedChatIds.length,
    timezone: result.data.localTimezone,
    agendaTime: result.data.agendaTime ?? null,
  });
  return deepFreeze(result.data);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export { type Config };
