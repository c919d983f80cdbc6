#!/usr/bin/env node

import { loadEnvSafely } from '@notifier/shared/Utils/env.js';
import { NotifierApp } from './app.js';
import { loadConfig } from './config/index.js';
import { OutlookAuth } from './outlook/auth.js';
import { OutlookProvider } from './outlook/client.js';
import { TelegramBot } from './telegram/bot.js';
import { GramJsTransport } from './telegram/transport.js';
import { logger } from './utils/logger.js';

loadEnvSafely(import.meta.url);

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const auth = new OutlookAuth(config.outlook);
  const provider = new OutlookProvider({
    auth,
    timeZone: config.localTimezone,
    graphUrl: config.outlook.graphUrl,
    mailbox: config.outlook.mailbox,
  });

  const { apiId, apiHash } = config.telegram;
  const appointmentBot = new TelegramBot({
    name: 'appointments',
    transport: new GramJsTransport({ apiId, apiHash, botToken: config.telegram.appointmentBotToken }),
  });
  const mailBot = new TelegramBot({
    name: 'mail',
    transport: new GramJsTransport({ apiId, apiHash, botToken: config.telegram.mailBotToken }),
  });

  await Promise.all([appointmentBot.connect(), mailBot.connect()]);

  const app = new NotifierApp({
    config,
    provider,
    appointmentGateway: appointmentBot,
    mailGateway: mailBot,
  });
  appointmentBot.onCommand((chatId, text) => app.commands.handle(chatId, text));
  app.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down...', { signal });

    app
      .stop()
      .then(() => Promise.all([appointmentBot.disconnect(), mailBot.disconnect()]))
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', { error });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start notifier', { error });
  process.exit(1);
});
