import { z } from 'zod';
import { isValidTimeZone, parseClockTime } from '../utils/time.js';

const chatId = z.string().regex(/^-?\d+$/, 'Chat id must be an integer');
const seconds = z.number().int().positive();

export const ConfigSchema = z.object({
  outlook: z.object({
    clientId: z.string().min(1),
    tenantId: z.string().min(1),
    username: z.string().min(1),
    password: z.string().min(1),
    graphUrl: z.string().url().default('https://graph.microsoft.com'),
    mailbox: z.string().optional(),
  }),

  telegram: z.object({
    apiId: z.number().int().positive(),
    apiHash: z.string().min(1),
    appointmentBotToken: z.string().min(1),
    mailBotToken: z.string().min(1),
  }),

  intervals: z.object({
    updateSeconds: seconds,
    appointmentRefreshSeconds: seconds,
    appointmentNotifySeconds: z.number().int().nonnegative(),
    mailRefreshSeconds: seconds,
  }),

  allowedChatIds: z.array(chatId).min(1, 'At least one allowed chat id is required'),
  adminChatId: chatId,
  localTimezone: z.string().refine(isValidTimeZone, 'Unknown IANA time zone'),
  keywords: z.array(z.string().min(1)).default([]),
  mentionText: z.string().default(''),
  agendaTime: z
    .string()
    .optional()
    .refine((value) => value === undefined || parseClockTime(value) !== null, 'Expected HH:MM'),

  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
