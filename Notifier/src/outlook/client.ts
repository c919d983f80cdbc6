/**
 * Microsoft Graph implementation of MailboxProvider: today's calendar view
 * and the unread inbox, with every time normalized to UTC.
 */

import { Client, GraphError, type GraphRequest } from '@microsoft/microsoft-graph-client';
import { AuthError, InteractionRequiredAuthError } from '@azure/msal-node';
import { errorMessage } from '@notifier/shared/Types/errors.js';
import { buildPreview, extractUrl } from '../format/preview.js';
import type { AppointmentData, MailData, MailboxProvider, ProviderSnapshot } from '../types/notifier.js';
import { NotifierError, ProviderAuthError, TransientFetchError } from '../utils/errors.js';
import { localDayBounds } from '../utils/time.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { TokenSource } from './auth.js';

// Immutable ids survive folder moves; UTC times save a zone lookup per item
const PREFER_HEADER = 'outlook.timezone="UTC", IdType="ImmutableId"';
const PAGE_SIZE = 50;
const MAX_PAGES = 20;

const AUTH_ERROR_CODES = new Set([
  'invalid_grant',
  'invalid_client',
  'unauthorized_client',
  'interaction_required',
  'consent_required',
]);

const GRAPH_AUTH_CODES = new Set([
  'InvalidAuthenticationToken',
  'ErrorAccessDenied',
  'ErrorNonExistentMailbox',
  'MailboxNotEnabledForRESTAPI',
]);

interface GraphEmailAddress {
  emailAddress?: { address?: string; name?: string };
}

interface GraphDateTime {
  dateTime?: string;
  timeZone?: string;
}

export interface GraphEvent {
  id?: string;
  subject?: string;
  start?: GraphDateTime;
  end?: GraphDateTime;
  location?: { displayName?: string };
  organizer?: GraphEmailAddress;
  onlineMeeting?: { joinUrl?: string } | null;
  isCancelled?: boolean;
}

export interface GraphMessage {
  id?: string;
  subject?: string;
  from?: GraphEmailAddress;
  receivedDateTime?: string;
  bodyPreview?: string;
}

interface GraphPage<T> {
  value?: T[];
  '@odata.nextLink'?: string;
}

/**
 * Map anything thrown while fetching to the two outcomes the refresh driver
 * distinguishes.
 */
export function classifyProviderError(error: unknown): NotifierError {
  if (error instanceof ProviderAuthError || error instanceof TransientFetchError) {
    return error;
  }
  if (error instanceof InteractionRequiredAuthError) {
    return new ProviderAuthError(`Sign-in requires interaction: ${error.message}`, { code: error.errorCode });
  }
  if (error instanceof AuthError) {
    if (AUTH_ERROR_CODES.has(error.errorCode)) {
      return new ProviderAuthError(`Sign-in rejected: ${error.errorCode}`, { code: error.errorCode });
    }
    return new TransientFetchError(`Sign-in failed: ${error.message}`, { code: error.errorCode });
  }
  if (error instanceof GraphError) {
    const details = { statusCode: error.statusCode, code: error.code };
    if (error.statusCode === 401 || error.statusCode === 403 || GRAPH_AUTH_CODES.has(error.code ?? '')) {
      return new ProviderAuthError(`Graph rejected the request: ${error.message}`, details);
    }
    return new TransientFetchError(`Graph request failed: ${error.message}`, details);
  }
  return new TransientFetchError(`Fetch failed: ${errorMessage(error)}`);
}

/** Graph returns naive date-times when asked for UTC */
export function parseGraphDate(value: string | undefined): Date | null {
  if (!value) return null;
  const withZone = /(Z|[+-]\d{2}:\d{2})$/i.test(value) ? value : `${value}Z`;
  const date = new Date(withZone);
  return Number.isNaN(date.getTime()) ? null : date;
}

function displayAddress(address: GraphEmailAddress | undefined): string {
  return address?.emailAddress?.name || address?.emailAddress?.address || '';
}

export function toAppointment(event: GraphEvent): AppointmentData | null {
  const startTime = parseGraphDate(event.start?.dateTime);
  const endTime = parseGraphDate(event.end?.dateTime);
  if (!event.id || !startTime || !endTime) return null;

  const location = event.location?.displayName ?? '';
  return {
    id: event.id,
    subject: event.subject ?? '',
    startTime,
    endTime,
    location,
    organizer: displayAddress(event.organizer),
    joinUrl: event.onlineMeeting?.joinUrl || extractUrl(location),
  };
}

export function toMail(message: GraphMessage): MailData | null {
  const receivedTime = parseGraphDate(message.receivedDateTime);
  if (!message.id || !receivedTime) return null;
  return {
    id: message.id,
    subject: message.subject ?? '',
    sender: displayAddress(message.from),
    receivedTime,
    preview: buildPreview(message.bodyPreview ?? ''),
  };
}

export interface OutlookProviderOptions {
  auth: TokenSource;
  timeZone: string;
  graphUrl?: string;
  /** Mailbox to read; the signed-in user when unset */
  mailbox?: string;
  client?: Client;
  logger?: Logger;
}

export class OutlookProvider implements MailboxProvider {
  private readonly client: Client;
  private readonly basePath: string;
  private readonly logger: Logger;

  constructor(private readonly options: OutlookProviderOptions) {
    this.logger = options.logger ?? rootLogger.child('outlook');
    this.basePath = options.mailbox ? `/users/${encodeURIComponent(options.mailbox)}` : '/me';
    this.client =
      options.client ??
      Client.init({
        baseUrl: `${(options.graphUrl ?? 'https://graph.microsoft.com').replace(/\/+$/, '')}/`,
        authProvider: (done) => {
          options.auth.getAccessToken().then(
            (token) => done(null, token),
            (error: unknown) => done(error instanceof Error ? error : new Error(String(error)), null),
          );
        },
      });
  }

  async fetchSnapshot(now: Date): Promise<ProviderSnapshot> {
    try {
      // Surface credential problems before any Graph call wraps them
      await this.options.auth.getAccessToken();

      const { start, end } = localDayBounds(now, this.options.timeZone);
      const [appointments, mails] = await Promise.all([
        this.fetchAppointments(start, end),
        this.fetchUnreadMail(),
      ]);
      return { appointments, mails };
    } catch (error) {
      throw classifyProviderError(error);
    }
  }

  private async fetchAppointments(start: Date, end: Date): Promise<AppointmentData[]> {
    const request = this.client
      .api(`${this.basePath}/calendarView`)
      .query({ startDateTime: start.toISOString(), endDateTime: end.toISOString() })
      .select('id,subject,start,end,location,organizer,onlineMeeting,isCancelled')
      .orderby('start/dateTime')
      .top(PAGE_SIZE);

    const events = await this.collectPages<GraphEvent>(request);
    const appointments: AppointmentData[] = [];
    for (const event of events) {
      if (event.isCancelled) continue;
      const appointment = toAppointment(event);
      if (appointment) {
        appointments.push(appointment);
      } else {
        this.logger.warn('Skipping calendar event without id or times', { id: event.id });
      }
    }
    return appointments;
  }

  private async fetchUnreadMail(): Promise<MailData[]> {
    const request = this.client
      .api(`${this.basePath}/mailFolders/inbox/messages`)
      .filter('isRead eq false')
      .select('id,subject,from,receivedDateTime,bodyPreview')
      .top(PAGE_SIZE);

    const messages = await this.collectPages<GraphMessage>(request);
    const mails: MailData[] = [];
    for (const message of messages) {
      const mail = toMail(message);
      if (mail) {
        mails.push(mail);
      } else {
        this.logger.warn('Skipping message without id or received time', { id: message.id });
      }
    }
    return mails;
  }

  private async collectPages<T>(first: GraphRequest): Promise<T[]> {
    const items: T[] = [];
    let page: GraphPage<T> = await first.header('Prefer', PREFER_HEADER).get();
    let pages = 1;

    for (;;) {
      items.push(...(page.value ?? []));
      const next = page['@odata.nextLink'];
      if (!next) break;
      if (pages >= MAX_PAGES) {
        this.logger.warn('Stopping after page limit', { pages, items: items.length });
        break;
      }
      page = await this.client.api(next).header('Prefer', PREFER_HEADER).get();
      pages++;
    }
    return items;
  }
}
