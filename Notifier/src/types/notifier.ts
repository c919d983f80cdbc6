/**
 * Core data model: what the provider returns and what the cache holds.
 */

export type ItemKind = 'appointment' | 'mail';

/** Appointment as returned by the provider, times already in UTC */
export interface AppointmentData {
  id: string;
  subject: string;
  startTime: Date;
  endTime: Date;
  location: string;
  organizer: string;
  joinUrl?: string;
}

/** Unread mail as returned by the provider */
export interface MailData {
  id: string;
  subject: string;
  sender: string;
  receivedTime: Date;
  preview: string;
}

export interface Appointment extends AppointmentData {
  notified: boolean;
}

export interface MailItem extends MailData {
  notified: boolean;
}

export interface ProviderSnapshot {
  appointments: AppointmentData[];
  mails: MailData[];
}

/**
 * Fetch collaborator. Throws ProviderAuthError when credentials are rejected
 * and TransientFetchError for everything else.
 */
export interface MailboxProvider {
  fetchSnapshot(now: Date): Promise<ProviderSnapshot>;
}

/**
 * Outbound messaging. Resolves once the message was accepted, throws
 * DeliveryError otherwise.
 */
export interface MessageGateway {
  readonly name: string;
  /** Send, retrying transient failures the way the gateway sees fit */
  send(chatId: string, text: string): Promise<void>;
  /** Exactly one delivery attempt, for callers that run their own retry loop */
  sendOnce(chatId: string, text: string): Promise<void>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
