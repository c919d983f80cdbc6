/**
 * CacheStore - the single owner of the current appointment/mail snapshot.
 *
 * Every operation is synchronous, so on the event loop each call is atomic:
 * a reader sees either the previous snapshot or the next one, never a mix.
 * Components hold the store itself, never the maps inside it.
 */

import type {
  Appointment,
  AppointmentData,
  ItemKind,
  MailData,
  MailItem,
} from '../types/notifier.js';

interface Snapshot {
  fetchedAt: Date | null;
  appointments: ReadonlyMap<string, Appointment>;
  mails: ReadonlyMap<string, MailItem>;
  ready: boolean;
}

export interface CacheStatus {
  ready: boolean;
  fetchedAt: Date | null;
  appointments: number;
  mails: number;
  pendingAppointments: number;
  pendingMails: number;
}

export interface ReplaceResult {
  appointments: number;
  mails: number;
  /** Mail ids that were not in the previous snapshot */
  newMails: number;
}

const EMPTY_SNAPSHOT: Snapshot = {
  fetchedAt: null,
  appointments: new Map(),
  mails: new Map(),
  ready: false,
};

export class CacheStore {
  private snapshot: Snapshot = EMPTY_SNAPSHOT;

  // Items currently being delivered, keyed by kind
  private claims: Record<ItemKind, Set<string>> = {
    appointment: new Set(),
    mail: new Set(),
  };

  /**
   * Replace the whole snapshot. `notified` flags carry over for ids present
   * in both the old and the new snapshot; every other id starts un-notified.
   */
  replaceSnapshot(
    newAppointments: readonly AppointmentData[],
    newMails: readonly MailData[],
    fetchedAt: Date = new Date(),
  ): ReplaceResult {
    const previous = this.snapshot;

    const appointments = new Map<string, Appointment>();
    for (const item of newAppointments) {
      appointments.set(item.id, {
        ...item,
        notified: previous.appointments.get(item.id)?.notified ?? false,
      });
    }

    const mails = new Map<string, MailItem>();
    let newMailCount = 0;
    for (const item of newMails) {
      const known = previous.mails.get(item.id);
      if (!known && !mails.has(item.id)) newMailCount++;
      mails.set(item.id, { ...item, notified: known?.notified ?? false });
    }

    this.snapshot = { fetchedAt, appointments, mails, ready: true };

    // Claims on items that left the snapshot can never complete
    this.pruneClaims('appointment', appointments);
    this.pruneClaims('mail', mails);

    return { appointments: appointments.size, mails: mails.size, newMails: newMailCount };
  }

  /**
   * Un-notified appointments whose alert time (start minus lead) has come.
   * Appointments that already started stay due until marked.
   */
  dueAppointments(now: Date, notifyLeadSeconds: number): Appointment[] {
    const horizon = now.getTime() + notifyLeadSeconds * 1000;
    const due: Appointment[] = [];
    for (const item of this.snapshot.appointments.values()) {
      if (!item.notified && item.startTime.getTime() <= horizon) {
        due.push({ ...item });
      }
    }
    return due.sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
  }

  unnotifiedMail(): MailItem[] {
    const pending: MailItem[] = [];
    for (const item of this.snapshot.mails.values()) {
      if (!item.notified) pending.push({ ...item });
    }
    return pending.sort((a, b) => a.receivedTime.getTime() - b.receivedTime.getTime());
  }

  /**
   * Flip the notified flag. Already-notified and unknown ids are no-ops.
   * @returns true when the flag changed
   */
  markNotified(kind: ItemKind, id: string): boolean {
    const item = this.itemsOf(kind).get(id);
    if (!item || item.notified) return false;
    item.notified = true;
    return true;
  }

  /**
   * Reserve an item for delivery. Fails when it is already notified, already
   * claimed, or not in the snapshot.
   */
  claim(kind: ItemKind, id: string): boolean {
    const item = this.itemsOf(kind).get(id);
    if (!item || item.notified) return false;
    const claims = this.claims[kind];
    if (claims.has(id)) return false;
    claims.add(id);
    return true;
  }

  release(kind: ItemKind, id: string): void {
    this.claims[kind].delete(id);
  }

  isReady(): boolean {
    return this.snapshot.ready;
  }

  listAppointments(): Appointment[] {
    return [...this.snapshot.appointments.values()]
      .map((item) => ({ ...item }))
      .sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
  }

  /** Cached unread mail, newest first */
  listMail(): MailItem[] {
    return [...this.snapshot.mails.values()]
      .map((item) => ({ ...item }))
      .sort((a, b) => b.receivedTime.getTime() - a.receivedTime.getTime());
  }

  getStatus(): CacheStatus {
    const { ready, fetchedAt, appointments, mails } = this.snapshot;
    let pendingAppointments = 0;
    for (const item of appointments.values()) if (!item.notified) pendingAppointments++;
    let pendingMails = 0;
    for (const item of mails.values()) if (!item.notified) pendingMails++;
    return {
      ready,
      fetchedAt,
      appointments: appointments.size,
      mails: mails.size,
      pendingAppointments,
      pendingMails,
    };
  }

  private itemsOf(kind: ItemKind): ReadonlyMap<string, Appointment | MailItem> {
    return kind === 'appointment' ? this.snapshot.appointments : this.snapshot.mails;
  }

  private pruneClaims(kind: ItemKind, live: ReadonlyMap<string, unknown>): void {
    const claims = this.claims[kind];
    for (const id of claims) {
      if (!live.has(id)) claims.delete(id);
    }
  }
}
