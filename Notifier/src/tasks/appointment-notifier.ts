import { ItemNotifier, type ItemNotifierOptions } from './item-notifier.js';
import { buildAppointmentMessage } from '../format/messages.js';
import type { Appointment } from '../types/notifier.js';

export interface AppointmentNotifierOptions extends ItemNotifierOptions {
  /** How long before the start an appointment is announced */
  notifyLeadSeconds: number;
  timeZone: string;
}

/**
 * Announces appointments once their start is within the lead time.
 */
export class AppointmentNotifier extends ItemNotifier<Appointment> {
  private readonly notifyLeadSeconds: number;
  private readonly timeZone: string;

  constructor(options: AppointmentNotifierOptions) {
    super('appointments', 'appointment', options);
    this.notifyLeadSeconds = options.notifyLeadSeconds;
    this.timeZone = options.timeZone;
  }

  protected collect(now: Date): Appointment[] {
    return this.store.dueAppointments(now, this.notifyLeadSeconds);
  }

  protected format(item: Appointment, now: Date): string {
    return buildAppointmentMessage(item, this.timeZone, now);
  }
}
