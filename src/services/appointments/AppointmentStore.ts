import type { AppointmentLookup, AvailabilityCheck } from '../../core/dialogue/collaborators';
import type { Appointment, CalendarDate, WallClockTime } from '../../types';

export interface NewAppointment {
  person: string;
  date: CalendarDate;
  time: WallClockTime;
  description?: string;
  recurrence?: string | null;
}

/** Weekly availability window; dayOfWeek 0 = Monday … 6 = Sunday */
export interface AvailabilityWindow {
  person: string;
  dayOfWeek: number;
  startTime: WallClockTime;
  endTime: WallClockTime;
}

export interface AppointmentStore extends AvailabilityCheck, AppointmentLookup {
  readonly name: string;
  /** Booking an existing person/date/time returns the existing appointment */
  addAppointment(input: NewAppointment): Promise<Appointment>;
  /** false when nothing matched */
  cancelAppointment(person: string, date: CalendarDate, time: WallClockTime): Promise<boolean>;
  availableTimes(person: string, date: CalendarDate): Promise<WallClockTime[]>;
}
