import type { Appointment, AvailabilityResult, CalendarDate, WallClockTime } from '../../types';

/** Consulted before a schedule command is dispatched */
export interface AvailabilityCheck {
  checkAvailability(person: string, date: CalendarDate, time: WallClockTime): Promise<AvailabilityResult>;
}

/** Consulted to resolve which appointment a cancellation means */
export interface AppointmentLookup {
  findAppointments(person: string | null, date: CalendarDate | null): Promise<Appointment[]>;
}
