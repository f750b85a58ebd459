import type { Appointment, AvailabilityResult, CalendarDate, WallClockTime } from '../../types';
import type { AppointmentStore, AvailabilityWindow, NewAppointment } from './AppointmentStore';
import { candidateTimes, isWithinAvailability } from './availabilityRules';

const samePerson = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

/**
 * Process-local appointment store for DEBUG runs and tests
 */
export class InMemoryAppointmentStore implements AppointmentStore {
  readonly name = 'memory';
  private appointments: Appointment[] = [];
  private windows: AvailabilityWindow[] = [];
  private nextId = 1;

  constructor(seed: { appointments?: NewAppointment[]; windows?: AvailabilityWindow[] } = {}) {
    for (const appointment of seed.appointments ?? []) {
      this.insert(appointment);
    }
    this.windows = [...(seed.windows ?? [])];
  }

  async addAppointment(input: NewAppointment): Promise<Appointment> {
    const existing = this.find(input.person, input.date, input.time);
    return existing ?? this.insert(input);
  }

  async cancelAppointment(person: string, date: CalendarDate, time: WallClockTime): Promise<boolean> {
    const before = this.appointments.length;
    this.appointments = this.appointments.filter(
      a => !(samePerson(a.person, person) && a.date === date && a.time === time)
    );
    return this.appointments.length < before;
  }

  async checkAvailability(person: string, date: CalendarDate, time: WallClockTime): Promise<AvailabilityResult> {
    if (this.find(person, date, time)) return 'conflict';
    return isWithinAvailability(this.windowsFor(person), date, time) ? 'available' : 'conflict';
  }

  async findAppointments(person: string | null, date: CalendarDate | null): Promise<Appointment[]> {
    return this.appointments
      .filter(a => (person === null || samePerson(a.person, person)) && (date === null || a.date === date))
      .sort((a, b) => a.date.localeCompare(b.date) || a.time.localeCompare(b.time))
      .map(a => ({ ...a }));
  }

  async availableTimes(person: string, date: CalendarDate): Promise<WallClockTime[]> {
    const booked = new Set((await this.findAppointments(person, date)).map(a => a.time));
    return candidateTimes(this.windowsFor(person), date).filter(time => !booked.has(time));
  }

  private windowsFor(person: string): AvailabilityWindow[] {
    return this.windows.filter(w => samePerson(w.person, person));
  }

  private find(person: string, date: CalendarDate, time: WallClockTime): Appointment | undefined {
    return this.appointments.find(a => samePerson(a.person, person) && a.date === date && a.time === time);
  }

  private insert(input: NewAppointment): Appointment {
    const appointment: Appointment = {
      id: String(this.nextId++),
      person: input.person,
      date: input.date,
      time: input.time,
      description: input.description ?? '',
      recurrence: input.recurrence ?? null,
    };
    this.appointments.push(appointment);
    return { ...appointment };
  }
}
