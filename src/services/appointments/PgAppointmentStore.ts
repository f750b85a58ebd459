import type { QueryResultRow } from 'pg';
import type { SqlClient } from '../../config/database';
import type { Appointment, AvailabilityResult, CalendarDate, WallClockTime } from '../../types';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import type { AppointmentStore, AvailabilityWindow, NewAppointment } from './AppointmentStore';
import { candidateTimes, isWithinAvailability } from './availabilityRules';

export class AppointmentStoreError extends Error {
  constructor(
    public readonly operation: string,
    public readonly cause?: unknown
  ) {
    super(`Appointment store ${operation} failed: ${cause instanceof Error ? cause.message : 'Unknown error'}`);
    this.name = 'AppointmentStoreError';
  }
}

type AppointmentRow = {
  id: string | number;
  person: string;
  date: string;
  time: string;
  description: string | null;
  recurrence: string | null;
};

type WindowRow = {
  person: string;
  day_of_week: number;
  start_time: string;
  end_time: string;
};

const APPOINTMENT_COLUMNS = `id, person,
  to_char(appointment_date, 'YYYY-MM-DD') AS date,
  to_char(appointment_time, 'HH24:MI') AS time,
  description, recurrence`;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS appointments (
  id SERIAL PRIMARY KEY,
  person VARCHAR(100) NOT NULL,
  appointment_date DATE NOT NULL,
  appointment_time TIME NOT NULL,
  description TEXT,
  recurrence VARCHAR(100),
  created_at TIMESTAMPTZ DEFAULT NOW()
);
CREATE TABLE IF NOT EXISTS availability (
  id SERIAL PRIMARY KEY,
  person VARCHAR(100) NOT NULL,
  day_of_week INT NOT NULL CHECK (day_of_week BETWEEN 0 AND 6),
  start_time TIME NOT NULL,
  end_time TIME NOT NULL,
  UNIQUE (person, day_of_week, start_time)
);`;

/**
 * Postgres-backed appointment store.
 * Person names compare case-insensitively; dates and times travel as canonical strings.
 */
export class PgAppointmentStore implements AppointmentStore {
  readonly name = 'postgres';

  constructor(
    private readonly db: SqlClient,
    private readonly logger: Logger = defaultLogger
  ) {}

  async ensureSchema(): Promise<void> {
    await this.run('ensureSchema', SCHEMA_SQL);
    this.logger.info('✅ Appointment tables created/verified');
  }

  async addAppointment(input: NewAppointment): Promise<Appointment> {
    const existing = await this.run<AppointmentRow>(
      'addAppointment',
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments
       WHERE lower(person) = lower($1) AND appointment_date = $2 AND appointment_time = $3`,
      [input.person, input.date, input.time]
    );
    if (existing.length > 0) {
      this.logger.info(`Appointment already exists for ${input.person} on ${input.date} at ${input.time}`);
      return toAppointment(existing[0]);
    }

    const inserted = await this.run<AppointmentRow>(
      'addAppointment',
      `INSERT INTO appointments (person, appointment_date, appointment_time, description, recurrence)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${APPOINTMENT_COLUMNS}`,
      [input.person, input.date, input.time, input.description ?? '', input.recurrence ?? null]
    );
    if (inserted.length === 0) {
      throw new AppointmentStoreError('addAppointment');
    }
    return toAppointment(inserted[0]);
  }

  async cancelAppointment(person: string, date: CalendarDate, time: WallClockTime): Promise<boolean> {
    const deleted = await this.run<{ id: number }>(
      'cancelAppointment',
      `DELETE FROM appointments
       WHERE lower(person) = lower($1) AND appointment_date = $2 AND appointment_time = $3
       RETURNING id`,
      [person, date, time]
    );
    return deleted.length > 0;
  }

  async checkAvailability(person: string, date: CalendarDate, time: WallClockTime): Promise<AvailabilityResult> {
    const booked = await this.run<{ count: number }>(
      'checkAvailability',
      `SELECT COUNT(*)::int AS count FROM appointments
       WHERE lower(person) = lower($1) AND appointment_date = $2 AND appointment_time = $3`,
      [person, date, time]
    );
    if ((booked[0]?.count ?? 0) > 0) return 'conflict';

    const windows = await this.windowsFor(person);
    return isWithinAvailability(windows, date, time) ? 'available' : 'conflict';
  }

  async findAppointments(person: string | null, date: CalendarDate | null): Promise<Appointment[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (person !== null) {
      params.push(person);
      conditions.push(`lower(person) = lower($${params.length})`);
    }
    if (date !== null) {
      params.push(date);
      conditions.push(`appointment_date = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await this.run<AppointmentRow>(
      'findAppointments',
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments ${where}
       ORDER BY appointment_date, appointment_time`,
      params
    );
    return rows.map(toAppointment);
  }

  async availableTimes(person: string, date: CalendarDate): Promise<WallClockTime[]> {
    const [windows, booked] = await Promise.all([this.windowsFor(person), this.findAppointments(person, date)]);
    const taken = new Set(booked.map(a => a.time));
    return candidateTimes(windows, date).filter(time => !taken.has(time));
  }

  private async windowsFor(person: string): Promise<AvailabilityWindow[]> {
    const rows = await this.run<WindowRow>(
      'availability',
      `SELECT person, day_of_week,
         to_char(start_time, 'HH24:MI') AS start_time,
         to_char(end_time, 'HH24:MI') AS end_time
       FROM availability WHERE lower(person) = lower($1)`,
      [person]
    );
    return rows.map(row => ({
      person: row.person,
      dayOfWeek: row.day_of_week,
      startTime: row.start_time,
      endTime: row.end_time,
    }));
  }

  private async run<T extends QueryResultRow>(operation: string, sql: string, params: unknown[] = []): Promise<T[]> {
    try {
      return await this.db.query<T>(sql, params);
    } catch (error) {
      this.logger.error(`Database error in ${operation}:`, error);
      throw new AppointmentStoreError(operation, error);
    }
  }
}

function toAppointment(row: AppointmentRow): Appointment {
  return {
    id: String(row.id),
    person: row.person,
    date: row.date,
    time: row.time,
    description: row.description ?? '',
    recurrence: row.recurrence ?? null,
  };
}
