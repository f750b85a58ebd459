import type { AppointmentIntent, PartialSlots, SlotName, StructuredCommand } from '../../types';
import { assertNever } from '../../utils/helpers';

/**
 * Slots each appointment intent needs before it can be dispatched.
 * ListAppointments is satisfied by either of its slots.
 */
export const REQUIRED_SLOTS: Record<AppointmentIntent, readonly SlotName[]> = {
  ScheduleAppointment: ['person', 'date', 'time'],
  CheckAvailability: ['person', 'date'],
  CancelAppointment: ['person', 'date', 'time'],
  ListAppointments: ['person', 'date'],
};

/** Slots an intent reads at all; anything else is ignored while filling */
export const ACCEPTED_SLOTS: Record<AppointmentIntent, readonly SlotName[]> = {
  ScheduleAppointment: ['person', 'date', 'time', 'recurrence'],
  CheckAvailability: ['person', 'date', 'time'],
  CancelAppointment: ['person', 'date', 'time'],
  ListAppointments: ['person', 'date'],
};

export function missingSlots(intent: AppointmentIntent, slots: PartialSlots): SlotName[] {
  if (intent === 'ListAppointments') {
    return slots.person || slots.date ? [] : ['person', 'date'];
  }
  return REQUIRED_SLOTS[intent].filter(slot => !slots[slot]);
}

/**
 * Drop slots the intent does not read
 */
export function retainAccepted(intent: AppointmentIntent, slots: PartialSlots): PartialSlots {
  const retained: PartialSlots = {};
  for (const slot of ACCEPTED_SLOTS[intent]) {
    const value = slots[slot];
    if (value) retained[slot] = value;
  }
  return retained;
}

/**
 * Command for a fully filled intent, or null while slots are missing
 */
export function buildCommand(intent: AppointmentIntent, slots: PartialSlots): StructuredCommand | null {
  const { person, date, time, recurrence } = slots;

  switch (intent) {
    case 'ScheduleAppointment':
      return person && date && time
        ? { intent, person, date, time, recurrence: recurrence ?? null }
        : null;
    case 'CheckAvailability':
      return person && date ? { intent, person, date, time: time ?? null } : null;
    case 'CancelAppointment':
      return person && date && time ? { intent, person, date, time } : null;
    case 'ListAppointments':
      return person || date ? { intent, person: person ?? null, date: date ?? null } : null;
    default:
      return assertNever(intent, 'intent');
  }
}
