import type {
  Appointment,
  AppointmentIntent,
  Intent,
  Mode,
  PartialSlots,
  SlotName,
  StructuredCommand,
} from '../../types';
import { assertNever, joinWithAnd, joinWithOr } from '../../utils/helpers';
import { TimeFormatter } from '../../utils/time';

const INTENT_LABELS: Record<Intent, string> = {
  ScheduleAppointment: 'schedule an appointment',
  CheckAvailability: 'check availability',
  CancelAppointment: 'cancel an appointment',
  ListAppointments: 'see your appointments',
  KnowledgeQuery: 'ask a general question',
  SwitchMode: 'switch modes',
  Unknown: 'do something else',
};

const MODE_LABELS: Record<Mode, string> = {
  Appointment: 'appointment mode',
  Knowledge: 'knowledge mode',
};

const day = (date: string): string => TimeFormatter.formatDateForDisplay(date);
const clock = (time: string): string => TimeFormatter.formatTimeForDisplay(time);

/**
 * User-facing wording for every dialogue outcome
 */
export const Prompts = {
  askIntent(): string {
    return "I'm not sure what you'd like to do. You can schedule, check, cancel or list appointments.";
  },

  askIntentAmong(competitors: readonly Intent[]): string {
    if (competitors.length < 2) return this.askIntent();
    return `Did you want to ${joinWithOr(competitors.map(intent => INTENT_LABELS[intent]))}?`;
  },

  askKnowledgeQuestion(): string {
    return 'What would you like to know?';
  },

  /**
   * Ask for the first missing slot, phrased with what is already known
   */
  askSlots(intent: AppointmentIntent, slots: PartialSlots, missing: readonly SlotName[]): string {
    const { person, date } = slots;

    switch (intent) {
      case 'ScheduleAppointment':
        if (!person) return 'Who would you like to schedule an appointment with?';
        if (!date) {
          return missing.includes('time')
            ? `What day and time would you like to schedule with ${person}?`
            : `What day would you like to schedule with ${person}?`;
        }
        return `What time would you like for your appointment with ${person} on ${day(date)}?`;
      case 'CheckAvailability':
        if (!person) return 'Whose availability would you like to check?';
        return `For which date would you like to check ${person}'s availability?`;
      case 'CancelAppointment':
        if (!person) return 'Whose appointment would you like to cancel?';
        if (!date) return `Which day is your appointment with ${person}?`;
        return `What time is your appointment with ${person} on ${day(date)}?`;
      case 'ListAppointments':
        return 'Whose appointments, or which date, would you like to see?';
      default:
        return assertNever(intent, 'intent');
    }
  },

  conflict(person: string, date: string, time: string): string {
    return `${person} isn't available on ${day(date)} at ${clock(time)}. What other time would work?`;
  },

  chooseAppointment(person: string, appointments: readonly Appointment[]): string {
    const options = appointments.map(a => `${day(a.date)} at ${clock(a.time)}`);
    return `You have ${appointments.length} appointments with ${person}: ${joinWithAnd(options)}. Which one would you like to cancel?`;
  },

  noAppointmentsWith(person: string): string {
    return `I couldn't find any appointments with ${person}. What would you like to do?`;
  },

  offerSwitch(target: Mode): string {
    return target === 'Knowledge'
      ? 'That sounds like a general question. Would you like to switch to knowledge mode?'
      : 'That sounds like an appointment request. Would you like to switch to appointment mode?';
  },

  switched(mode: Mode): string {
    return mode === 'Knowledge'
      ? 'Switched to knowledge mode. What would you like to know?'
      : 'Switched to appointment mode. What would you like to do?';
  },

  alreadyIn(mode: Mode): string {
    return `You're already in ${MODE_LABELS[mode]}.`;
  },

  apology(): string {
    return "Sorry, something went wrong and I had to start over. What would you like to do?";
  },

  /**
   * Acknowledgement shown while a command is dispatched
   */
  dispatching(command: StructuredCommand): string {
    switch (command.intent) {
      case 'ScheduleAppointment':
        return `Scheduling your appointment with ${command.person} on ${day(command.date)} at ${clock(command.time)}.`;
      case 'CheckAvailability':
        return command.time
          ? `Checking ${command.person}'s availability on ${day(command.date)} at ${clock(command.time)}.`
          : `Checking ${command.person}'s availability on ${day(command.date)}.`;
      case 'CancelAppointment':
        return `Cancelling your appointment with ${command.person} on ${day(command.date)} at ${clock(command.time)}.`;
      case 'ListAppointments':
        return 'Looking up your appointments.';
      case 'KnowledgeQuery':
        return 'Let me look that up.';
      case 'SummarizeConversation':
        return 'Let me sum up our conversation.';
      default:
        return assertNever(command, 'command');
    }
  },
};
