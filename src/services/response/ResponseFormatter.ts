import type { CollaboratorUnavailableError } from '../../core/errors';
import { assertNever, joinWithAnd } from '../../utils/helpers';
import { TextUtils } from '../../utils/text';
import { TimeFormatter } from '../../utils/time';
import type { DispatchResult } from '../dispatch/CommandDispatcher';

const day = (date: string): string => TimeFormatter.formatDateForDisplay(date);
const clock = (time: string): string => TimeFormatter.formatTimeForDisplay(time);

/**
 * ResponseFormatter - turns dispatch results into chat replies.
 * Replies may carry markdown; speech output gets it stripped.
 */
export class ResponseFormatter {
  render(text: string, isSpeech: boolean): string {
    return isSpeech ? TextUtils.stripMarkdown(text) : text;
  }

  formatResult(result: DispatchResult, isSpeech = false): string {
    return this.render(this.describe(result), isSpeech);
  }

  formatUnavailable(error: CollaboratorUnavailableError, isSpeech = false): string {
    const text =
      error.collaborator === 'knowledge-oracle'
        ? "I'm sorry, I couldn't retrieve that information right now. Say **retry** to try again."
        : "I'm sorry, I couldn't reach the appointment system right now. Say **retry** to try again.";
    return this.render(text, isSpeech);
  }

  formatBusy(isSpeech = false): string {
    return this.render("I'm still working on your previous message. Please wait a moment.", isSpeech);
  }

  private describe(result: DispatchResult): string {
    switch (result.intent) {
      case 'ScheduleAppointment': {
        const { person, date, time, recurrence } = result.appointment;
        const repeats = recurrence ? ` It repeats ${recurrence}.` : '';
        return `Great! Your appointment with **${person}** has been scheduled for ${day(date)} at ${clock(time)}.${repeats}`;
      }

      case 'CheckAvailability': {
        const { person, date, time, available, availableTimes } = result;
        const free = joinWithAnd(availableTimes.map(clock));
        if (time !== null) {
          if (available) return `**${person}** is available on ${day(date)} at ${clock(time)}.`;
          const alternatives = availableTimes.length > 0 ? ` Free times that day: ${free}.` : '';
          return `**${person}** isn't available on ${day(date)} at ${clock(time)}.${alternatives}`;
        }
        return available
          ? `**${person}** is available on ${day(date)} at the following times: ${free}.`
          : `**${person}** has no free times on ${day(date)}.`;
      }

      case 'CancelAppointment': {
        const { person, date, time, cancelled } = result;
        return cancelled
          ? `I've cancelled your appointment with **${person}** on ${day(date)} at ${clock(time)}. Is there anything else I can help you with?`
          : `I couldn't find an appointment with **${person}** on ${day(date)} at ${clock(time)}.`;
      }

      case 'ListAppointments': {
        const scope = [
          result.person ? ` with ${result.person}` : '',
          result.date ? ` on ${day(result.date)}` : '',
        ].join('');
        if (result.appointments.length === 0) {
          return `You have no appointments${scope}.`;
        }
        const lines = result.appointments.map(a => `- **${a.person}** on ${day(a.date)} at ${clock(a.time)}`);
        return `Here are your appointments${scope}:\n${lines.join('\n')}`;
      }

      case 'KnowledgeQuery':
        return result.answer;

      case 'SummarizeConversation':
        return result.summary ?? "We haven't discussed anything yet. What would you like to do?";

      default:
        return assertNever(result, 'dispatch result');
    }
  }
}
