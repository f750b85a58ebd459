import { CollaboratorUnavailableError } from '../../core/errors';
import type { Appointment, CalendarDate, StructuredCommand, WallClockTime } from '../../types';
import { assertNever } from '../../utils/helpers';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { retryOperation, type RetryOptions } from '../../utils/retry';
import type { AppointmentStore } from '../appointments/AppointmentStore';
import type { KnowledgeOracle } from '../knowledge/KnowledgeOracle';

export type DispatchResult =
  | { intent: 'ScheduleAppointment'; appointment: Appointment }
  | {
      intent: 'CheckAvailability';
      person: string;
      date: CalendarDate;
      time: WallClockTime | null;
      available: boolean;
      /** Free times that day; alternatives when the asked time is taken */
      availableTimes: WallClockTime[];
    }
  | { intent: 'CancelAppointment'; person: string; date: CalendarDate; time: WallClockTime; cancelled: boolean }
  | { intent: 'ListAppointments'; person: string | null; date: CalendarDate | null; appointments: Appointment[] }
  | { intent: 'KnowledgeQuery'; question: string; answer: string }
  /** summary is null when there was nothing to summarize */
  | { intent: 'SummarizeConversation'; summary: string | null };

type CommandOf<I extends StructuredCommand['intent']> = Extract<StructuredCommand, { intent: I }>;

export interface CommandDispatcherDeps {
  store: AppointmentStore;
  oracle: KnowledgeOracle;
  retry?: Pick<RetryOptions, 'maxRetries' | 'delayMs'>;
  logger?: Logger;
}

/**
 * Routes structured commands to the appointment store or the knowledge oracle.
 * Failures that survive the retries surface as CollaboratorUnavailableError.
 */
export class CommandDispatcher {
  private readonly store: AppointmentStore;
  private readonly oracle: KnowledgeOracle;
  private readonly retry: Pick<RetryOptions, 'maxRetries' | 'delayMs'>;
  private readonly logger: Logger;

  constructor(deps: CommandDispatcherDeps) {
    this.store = deps.store;
    this.oracle = deps.oracle;
    this.retry = deps.retry ?? {};
    this.logger = deps.logger ?? defaultLogger;
  }

  async dispatch(command: StructuredCommand): Promise<DispatchResult> {
    this.logger.info(`📤 Dispatching ${command.intent}`);

    switch (command.intent) {
      case 'ScheduleAppointment':
        return this.schedule(command);
      case 'CheckAvailability':
        return this.checkAvailability(command);
      case 'CancelAppointment':
        return this.cancel(command);
      case 'ListAppointments':
        return this.list(command);
      case 'KnowledgeQuery':
        return this.ask(command);
      case 'SummarizeConversation':
        return this.summarize(command);
      default:
        return assertNever(command, 'command');
    }
  }

  private schedule(command: CommandOf<'ScheduleAppointment'>): Promise<DispatchResult> {
    return this.withStore(command, async () => ({
      intent: command.intent,
      appointment: await this.store.addAppointment({
        person: command.person,
        date: command.date,
        time: command.time,
        recurrence: command.recurrence,
      }),
    }));
  }

  private checkAvailability(command: CommandOf<'CheckAvailability'>): Promise<DispatchResult> {
    return this.withStore(command, async () => {
      const availableTimes = await this.store.availableTimes(command.person, command.date);
      const available =
        command.time === null
          ? availableTimes.length > 0
          : (await this.store.checkAvailability(command.person, command.date, command.time)) === 'available';
      return { ...command, available, availableTimes };
    });
  }

  private cancel(command: CommandOf<'CancelAppointment'>): Promise<DispatchResult> {
    return this.withStore(command, async () => ({
      ...command,
      cancelled: await this.store.cancelAppointment(command.person, command.date, command.time),
    }));
  }

  private list(command: CommandOf<'ListAppointments'>): Promise<DispatchResult> {
    return this.withStore(command, async () => ({
      ...command,
      appointments: await this.store.findAppointments(command.person, command.date),
    }));
  }

  private ask(command: CommandOf<'KnowledgeQuery'>): Promise<DispatchResult> {
    return this.attempt('knowledge-oracle', command, async () => ({
      ...command,
      answer: await this.oracle.answer(command.question),
    }));
  }

  private async summarize(command: CommandOf<'SummarizeConversation'>): Promise<DispatchResult> {
    if (command.history.length === 0) {
      return { intent: command.intent, summary: null };
    }
    return this.attempt('knowledge-oracle', command, async () => ({
      intent: command.intent,
      summary: await this.oracle.summarize(command.history),
    }));
  }

  private withStore<T>(command: StructuredCommand, operation: () => Promise<T>): Promise<T> {
    return this.attempt('appointment-store', command, operation);
  }

  private async attempt<T>(
    collaborator: CollaboratorUnavailableError['collaborator'],
    command: StructuredCommand,
    operation: () => Promise<T>
  ): Promise<T> {
    try {
      return await retryOperation(operation, { ...this.retry, logger: this.logger, label: collaborator });
    } catch (error) {
      this.logger.error(`❌ ${collaborator} unavailable for ${command.intent}:`, error);
      throw new CollaboratorUnavailableError(collaborator, command, error);
    }
  }
}
