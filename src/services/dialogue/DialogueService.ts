import { DialogueManager } from '../../core/dialogue/DialogueManager';
import { Prompts } from '../../core/dialogue/prompts';
import { CollaboratorUnavailableError } from '../../core/errors';
import type { ContextStore } from '../../core/memory/ContextStore';
import { applyDispatched, createConversationContext, recordTurns } from '../../core/memory/conversationContext';
import type { ConversationContext, DialogueOutcome, StructuredCommand } from '../../types';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { ConversationLock } from '../concurrency/ConversationLock';
import type { CommandDispatcher, DispatchResult } from '../dispatch/CommandDispatcher';
import { ResponseFormatter } from '../response/ResponseFormatter';

const RESET = /^\s*(?:start over|reset|restart)\b/i;
const RETRY = /^\s*(?:retry|try again|yes|yeah|yep|sure|ok|okay|please)\b/i;

/** One utterance; `now` anchors relative dates and defaults to the current time */
export interface TurnRequest {
  text: string;
  conversationId: string;
  isSpeech?: boolean;
  now?: Date;
}

export interface TurnReply {
  conversationId: string;
  response: string;
  /** null when the turn never reached the dialogue manager (reset, busy) */
  outcome: DialogueOutcome | null;
  /** The command could not be delivered and can be retried */
  retryable: boolean;
}

export type TurnResult = { status: 'ok'; reply: TurnReply } | { status: 'busy'; reply: TurnReply };

export interface DialogueServiceDeps {
  manager: DialogueManager;
  contextStore: ContextStore;
  dispatcher: CommandDispatcher;
  formatter?: ResponseFormatter;
  lock?: ConversationLock;
  logger?: Logger;
}

/**
 * DialogueService - transport-facing turn handling.
 * Serializes turns per conversation, runs the dialogue manager and delivers
 * dispatched commands to their collaborators.
 */
export class DialogueService {
  private readonly manager: DialogueManager;
  private readonly store: ContextStore;
  private readonly dispatcher: CommandDispatcher;
  private readonly formatter: ResponseFormatter;
  private readonly lock: ConversationLock;
  private readonly logger: Logger;

  constructor(deps: DialogueServiceDeps) {
    this.manager = deps.manager;
    this.store = deps.contextStore;
    this.dispatcher = deps.dispatcher;
    this.formatter = deps.formatter ?? new ResponseFormatter();
    this.lock = deps.lock ?? new ConversationLock();
    this.logger = deps.logger ?? defaultLogger;
  }

  async handleTurn(request: TurnRequest): Promise<TurnResult> {
    const attempt = await this.lock.runExclusive(request.conversationId, async () => {
      const reply = await this.runTurn(request);
      this.remember(request, reply);
      return reply;
    });
    if (attempt.status === 'rejected') {
      this.logger.warn(`⏳ Conversation ${request.conversationId} is busy; turn rejected`);
      return { status: 'busy', reply: this.busyReply(request.conversationId, request.isSpeech) };
    }
    return { status: 'ok', reply: attempt.result };
  }

  /**
   * Forget a conversation. Refused while one of its turns is in flight, so a
   * finishing turn cannot write the old context back.
   */
  async reset(conversationId: string): Promise<'reset' | 'busy'> {
    const attempt = await this.lock.runExclusive(conversationId, async () => {
      this.store.reset(conversationId);
    });
    if (attempt.status === 'rejected') {
      this.logger.warn(`⏳ Conversation ${conversationId} is busy; reset rejected`);
      return 'busy';
    }
    return 'reset';
  }

  busyReply(conversationId: string, isSpeech = false): TurnReply {
    return {
      conversationId,
      response: this.formatter.formatBusy(isSpeech),
      outcome: null,
      retryable: true,
    };
  }

  private async runTurn(request: TurnRequest): Promise<TurnReply> {
    const { text, conversationId } = request;
    const isSpeech = request.isSpeech ?? false;
    const now = request.now ?? new Date();
    this.logger.info(`📨 [${conversationId}] "${text}"`);

    if (RESET.test(text)) {
      this.store.reset(conversationId);
      return this.reply(conversationId, "Okay, let's start over. What would you like to do?", null, isSpeech);
    }

    const snapshot = this.store.get(conversationId);
    const undelivered = snapshot?.undeliveredCommand ?? null;

    if (snapshot !== null && undelivered !== null) {
      if (RETRY.test(text)) {
        this.logger.info(`🔁 [${conversationId}] Redispatching ${undelivered.intent}`);
        const outcome: DialogueOutcome = {
          kind: 'Dispatch',
          command: undelivered,
          promptText: Prompts.dispatching(undelivered),
        };
        return this.deliver(outcome, undelivered, request, now, snapshot);
      }
      snapshot.undeliveredCommand = null;
      this.store.save(snapshot, now.getTime());
    }

    const outcome = await this.manager.processTurn(text, conversationId, now);
    if (outcome.kind !== 'Dispatch') {
      return this.reply(conversationId, outcome.promptText, outcome, isSpeech);
    }
    return this.deliver(outcome, outcome.command, request, now, snapshot);
  }

  /**
   * Hand a command to its collaborator. On failure the pre-turn context comes back
   * with the command kept for a retry.
   */
  private async deliver(
    outcome: DialogueOutcome,
    command: StructuredCommand,
    request: TurnRequest,
    now: Date,
    preTurn: ConversationContext | null
  ): Promise<TurnReply> {
    const { conversationId } = request;
    const isSpeech = request.isSpeech ?? false;

    let result: DispatchResult;
    try {
      result = await this.dispatcher.dispatch(command);
    } catch (error) {
      if (!(error instanceof CollaboratorUnavailableError)) throw error;

      const restored = preTurn ?? createConversationContext(conversationId, now.getTime());
      restored.undeliveredCommand = command;
      this.store.save(restored, now.getTime());
      return {
        conversationId,
        response: this.formatter.formatUnavailable(error, isSpeech),
        outcome,
        retryable: true,
      };
    }

    const context = this.store.getOrCreate(conversationId, now.getTime());
    applyDispatched(context, command);
    if (result.intent === 'ListAppointments' && result.appointments.length === 1) {
      const [only] = result.appointments;
      context.lastAppointmentReference = { person: only.person, date: only.date, time: only.time };
    }
    this.store.save(context, now.getTime());

    return {
      conversationId,
      response: this.formatter.formatResult(result, isSpeech),
      outcome,
      retryable: false,
    };
  }

  /**
   * Append the exchange to the conversation history; a reset conversation stays empty
   */
  private remember(request: TurnRequest, reply: TurnReply): void {
    const context = this.store.get(request.conversationId);
    if (context === null) return;
    recordTurns(context, { role: 'user', text: request.text }, { role: 'assistant', text: reply.response });
    this.store.save(context, (request.now ?? new Date()).getTime());
  }

  private reply(
    conversationId: string,
    text: string,
    outcome: DialogueOutcome | null,
    isSpeech: boolean
  ): TurnReply {
    return { conversationId, response: this.formatter.render(text, isSpeech), outcome, retryable: false };
  }
}
