import { DialogueConfig } from '../../config/dialogue';
import type {
  Appointment,
  AppointmentIntent,
  Classification,
  ConversationContext,
  DialogueOutcome,
  Entity,
  EntityKind,
  Mode,
  PartialSlots,
  SlotName,
  StructuredCommand,
} from '../../types';
import { APPOINTMENT_INTENTS } from '../../types';
import { logger as defaultLogger, type Logger } from '../../utils/logger';
import { ContextInvariantViolationError, LowConfidenceError } from '../errors';
import type { ContextStore } from '../memory/ContextStore';
import { applyDispatched, assertContextInvariants, clearPending, setPending } from '../memory/conversationContext';
import { DateTimeNormalizer } from '../nlp/DateTimeNormalizer';
import { EntityExtractor } from '../nlp/EntityExtractor';
import { PatternIntentClassifier, type IntentClassifier } from '../nlp/IntentClassifier';
import { stripSwitchPhrase, SUMMARY_PATTERN } from '../nlp/intentPatterns';
import type { AppointmentLookup, AvailabilityCheck } from './collaborators';
import { ModeSwitchDetector } from './ModeSwitchDetector';
import { Prompts } from './prompts';
import { buildCommand, missingSlots, retainAccepted } from './slots';

export type DialogueState = 'Idle' | 'AwaitingSlots';

export interface DialogueManagerDeps {
  contextStore: ContextStore;
  classifier?: IntentClassifier;
  extractor?: EntityExtractor;
  normalizer?: DateTimeNormalizer;
  availability?: AvailabilityCheck;
  lookup?: AppointmentLookup;
  logger?: Logger;
}

export function dialogueStateOf(context: ConversationContext): DialogueState {
  return context.pendingIntent === null ? 'Idle' : 'AwaitingSlots';
}

const SLOT_FOR_KIND: Record<EntityKind, SlotName> = {
  Person: 'person',
  DateExpr: 'date',
  TimeExpr: 'time',
  Recurrence: 'recurrence',
};

function isAppointmentIntent(intent: string): intent is AppointmentIntent {
  return APPOINTMENT_INTENTS.some(candidate => candidate === intent);
}

/**
 * Dialogue Manager
 *
 * Slot-filling state machine: Idle → AwaitingSlots → Ready → dispatch → Idle.
 * Each turn works on a copy of the stored context, which is saved only once the
 * turn has produced its outcome.
 */
export class DialogueManager {
  private readonly store: ContextStore;
  private readonly classifier: IntentClassifier;
  private readonly extractor: EntityExtractor;
  private readonly normalizer: DateTimeNormalizer;
  private readonly switchDetector = new ModeSwitchDetector();
  private readonly availability: AvailabilityCheck | null;
  private readonly lookup: AppointmentLookup | null;
  private readonly logger: Logger;

  constructor(deps: DialogueManagerDeps) {
    this.store = deps.contextStore;
    this.extractor = deps.extractor ?? new EntityExtractor();
    this.classifier = deps.classifier ?? new PatternIntentClassifier(this.extractor);
    this.normalizer = deps.normalizer ?? new DateTimeNormalizer();
    this.availability = deps.availability ?? null;
    this.lookup = deps.lookup ?? null;
    this.logger = deps.logger ?? defaultLogger;
  }

  async processTurn(text: string, conversationId: string, now: Date = new Date()): Promise<DialogueOutcome> {
    const context = this.store.getOrCreate(conversationId, now.getTime());
    const before = dialogueStateOf(context);

    try {
      assertContextInvariants(context);
      const outcome = await this.step(text, context, now);
      assertContextInvariants(context);
      this.store.save(context, now.getTime());

      const after = dialogueStateOf(context);
      if (before !== after) {
        this.logger.info(`🔄 [${conversationId}] ${before} → ${after}`);
      }
      this.logger.debug(`💬 [${conversationId}] ${outcome.kind}: ${outcome.promptText}`);
      return outcome;
    } catch (error) {
      if (error instanceof ContextInvariantViolationError) {
        this.logger.error(`❌ ${error.message}; resetting conversation`);
        this.store.reset(conversationId);
        return { kind: 'Clarify', missingSlots: [], missingIntent: true, promptText: Prompts.apology() };
      }
      throw error;
    }
  }

  private async step(text: string, context: ConversationContext, now: Date): Promise<DialogueOutcome> {
    const classification = this.classifier.classify(text, context.activeMode);
    this.logger.debug(
      `🎯 Classified "${text}" as ${classification.intent} (${classification.confidence.toFixed(2)})`
    );

    if (context.pendingSwitchOffer !== null) {
      const offered = context.pendingSwitchOffer;
      context.pendingSwitchOffer = null;
      const reply = this.switchDetector.readOfferReply(text);

      if (reply === 'accept') {
        return this.switchMode(context, offered);
      }
      if (reply === 'decline') {
        return this.reprompt(context);
      }
    }

    // Either mode; the mode and any pending request stay as they are
    if (SUMMARY_PATTERN.test(text)) {
      return this.dispatch({ intent: 'SummarizeConversation', history: [...context.history] });
    }

    if (this.answersPendingSlot(text, classification, context)) {
      return this.handleAppointment(text, classification, context, now);
    }

    const decision = this.switchDetector.decide(classification, context.activeMode);
    switch (decision.kind) {
      case 'already':
        return { kind: 'ModeSwitched', newMode: decision.mode, promptText: Prompts.alreadyIn(decision.mode) };
      case 'switch':
        if (!decision.silent) {
          return this.switchMode(context, decision.target);
        }
        this.enterMode(context, decision.target);
        break;
      case 'offer':
        context.pendingSwitchOffer = decision.target;
        return { kind: 'ModeSwitchOffer', targetMode: decision.target, promptText: Prompts.offerSwitch(decision.target) };
      case 'none':
        break;
    }

    const content = classification.switchTarget !== null ? stripSwitchPhrase(text) : text;

    if (context.activeMode === 'Knowledge') {
      return this.handleKnowledge(content, classification);
    }
    return this.handleAppointment(content, classification, context, now);
  }

  /**
   * "What about Sarah?" while a request waits on its person: a slot answer
   * phrased as a question, not a general question
   */
  private answersPendingSlot(text: string, classification: Classification, context: ConversationContext): boolean {
    const pending = context.pendingIntent;
    if (pending === null || classification.switchTarget !== null || classification.intent !== 'KnowledgeQuery') {
      return false;
    }
    const missing = new Set<SlotName>(missingSlots(pending, context.partialSlots));
    return this.extractor
      .extract(text)
      .some(entity => missing.has(SLOT_FOR_KIND[this.kindInContext(entity, missing)]));
  }

  private handleKnowledge(question: string, classification: Classification): DialogueOutcome {
    if (classification.intent === 'KnowledgeQuery' && question.length > 0) {
      return this.dispatch({ intent: 'KnowledgeQuery', question });
    }
    return { kind: 'Clarify', missingSlots: [], missingIntent: true, promptText: Prompts.askKnowledgeQuestion() };
  }

  private async handleAppointment(
    text: string,
    classification: Classification,
    context: ConversationContext,
    now: Date
  ): Promise<DialogueOutcome> {
    const { intent, confidence } = classification;
    const confident = confidence >= DialogueConfig.CONFIDENCE_THRESHOLD;

    if (isAppointmentIntent(intent) && confident && intent !== context.pendingIntent) {
      if (context.pendingIntent !== null) {
        this.logger.info(`🔀 Replacing pending ${context.pendingIntent} with ${intent}`);
      }
      setPending(context, intent, {});
    }

    const pending = context.pendingIntent;
    if (pending === null) {
      if (isAppointmentIntent(intent)) {
        const error = new LowConfidenceError(confidence, classification.competitors);
        this.logger.debug(`🤔 ${error.message}`);
        return {
          kind: 'Clarify',
          missingSlots: [],
          missingIntent: true,
          promptText: Prompts.askIntentAmong(error.competitors),
        };
      }
      return { kind: 'Clarify', missingSlots: [], missingIntent: true, promptText: Prompts.askIntent() };
    }

    const slots = this.mergeSlots(pending, context.partialSlots, this.extractor.extract(text), now);
    this.applyReference(pending, slots, context);

    if (pending === 'CancelAppointment') {
      const resolved = await this.resolveCancelTarget(slots, context);
      if (resolved) return resolved;
    }

    const missing = missingSlots(pending, slots);
    const command = buildCommand(pending, slots);
    if (missing.length > 0 || command === null) {
      setPending(context, pending, slots);
      return { kind: 'Clarify', missingSlots: missing, missingIntent: false, promptText: Prompts.askSlots(pending, slots, missing) };
    }

    if (command.intent === 'ScheduleAppointment' && (await this.hasConflict(command))) {
      const withoutTime: PartialSlots = { ...slots };
      delete withoutTime.time;
      setPending(context, pending, withoutTime);
      return {
        kind: 'Clarify',
        missingSlots: ['time'],
        missingIntent: false,
        promptText: Prompts.conflict(command.person, command.date, command.time),
      };
    }

    applyDispatched(context, command);
    return this.dispatch(command);
  }

  /**
   * Merge this turn's entities into the pending slots.
   * A slot is overwritten only when the utterance re-specifies it.
   */
  private mergeSlots(intent: AppointmentIntent, current: PartialSlots, entities: Entity[], now: Date): PartialSlots {
    const slots: PartialSlots = { ...current };
    const missing = new Set<SlotName>(missingSlots(intent, current));

    const dateTexts: string[] = [];
    const timeTexts: string[] = [];

    for (const entity of entities) {
      switch (this.kindInContext(entity, missing)) {
        case 'Person':
          // A bare word only answers an open person slot; "with X" re-specifies it
          if (entity.value && (!current.person || entity.cue)) slots.person = entity.value;
          break;
        case 'DateExpr':
          dateTexts.push(entity.rawText);
          break;
        case 'TimeExpr':
          timeTexts.push(entity.rawText);
          break;
        case 'Recurrence':
          slots.recurrence = entity.rawText.toLowerCase();
          break;
      }
    }

    const dateExpr = dateTexts[0] ?? null;
    const timeExpr = timeTexts.length > 0 ? timeTexts.join(' ') : null;
    if (dateExpr !== null || timeExpr !== null) {
      const result = this.normalizer.normalize(dateExpr, timeExpr, now);
      if (result.success) {
        if (result.value.date) slots.date = result.value.date;
        if (result.value.time) slots.time = result.value.time;
      } else {
        this.logger.debug(`⏳ ${result.error.message}; slot stays empty`);
      }
    }

    return retainAccepted(intent, slots);
  }

  /**
   * Ambiguous spans take the kind whose slot is still missing
   */
  private kindInContext(entity: Entity, missing: Set<SlotName>): EntityKind {
    if (entity.candidateKinds.length < 2) return entity.kind;
    return entity.candidateKinds.find(kind => missing.has(SLOT_FOR_KIND[kind])) ?? entity.kind;
  }

  /**
   * "cancel this appointment": fill Cancel slots from the last appointment discussed
   */
  private applyReference(intent: AppointmentIntent, slots: PartialSlots, context: ConversationContext): void {
    const reference = context.lastAppointmentReference;
    if (intent !== 'CancelAppointment' || reference === null) return;

    const compatible =
      (!slots.person || slots.person.toLowerCase() === reference.person.toLowerCase()) &&
      (!slots.date || slots.date === reference.date) &&
      (!slots.time || slots.time === reference.time);
    if (!compatible) return;

    slots.person ??= reference.person;
    slots.date ??= reference.date;
    slots.time ??= reference.time;
  }

  /**
   * Cancel with a person but no exact slot: look the appointment up first
   */
  private async resolveCancelTarget(slots: PartialSlots, context: ConversationContext): Promise<DialogueOutcome | null> {
    const { person } = slots;
    if (!person || (slots.date && slots.time) || this.lookup === null) return null;

    let appointments: Appointment[];
    try {
      appointments = await this.lookup.findAppointments(person, slots.date ?? null);
    } catch (error) {
      this.logger.warn('⚠️ Appointment lookup failed, asking for the details instead:', error);
      return null;
    }

    const matches = appointments.filter(a => !slots.time || a.time === slots.time);
    if (matches.length === 1) {
      slots.date = matches[0].date;
      slots.time = matches[0].time;
      return null;
    }
    if (matches.length > 1) {
      setPending(context, 'CancelAppointment', slots);
      const missing = missingSlots('CancelAppointment', slots);
      return {
        kind: 'Clarify',
        missingSlots: missing,
        missingIntent: false,
        promptText: Prompts.chooseAppointment(person, matches),
      };
    }

    clearPending(context);
    return { kind: 'Clarify', missingSlots: [], missingIntent: true, promptText: Prompts.noAppointmentsWith(person) };
  }

  private async hasConflict(command: Extract<StructuredCommand, { intent: 'ScheduleAppointment' }>): Promise<boolean> {
    if (this.availability === null) return false;
    try {
      const result = await this.availability.checkAvailability(command.person, command.date, command.time);
      return result === 'conflict';
    } catch (error) {
      this.logger.warn('⚠️ Availability check failed, dispatching without it:', error);
      return false;
    }
  }

  /**
   * Ask again for whatever the conversation is waiting on
   */
  private reprompt(context: ConversationContext): DialogueOutcome {
    const pending = context.pendingIntent;
    if (pending === null) {
      return {
        kind: 'Clarify',
        missingSlots: [],
        missingIntent: true,
        promptText: context.activeMode === 'Knowledge' ? Prompts.askKnowledgeQuestion() : Prompts.askIntent(),
      };
    }
    const missing = missingSlots(pending, context.partialSlots);
    return {
      kind: 'Clarify',
      missingSlots: missing,
      missingIntent: false,
      promptText: Prompts.askSlots(pending, context.partialSlots, missing),
    };
  }

  private switchMode(context: ConversationContext, target: Mode): DialogueOutcome {
    this.enterMode(context, target);
    return { kind: 'ModeSwitched', newMode: target, promptText: Prompts.switched(target) };
  }

  /**
   * Partial slots never carry across modes
   */
  private enterMode(context: ConversationContext, target: Mode): void {
    if (context.pendingIntent !== null) {
      this.logger.info(`🗑️ Discarding pending ${context.pendingIntent} on switch to ${target}`);
    }
    this.logger.info(`🔁 [${context.conversationId}] ${context.activeMode} → ${target}`);
    clearPending(context);
    context.pendingSwitchOffer = null;
    context.activeMode = target;
  }

  private dispatch(command: StructuredCommand): DialogueOutcome {
    return { kind: 'Dispatch', command, promptText: Prompts.dispatching(command) };
  }
}
