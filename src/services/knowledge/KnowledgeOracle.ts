import type OpenAI from 'openai';
import {
  categorizeQuestion,
  formatTranscript,
  KNOWLEDGE_SYSTEM_PROMPTS,
  SUMMARY_SYSTEM_PROMPT,
} from '../../config/knowledge-prompts';
import type { ConversationTurn } from '../../types';
import { logger as defaultLogger, type Logger } from '../../utils/logger';

export interface KnowledgeOracle {
  answer(question: string): Promise<string>;
  /** One-paragraph summary of a non-empty history */
  summarize(history: readonly ConversationTurn[]): Promise<string>;
}

export class EmptyAnswerError extends Error {
  constructor(public readonly question: string) {
    super(`No answer returned for "${question}"`);
    this.name = 'EmptyAnswerError';
  }
}

/**
 * Answers general questions through the OpenAI chat completions API
 */
export class OpenAIKnowledgeOracle implements KnowledgeOracle {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly logger: Logger = defaultLogger
  ) {}

  async answer(question: string): Promise<string> {
    const category = categorizeQuestion(question);
    const content = await this.complete(KNOWLEDGE_SYSTEM_PROMPTS[category], question);
    this.logger.debug(`📚 Knowledge answer (${category}): ${content.slice(0, 100)}`);
    return content;
  }

  async summarize(history: readonly ConversationTurn[]): Promise<string> {
    const content = await this.complete(SUMMARY_SYSTEM_PROMPT, formatTranscript(history));
    this.logger.debug(`📝 Conversation summary over ${history.length} turns`);
    return content;
  }

  private async complete(systemPrompt: string, userContent: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userContent },
      ],
    });

    const content = completion.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new EmptyAnswerError(userContent);
    }
    return content;
  }
}
