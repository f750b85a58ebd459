/**
 * Knowledge Oracle Prompts
 * Category-specific system prompts for general questions
 */

import type { ConversationTurn } from '../types';

export type KnowledgeCategory = 'ai' | 'science' | 'history' | 'technology' | 'general';

/** First category whose keyword appears in the question wins */
export const CATEGORY_KEYWORDS: ReadonlyArray<[KnowledgeCategory, readonly string[]]> = [
  ['ai', ['what is ai', 'artificial intelligence', 'machine learning', 'neural network', 'deep learning']],
  ['science', ['physics', 'chemistry', 'biology', 'astronomy', 'science']],
  ['history', ['history', 'historical', 'ancient', 'world war', 'century']],
  ['technology', ['computer', 'software', 'hardware', 'internet', 'programming', 'code', 'technology']],
];

const COMMON_RULES = `Don't introduce yourself or mention that you're an AI. Just answer the question directly.
Do not use any markdown formatting (no # or * characters) in your response.`;

export const KNOWLEDGE_SYSTEM_PROMPTS: Record<KnowledgeCategory, string> = {
  ai: `Provide a helpful, accurate and educational response about AI concepts.
Include relevant technical details where appropriate but explain them clearly.
${COMMON_RULES}`,
  science: `Provide a clear, accurate scientific explanation that is factually correct and educational.
Use analogies where helpful to explain complex concepts.
${COMMON_RULES}`,
  history: `Provide a historically accurate response with relevant dates and context.
Be objective and educational in your explanation of historical events or figures.
${COMMON_RULES}`,
  technology: `Provide a helpful technical explanation that is accurate and educational.
Include practical examples or relevant technical details where appropriate.
${COMMON_RULES}`,
  general: `Provide a helpful, accurate and concise response. Focus on directly answering the question
with factual information.
${COMMON_RULES}`,
};

export function categorizeQuestion(question: string): KnowledgeCategory {
  const lower = question.toLowerCase();
  const match = CATEGORY_KEYWORDS.find(([, keywords]) => keywords.some(keyword => lower.includes(keyword)));
  return match ? match[0] : 'general';
}

export const SUMMARY_SYSTEM_PROMPT = `Summarize the following conversation between a user and an assistant in a single paragraph.
Focus on the main topics discussed, decisions made and information gathered.
Keep the summary concise but informative.
Do not use any markdown formatting (no # or * characters) in your response.`;

/**
 * One "User: …" / "Assistant: …" line per turn
 */
export function formatTranscript(history: readonly ConversationTurn[]): string {
  return history.map(turn => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.text}`).join('\n');
}
