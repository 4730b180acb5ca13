/**
 * Prompt templates for the memory collaborators: the remember/skip decision,
 * single-utterance extraction, and conversation (episodic) summaries.
 */

import { MEMORY_CATEGORIES } from "@caremem/shared/memory"

export interface Message {
  role: string
  content: string
}

const CATEGORY_GUIDE: Record<(typeof MEMORY_CATEGORIES)[number], string> = {
  ADRD_INFO:
    "Alzheimer's disease and related dementias: diagnosis, symptoms, stage and progression of the care recipient",
  CARE_GIVING:
    "the caregiving situation: who is cared for, daily care challenges, strategies that help, caregiver strain",
  BIO_INFO: "the user's own biography: name, age, occupation, where they live",
  SOCIAL_CONNECTIONS: "family, friends, support network, routines and activities shared with others",
  TOPICS_OF_INTEREST: "subjects and hobbies the user wants to hear or learn more about",
  PREFERENCES: "how the user wants to be answered: tone, language, level of detail",
  OTHER: "anything worth keeping that fits none of the above",
}

// ──────────────────────────────────────────────────
// Decision
// ──────────────────────────────────────────────────

export function buildDecisionSystemPrompt(): string {
  return `You are the gatekeeper of a memory system for a caregiver-support assistant (Alzheimer's disease and related dementias). Decide whether the user's message contains information worth storing for future conversations.

Answer YES when the message contains any of:
- personal information: names, age, job, family members, circumstances, goals
- the user's specific caregiving situation or the care recipient's condition
- preferences about how the user wants to be helped
- facts, figures or ongoing tasks the user will likely refer to again
- problems or challenges particular to the user's life

Answer NO when the message:
- asks about general knowledge that anyone could ask (definitions, common causes, statistics)
- is small talk, a greeting, or about transient things such as today's weather
- describes a hypothetical with no link to the user's own situation

Examples:
"I look after my dad, he was diagnosed with Alzheimer's last year and I'm exhausted." -> YES
"What is the most common cause of dementia?" -> NO
"Please remember that I prefer short answers." -> YES

Reply with exactly one word: YES or NO.`
}

export function buildDecisionUserPrompt(utterance: string): string {
  return `User's message:\n${utterance}`
}

// ──────────────────────────────────────────────────
// Extraction
// ──────────────────────────────────────────────────

export function buildExtractionSystemPrompt(): string {
  const categories = MEMORY_CATEGORIES.map((c) => `- **${c}**: ${CATEGORY_GUIDE[c]}`).join("\n")

  return `You turn a single user message from a caregiver-support conversation into one memory item.

## Output Format

Respond with ONLY a JSON object matching this exact structure:

\`\`\`json
{
  "content": "One short sentence with the information, written about the user",
  "level": "LTM | STM",
  "type": "2 to 4 words naming what kind of information this is",
  "topics": ["up to 5 short topic labels"],
  "categories": [
    { "category": "<one of the categories below>", "confidence": 0.0-1.0 }
  ]
}
\`\`\`

## Levels

- **LTM**: durable facts about the user's life that will still hold next month (identity, family, diagnosis, living situation)
- **STM**: things that matter for this conversation only (current mood, a one-off request, today's plans)

## Categories

${categories}

List every category that applies with your confidence; the best match is chosen from that list.
If the message contains nothing worth remembering, set "content" to "N/A".

## Example

Message: "My dad seems to forget things more often these days, what should I do?"

\`\`\`json
{
  "content": "user's father shows increasing forgetfulness",
  "level": "LTM",
  "type": "care recipient condition",
  "topics": ["memory loss", "father", "dementia"],
  "categories": [
    { "category": "ADRD_INFO", "confidence": 0.8 },
    { "category": "CARE_GIVING", "confidence": 0.6 }
  ]
}
\`\`\`

Return ONLY the JSON object. No explanation, no assumptions beyond the message.`
}

export function buildExtractionUserPrompt(utterance: string): string {
  return `Extract a memory item from this message.

--- MESSAGE START ---
${utterance}
--- MESSAGE END ---`
}

// ──────────────────────────────────────────────────
// Episodic summary
// ──────────────────────────────────────────────────

export function buildEpisodicSystemPrompt(): string {
  return `You review a finished conversation between a caregiver and a support assistant and write a short reflection the assistant can learn from next time.

Respond with ONLY a JSON object:

\`\`\`json
{
  "topics": ["1 to 5 specific topic labels, e.g. sundowning, respite_care"],
  "conversationSummary": "One sentence on what the conversation was about and what it achieved",
  "whatWorked": "The single most effective thing the assistant did",
  "whatToAvoid": "The single most important pitfall to avoid with this user"
}
\`\`\`

Be specific. "Explained sundowning using the user's evening routine as the example" is useful; "Explained things well" is not.

Return ONLY the JSON object.`
}

/** Render a conversation as `ROLE: content` lines. */
export function formatConversation(messages: readonly Message[]): string {
  return messages.map((m) => `${m.role.toUpperCase()}: ${m.content}`).join("\n")
}

export function buildEpisodicUserPrompt(messages: readonly Message[]): string {
  return `--- CONVERSATION START ---
${formatConversation(messages)}
--- CONVERSATION END ---`
}
