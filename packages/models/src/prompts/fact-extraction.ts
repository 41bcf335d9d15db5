import type { ConversationMessage } from '@tempora/shared';

export const FACT_EXTRACTION_PROMPT = `You extract memories about a user from a conversation.

Return facts worth remembering beyond this conversation: who the user is,
what they like or dislike, constraints they live with, plans and events,
and short-lived states (feeling ill, travelling this week). Skip small talk
and opinions about the conversation itself. Write each fact as one short
sentence about the user.

For each fact give:
- text: the fact as a sentence
- category: one of "profile", "preference", "event", "temp_state", "other"
- slot: a short snake_case label for the attribute the fact fills, such as
  "name", "location", "employer", "favorite_food", "diet", "mood";
  null when the fact does not fill a single-valued attribute
- confidence: a number from 0 to 1

Facts that share a slot replace each other over time, so only use a slot when
a newer fact on it should make the older one obsolete.

Reply with JSON only, exactly in this shape:
{"facts": [{"text": "...", "category": "...", "slot": "..." , "confidence": 0.9}]}

Examples:
user: "Morning!"
{"facts": []}

user: "I moved to Lisbon last month and I'm a backend engineer at a logistics startup."
{"facts": [
  {"text": "User lives in Lisbon", "category": "profile", "slot": "location", "confidence": 0.95},
  {"text": "User moved to Lisbon last month", "category": "event", "slot": null, "confidence": 0.85},
  {"text": "User works as a backend engineer at a logistics startup", "category": "profile", "slot": "employer", "confidence": 0.93}
]}

user: "I've got a cold today so keep answers short."
{"facts": [
  {"text": "User has a cold", "category": "temp_state", "slot": "health", "confidence": 0.9}
]}`;

/** Render the conversation as one transcript block for the extraction model. */
export function formatTranscript(messages: ConversationMessage[]): string {
  return messages.map((m) => `${m.role}: ${JSON.stringify(m.content)}`).join('\n');
}
