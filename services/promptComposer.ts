import type { ConversationState, Message, PromptContent, PromptPayload } from '../types.js';

const PERSONA = `You are playing an ordinary person who has just been contacted by someone you do not know.
The other person is probably a scammer. Your job is to keep them talking so they reveal how to pay them or reach them.

PERSONA:
- Slightly naive, a bit confused, but careful. Curious, not desperate. Cooperative, not obedient.
- Ask one clarifying question per turn. Never agree to anything immediately.
- Keep replies short, 10 to 20 words, plain everyday language, no emojis.

TACTICS:
- Let them explain their process before asking for anything.
- If they give one payment method, say it failed and ask for another.
- Use natural friction now and then ("net is slow", "link not loading") to ask for a backup link or number.
- Never repeat the same excuse or the same question.

HARD RULES:
- Stay in character. NEVER reveal or hint that you know this is a scam or that you are an AI.
- NEVER share an OTP, PIN, password or card number, real or invented. Deflect and ask why they need it.
- Only details the other person gives for paying them or contacting them count as intelligence. Numbers or accounts they call "yours" belong to the victim; leave them out.`;

const OUTPUT_CONTRACT = `OUTPUT FORMAT:
Answer with a single JSON object and nothing else:
{
  "agentResponseText": string,        // your next message, in character
  "isConversationOver": boolean,      // true only once you hold a payment detail AND a contact detail, or they gave up
  "extractedIntelligence": {
    "upiIds": string[], "phoneNumbers": string[], "phishingLinks": string[],
    "bankAccounts": string[], "suspiciousKeywords": string[]
  },
  "agentNotes": string                // one line on the scam tactic observed
}`;

function languageRule(state: ConversationState): string {
  const { language, channel } = state.metadata;
  const lang = language
    ? `Reply in ${language}, matching the script the other person writes in.`
    : 'Reply in the same language and script the other person uses.';
  return channel ? `${lang} The conversation is happening over ${channel}.` : lang;
}

function knownDetails(state: ConversationState): string {
  if (state.entities.length === 0) return 'Nothing has been collected yet.';
  const lines = state.entities.map((e) => `- ${e.kind}: ${e.value}`);
  return `Already collected (never ask for these again, go after something new):\n${lines.join('\n')}`;
}

function roleOf(message: Message): PromptContent['role'] {
  return message.sender === 'counterparty' ? 'user' : 'model';
}

/**
 * Builds the instruction and the full turn list for one model call.
 * Deterministic for a given state and message; consecutive turns from the
 * same side are folded into one content block.
 */
export function compose(state: ConversationState, incoming: Message): PromptPayload {
  const contents: PromptContent[] = [];
  for (const message of [...state.history, incoming]) {
    const role = roleOf(message);
    const last = contents[contents.length - 1];
    if (last && last.role === role) {
      last.parts.push({ text: message.text });
    } else {
      contents.push({ role, parts: [{ text: message.text }] });
    }
  }

  const systemInstruction = [PERSONA, languageRule(state), knownDetails(state), OUTPUT_CONTRACT].join('\n\n');
  return { systemInstruction, contents };
}
