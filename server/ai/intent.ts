// ABOUTME: Deterministic keyword classifier for chat messages; no model call involved.
// ABOUTME: Lets the chat short-circuit small talk before spending a generation request.

export const INTENTS = [
  'greeting',
  'thanks',
  'farewell',
  'summary_request',
  'question',
  'unknown',
] as const;

export type Intent = (typeof INTENTS)[number];

export const IntentUnknown: Intent = 'unknown';

const QUESTION_WORDS = [
  'what', 'why', 'how', 'when', 'where', 'who', 'whom', 'whose', 'which',
  'is', 'are', 'was', 'were', 'do', 'does', 'did', 'can', 'could', 'should',
  'would', 'will', 'explain', 'tell', 'describe',
];

const SUMMARY_PATTERN = /\b(summari[sz]e|summary|tl;?dr|recap|overview|key points)\b/;
const GREETING_PREFIX = /^(hi|hello|hey|hiya|howdy|yo|good (morning|afternoon|evening))\b/;

// Small talk must be the whole message: a phrase, optional filler, then punctuation only
const GREETING_PATTERN =
  /^(hi|hello|hey|hiya|howdy|yo|good (morning|afternoon|evening))( there| all| everyone| again)?[\s!.,]*$/;
const THANKS_PATTERN =
  /^((ok|okay|great|perfect),? )?(thanks|thank you|thx|cheers|many thanks|appreciate it)( so much| a lot| very much| again)?[\s!.,]*$/;
const FAREWELL_PATTERN = /^(bye|bye bye|goodbye|see you|see ya|later|good night)( then| for now| later)?[\s!.,]*$/;

/**
 * Label a message with one of {@link INTENTS}. Rules are checked in order,
 * so "hi, what is this post about?" is a question rather than a greeting.
 */
export function classifyIntent(message: string): Intent {
  const text = message.trim().toLowerCase();
  if (text.length === 0) return 'unknown';

  if (SUMMARY_PATTERN.test(text)) return 'summary_request';

  const firstWord = text.split(/[^a-z']+/).find((word) => word.length > 0) ?? '';
  if (text.endsWith('?') || QUESTION_WORDS.includes(firstWord) || hasQuestionAfterGreeting(text)) {
    return 'question';
  }

  if (GREETING_PATTERN.test(text)) return 'greeting';
  if (THANKS_PATTERN.test(text)) return 'thanks';
  if (FAREWELL_PATTERN.test(text)) return 'farewell';

  return 'unknown';
}

function hasQuestionAfterGreeting(text: string): boolean {
  const match = GREETING_PREFIX.exec(text);
  if (!match) return false;
  const rest = text.slice(match[0].length).replace(/^[\s,!.]+/, '');
  const nextWord = rest.split(/[^a-z']+/).find((word) => word.length > 0) ?? '';
  return QUESTION_WORDS.includes(nextWord);
}

const SMALL_TALK_REPLIES: Partial<Record<Intent, string>> = {
  greeting: 'Hi! Ask me anything about this post.',
  thanks: "You're welcome! Let me know if you have more questions about this post.",
  farewell: 'Goodbye! Come back any time you have questions about this post.',
};

/**
 * Canned reply for small-talk intents, or null when the message needs a real answer.
 */
export function smallTalkReply(intent: Intent): string | null {
  return SMALL_TALK_REPLIES[intent] ?? null;
}
