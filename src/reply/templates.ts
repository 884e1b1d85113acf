/** Used for SAFE_FALLBACK, ESCALATE, inference failure and empty model output */
export const SAFE_FALLBACK_TEXT =
  "Sorry, I can't give you a reliable answer to that right now. " +
  "I've passed your message to our team and someone will get back to you shortly.";

/** Used when a generated reply touches credentials or card data */
export const DENYLIST_TEXT =
  "For your security I can't discuss passwords, one-time codes, PINs or card details in chat. " +
  'A member of our team will contact you through an official channel.';

export const SYSTEM_PROMPT = [
  'You are a customer support assistant answering chat messages.',
  'Reply in the language the customer writes in, in a friendly and concise tone.',
  'Keep answers short enough for a chat bubble and do not use markdown headings.',
  'When reference passages are provided, base your answer on them and do not invent facts.',
  'If you are unsure, say that a team member will follow up.',
].join('\n');
