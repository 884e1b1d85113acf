import { Channel } from '../config/types';

/** Longest outbound body each platform accepts, in UTF-16 code units */
export const MAX_MESSAGE_LENGTH: Readonly<Record<Channel, number>> = {
  whatsapp: 1600, // Twilio body limit
  discord: 2000,
  web: 10_000,
};

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Cut to the channel limit, ending with an ellipsis when shortened; never splits a surrogate pair */
export function truncateForChannel(channel: Channel, text: string): string {
  const max = MAX_MESSAGE_LENGTH[channel];
  if (text.length <= max) return text;

  let cut = max - 1;
  if (isHighSurrogate(text.charCodeAt(cut - 1))) cut -= 1;
  return `${text.slice(0, cut).trimEnd()}…`;
}
