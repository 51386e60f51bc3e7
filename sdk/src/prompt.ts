// Mastodon rejects media descriptions longer than this
export const MAX_ALT_TEXT_LENGTH = 1500;

export const HASHTAGS = ['#pigeons', '#NYC', '#AIart'] as const;

export function buildPrompt(adjective: string): string {
  return (
    `A full-bleed, color image of a ${adjective} pigeon in New York City. ` +
    'The pigeon should dominate the foreground and be rendered realistically, its details captured meticulously. ' +
    'No text. Nothing outside the image. Realistic nature photography.'
  );
}

export function composeStatus(adjective: string): string {
  return `A ${adjective} pigeon in New York City.\n\n${HASHTAGS.join(' ')}`;
}

export function altText(prompt: string): string {
  return prompt.length > MAX_ALT_TEXT_LENGTH ? prompt.slice(0, MAX_ALT_TEXT_LENGTH - 1) + '…' : prompt;
}
