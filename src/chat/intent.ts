const RESTART_COMMANDS = ['/restart', '/reiniciar'];

const GREETINGS = ['hola', 'hi', 'hello'];

// Spanish and English phrasings of "I have a problem"
const SUPPORT_KEYWORDS = [
  'problema',
  'error',
  'falla',
  'ticket',
  'ayuda',
  'soporte',
  'no funciona',
  'issue',
  'bug',
  'help',
  'support',
  'not working',
  'broken',
  "doesn't work",
];

function normalize(text: string): string {
  return text.trim().toLowerCase();
}

export function isRestartCommand(text: string): boolean {
  return RESTART_COMMANDS.includes(normalize(text));
}

export function isGreeting(text: string): boolean {
  return GREETINGS.includes(normalize(text));
}

/**
 * First support keyword found in the message, or null.
 */
export function detectSupportIntent(text: string): string | null {
  const lower = text.toLowerCase();
  return SUPPORT_KEYWORDS.find((keyword) => lower.includes(keyword)) ?? null;
}
