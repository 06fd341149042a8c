// Assistant file citations, e.g. 【4:0†source】
const CITATION_PATTERN = /【.*?】/g;
const BOLD_PATTERN = /\*\*(.*?)\*\*/g;
const LINK_PATTERN = /\[(.*?)\]\((.*?)\)/g;
// Control characters except tab and newline
// eslint-disable-next-line no-control-regex
const CONTROL_PATTERN = /[\u0000-\u0008\u000B-\u001F\u007F]/g;

/**
 * Convert assistant Markdown into WhatsApp formatting.
 */
export function formatForWhatsApp(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(CITATION_PATTERN, '')
    .trim()
    .replace(BOLD_PATTERN, '*$1*')
    .replace(LINK_PATTERN, '$1: $2')
    .replace(CONTROL_PATTERN, '');
}
