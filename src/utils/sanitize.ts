const MAX_INPUT_LENGTH = 500;

export const NAME_MIN_LENGTH = 2;
export const NAME_MAX_LENGTH = 150;

const HTML_ESCAPES: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export function sanitizeInput(input: string): string {
  const cleaned = input
    .replace(CONTROL_CHARS, '')
    .replace(/[<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch)
    .replace(/\s+/g, ' ')
    .trim();
  return Array.from(cleaned).slice(0, MAX_INPUT_LENGTH).join('');
}

/** Sanitised name, or null when its length is outside 2..150 characters. */
export function sanitizeName(input: string): string | null {
  const name = sanitizeInput(input);
  const length = Array.from(name).length;
  if (length < NAME_MIN_LENGTH || length > NAME_MAX_LENGTH) return null;
  return name;
}
