// Only single-character escapes and CSI sequences are recognized.
// Other control sequences (OSC titles etc.) are counted as visible text.
const ESCAPE_PATTERN = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

const RESET = '\u001b[0m';

export type Alignment = 'left' | 'right' | 'center';

export function strip(text: string): string {
  return text.replace(ESCAPE_PATTERN, '');
}

/**
 * Number of terminal cells the text occupies once escape sequences are removed.
 */
export function visibleWidth(text: string): number {
  return strip(text).length;
}

export function color(text: string, code: number): string {
  return `\u001b[38;5;${code}m${text}${RESET}`;
}

export function gray(text: string): string {
  return color(text, 240);
}

export function bold(text: string): string {
  return `\u001b[1m${text}${RESET}`;
}

export function underline(text: string): string {
  return `\u001b[4m${text}${RESET}`;
}

export function italics(text: string): string {
  return `\u001b[3m${text}${RESET}`;
}

/**
 * Pad `text` so that its visible part is `width` cells wide.
 *
 * The raw target length is `width` plus the bytes taken by escape sequences,
 * so styled and plain strings line up. Centering puts the odd cell after the text.
 */
export function pad(text: string, width: number, mode: Alignment, fill = ' '): string {
  const target = width + (text.length - visibleWidth(text));
  const missing = target - text.length;
  if (missing <= 0) return text;

  switch (mode) {
    case 'left':
      return text + fill.repeat(missing);
    case 'right':
      return fill.repeat(missing) + text;
    case 'center': {
      const before = Math.floor(missing / 2);
      return fill.repeat(before) + text + fill.repeat(missing - before);
    }
  }
}

export function ljust(text: string, width: number, fill?: string): string {
  return pad(text, width, 'left', fill);
}

export function rjust(text: string, width: number, fill?: string): string {
  return pad(text, width, 'right', fill);
}

export function center(text: string, width: number, fill?: string): string {
  return pad(text, width, 'center', fill);
}
