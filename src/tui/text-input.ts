function toChars(value: string): string[] {
  return Array.from(value);
}

export function appendText(value: string, text: string): string {
  return value + text;
}

/** Remove the last Unicode codepoint (not the last UTF-16 unit). */
export function deleteLastChar(value: string): string {
  const chars = toChars(value);
  chars.pop();
  return chars.join('');
}

export function countLines(value: string): number {
  return value.split('\n').length;
}

export function isDateInputChar(ch: string): boolean {
  return /^[0-9-]$/.test(ch);
}
