export enum AnsiColor {
  Reset = '\u001B[0m',
  Green = '\u001B[32m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
  Blue = '\u001B[34m',
  Cyan = '\u001B[36m',
}

export function paint(text: string, color: AnsiColor, enabled: boolean): string {
  if (!enabled || text.length === 0) return text;
  return `${color}${text}${AnsiColor.Reset}`;
}
