// herocore/utils/colors.ts

// ANSI color helpers for the console log tags.

export const Colors = {
  Reset: "\x1b[0m",

  FgRed: "\x1b[31m",
  FgGreen: "\x1b[32m",
  FgYellow: "\x1b[33m",
  FgCyan: "\x1b[36m",

  BrightGreen: "\x1b[92m",
  BrightCyan: "\x1b[96m",
} as const;

export type ColorCode = (typeof Colors)[keyof typeof Colors];

export function colorize(text: string, color?: ColorCode): string {
  if (!color || process.env.NO_COLOR) return text;
  return `${color}${text}${Colors.Reset}`;
}
