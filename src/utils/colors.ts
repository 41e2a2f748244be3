import chalk from "chalk";

export type TerminalColor = "red" | "yellow" | "cyan" | "gray";

export function colorize(text: string, color: TerminalColor): string {
  if (!text) {
    return text;
  }

  switch (color) {
    case "red":
      return chalk.red(text);
    case "yellow":
      return chalk.yellow(text);
    case "cyan":
      return chalk.cyan(text);
    case "gray":
    default:
      return chalk.gray(text);
  }
}
