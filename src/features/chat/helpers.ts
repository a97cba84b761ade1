const EXIT_COMMANDS = new Set(['exit', 'quit']);

export function isExitCommand(text: string): boolean {
  return EXIT_COMMANDS.has(text.trim().toLowerCase());
}

export function bannerLines(botName: string, disclaimer?: string): string[] {
  const lines = ['', `${botName} (type 'exit' or 'quit' to end)`];
  if (disclaimer && disclaimer.trim()) lines.push(disclaimer.trim());
  lines.push('');
  return lines;
}

// Blank line, the bot label, then the reply and a trailing blank line.
export function formatReply(botName: string, reply: string): string {
  return `\n${botName}:\n${reply}\n`;
}
