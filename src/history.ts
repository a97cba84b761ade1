import { appendFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { DateTime } from 'luxon';

export const TIMESTAMP_FORMAT = 'yyyy-LL-dd HH:mm:ss';

export function formatTurnEntry(userText: string, reply: string): string {
  return `User: ${userText}\n\nBot: ${reply}`;
}

export function formatHistoryBlock(entry: string, at: DateTime): string {
  return `---\n**${at.toFormat(TIMESTAMP_FORMAT)}**\n\n${entry}\n\n`;
}

/**
 * Append-only Markdown transcript. There is no read path; write errors are
 * thrown to the caller.
 */
export class HistoryLogger {
  readonly file: string;
  private now: () => DateTime;

  constructor(file = join(process.cwd(), 'conversation_history.md'), now: () => DateTime = () => DateTime.local()) {
    this.file = file;
    this.now = now;
  }

  append(entry: string): void {
    const dir = dirname(this.file);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    appendFileSync(this.file, formatHistoryBlock(entry, this.now()), 'utf8');
  }
}
