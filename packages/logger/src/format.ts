import { LEVEL_ABBREVIATIONS, formatErrorDetail, type LogEntry } from "@appshell/core";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local wall-clock time as HH:MM:SS. */
export function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * One entry in console text form:
 * `[HH:MM:SS] [LEV] Category: Message`, followed by the error detail on
 * the next line(s) when the entry carries one.
 */
export function formatLogEntry(entry: LogEntry): string {
  const line = `[${formatTime(entry.timestamp)}] [${LEVEL_ABBREVIATIONS[entry.level]}] ${entry.category}: ${entry.message}`;
  if (entry.error === undefined) return line;
  return `${line}\n${formatErrorDetail(entry.error)}`;
}
