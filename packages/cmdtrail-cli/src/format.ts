import { homedir } from "node:os";
import { durationOf, type AggregatedEntry, type HistoryEvent, type SearchResultItem } from "@cmdtrail/runtime";
import { differenceInMilliseconds, formatISO, fromUnixTime } from "date-fns";

export type SearchOutputFormat = "plain" | "json" | "fzf";

export const SEARCH_OUTPUT_FORMATS: readonly SearchOutputFormat[] = ["plain", "json", "fzf"];

export const FZF_FIELD_SEPARATOR = "\x1f";
export const FZF_RECORD_TERMINATOR = "\0";
/** Stands in for newlines in the fzf display column. */
export const NEWLINE_GLYPH = "⏎";

export interface FormatContext {
  now: Date;
  /** Folders under it are shown as `~/...`. */
  home?: string;
}

export function isSearchOutputFormat(value: string): value is SearchOutputFormat {
  return SEARCH_OUTPUT_FORMATS.some((format) => format === value);
}

export function humanDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${Math.round(seconds)}s`;
  const minutes = seconds / 60;
  if (minutes < 60) return `${Math.round(minutes)}m`;
  const hours = minutes / 60;
  if (hours < 24) return `${Math.round(hours)}h`;
  const days = hours / 24;
  if (days < 7) return `${Math.round(days)}D`;
  if (days < 365) return `${Math.round(days / 7)}W`;
  return `${Math.round(days / 365)}Y`;
}

/** Fixed-width seconds so lines sort lexically by time. */
export function formatEventTime(startTime: number): string {
  return startTime.toFixed(9).padStart(21, "0");
}

export function itemCommand(item: SearchResultItem): string {
  return item.kind === "event" ? item.event.command : item.entry.command;
}

export function itemStartTime(item: SearchResultItem): number {
  return item.kind === "event" ? item.event.startTime : item.entry.latest.startTime;
}

function abbreviateHome(folder: string, home: string | undefined): string {
  if (home && (folder === home || folder.startsWith(`${home}/`))) {
    return `~${folder.slice(home.length)}`;
  }
  return folder;
}

function percent(part: number, total: number): number {
  return total > 0 ? Math.round((100 * part) / total) : 0;
}

function eventPreview(event: HistoryEvent, context: FormatContext): string[] {
  const at = formatISO(fromUnixTime(event.startTime));
  if (event.exitCode === null || event.folder === null) {
    return [`ran on ${at}`, "", event.command];
  }
  const durationMs = durationOf(event) * 1000;
  return [
    `[returned ${event.exitCode} after ${humanDuration(durationMs)} at ${at}]`,
    `[ran in ${abbreviateHome(event.folder, context.home ?? homedir())} on ${event.machine}]`,
    "",
    event.command,
  ];
}

function aggregatePreview(entry: AggregatedEntry): string[] {
  const at = formatISO(fromUnixTime(entry.latest.startTime));
  const succeeded = entry.count - entry.failedCount - entry.unknownCount;
  return [
    `[ran ${entry.count} times, most recently at ${at}]`,
    `[${percent(succeeded, entry.count)}% success, ${percent(entry.failedCount, entry.count)}% failure, ${percent(entry.unknownCount, entry.count)}% unknown]`,
    "",
    entry.command,
  ];
}

export function formatPreview(item: SearchResultItem, context: FormatContext): string {
  const lines = item.kind === "event" ? eventPreview(item.event, context) : aggregatePreview(item.entry);
  return lines.join("\n");
}

function encodeBase64(text: string): string {
  return Buffer.from(text, "utf8").toString("base64");
}

/**
 * One fzf record: base64 command, base64 preview, age column and the
 * display command, separated by \x1f. The caller terminates it with \0.
 */
export function formatFzfRecord(item: SearchResultItem, context: FormatContext): string {
  const command = itemCommand(item);
  const age = humanDuration(
    Math.max(0, differenceInMilliseconds(context.now, fromUnixTime(itemStartTime(item)))),
  );
  return [
    encodeBase64(command),
    encodeBase64(formatPreview(item, context)),
    `[${age.padStart(3)} ago] `,
    command.replaceAll("\n", NEWLINE_GLYPH),
  ].join(FZF_FIELD_SEPARATOR);
}

export function formatPlainLine(item: SearchResultItem): string {
  const time = formatEventTime(itemStartTime(item));
  const command = JSON.stringify(itemCommand(item));
  if (item.kind === "aggregate") {
    return `${time} -- ${item.entry.count}x ${command}`;
  }
  return `${time} -- ${command}`;
}

/** The chunk written for one item, terminator included. */
export function formatSearchItem(
  item: SearchResultItem,
  format: SearchOutputFormat,
  context: FormatContext,
): string {
  switch (format) {
    case "json":
      return `${JSON.stringify(item)}\n`;
    case "fzf":
      return `${formatFzfRecord(item, context)}${FZF_RECORD_TERMINATOR}`;
    case "plain":
      return `${formatPlainLine(item)}\n`;
  }
}
