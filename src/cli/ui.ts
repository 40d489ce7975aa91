import process from "node:process";
import { confirm, isCancel, note } from "@clack/prompts";

import type { ScanProgress } from "../normalizer.js";

export const MAX_STEP_FILE_PREVIEW_LINES = 20;

export function limitLines(text: string, maxLines: number): string {
  const lines = text.split("\n");
  if (lines.length <= maxLines) return text;
  return `${lines.slice(0, maxLines).join("\n")}\n- …and ${lines.length - maxLines} more`;
}

// Long rewrite lines are cut, not wrapped.
function truncateLine(line: string, width: number): string {
  if (line.length <= width) return line;
  return `${line.slice(0, Math.max(1, width - 1))}…`;
}

export function noteTruncated(message: string, title?: string): void {
  const cols = process.stdout.columns ?? 80;
  const width = Math.max(40, cols - 10);
  const lines = message
    .split(/\r?\n/)
    .map((line) => truncateLine(line, width));
  note(lines.join("\n"), title);
}

export async function promptConfirm(
  message: string,
  initialValue: boolean,
): Promise<boolean | null> {
  const value = await confirm({ message, initialValue });
  if (isCancel(value)) return null;
  return value;
}

export function createScanProgressBarReporter(
  enabled: boolean,
): (info: ScanProgress) => void {
  if (!enabled) return () => {};
  let lastLineLength = 0;
  let lastTick = 0;
  return (info) => {
    const now = Date.now();
    if (now - lastTick < 80 && info.current !== info.total) return;
    lastTick = now;

    const cols = process.stderr.columns ?? 80;
    const barWidth = Math.max(10, Math.min(40, cols - 35));
    const ratio = info.total === 0 ? 1 : info.current / info.total;
    const filled = Math.min(barWidth, Math.round(barWidth * ratio));
    const bar = `${"#".repeat(filled)}${"-".repeat(barWidth - filled)}`;
    const line = `Scanning docs: [${bar}] ${info.current}/${info.total}`;
    const padded = line.padEnd(lastLineLength);
    lastLineLength = padded.length;
    process.stderr.write(`\r${padded}`);
    if (info.current === info.total) process.stderr.write("\n");
  };
}
