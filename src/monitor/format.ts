// src/monitor/format.ts
import { bold } from '@/util/color';

export const pad2 = (n: number): string => n.toString().padStart(2, '0');

/** Whole seconds as HH:MM:SS (hours may exceed two digits). */
export const fmtClock = (sec: number): string => {
  const s = Math.max(0, Math.floor(sec));
  const hh = Math.floor(s / 3600);
  const mm = Math.floor((s % 3600) / 60);
  return `${pad2(hh)}:${pad2(mm)}:${pad2(s % 60)}`;
};

/** Compact human duration: 45s, 2m 5s, 1h 3m. */
export const fmtDuration = (sec: number): string => {
  const s = Math.max(0, Math.floor(sec));
  if (s < 60) return `${s.toString()}s`;
  if (s < 3600) {
    return `${Math.floor(s / 60).toString()}m ${(s % 60).toString()}s`;
  }
  return `${Math.floor(s / 3600).toString()}h ${Math.floor((s % 3600) / 60).toString()}m`;
};

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/** Integer-truncated memory size: 512B, 12KB, 300MB, 2GB. */
export const fmtMemory = (bytes: number): string => {
  const b = Math.max(0, Math.floor(bytes));
  if (b < KB) return `${b.toString()}B`;
  if (b < MB) return `${Math.floor(b / KB).toString()}KB`;
  if (b < GB) return `${Math.floor(b / MB).toString()}MB`;
  return `${Math.floor(b / GB).toString()}GB`;
};

/**
 * Fixed-width ASCII bar: `[=====>    ] 50%`.
 * A `>` head marks the front while the bar is not full.
 */
export const progressBar = (percent: number, width = 50): string => {
  const pct = Math.min(100, Math.max(0, Math.floor(percent)));
  const filled = Math.floor((width * pct) / 100);
  let bar = '='.repeat(filled);
  if (filled < width) bar += `>${' '.repeat(width - filled - 1)}`;
  return `[${bar}] ${bold(`${pct.toString()}%`)}`;
};

export const stripAnsi = (s: string): string =>
  // Remove ANSI CSI sequences (ESC [ ... @-~). Covers SGR and common cursor controls.
  // eslint-disable-next-line no-control-regex
  s.replace(/\x1B\[[0-?]*[ -/]*[@-~]/g, '');
