import type { RunSummary } from "./types.js";

export interface Reporter {
  progress(processed: number, total: number, label: string): void;
  info(message: string): void;
  /** Expected, skippable failures such as permission denied. */
  skip(message: string): void;
  warn(message: string): void;
  summary(summary: RunSummary): void;
}

export function formatProgress(processed: number, total: number, label: string): string {
  const percent = total === 0 ? 100 : Math.floor((processed / total) * 100);
  const width = String(total).length;
  return `[${String(processed).padStart(width)}/${total} ${String(percent).padStart(3)}%] ${label}`;
}

export function formatSummary(summary: RunSummary): string {
  return `${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.totalRecords} records`;
}

export function createConsoleReporter({ quiet = false }: { quiet?: boolean } = {}): Reporter {
  return {
    progress(processed, total, label) {
      if (!quiet) console.error(formatProgress(processed, total, label));
    },
    info(message) {
      if (!quiet) console.error(message);
    },
    skip(message) {
      if (!quiet) console.error(`Skipped: ${message}`);
    },
    warn(message) {
      console.warn(`Warning: ${message}`);
    },
    summary(summary) {
      console.error(formatSummary(summary));
    },
  };
}

export const silentReporter: Reporter = {
  progress() {},
  info() {},
  skip() {},
  warn() {},
  summary() {},
};
