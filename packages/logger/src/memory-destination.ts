import type { DestinationStream } from "pino";

export type LogLine = Record<string, unknown> & { level: number; msg?: string };

export interface MemoryDestination extends DestinationStream {
  readonly lines: LogLine[];
}

function isLogLine(value: unknown): value is LogLine {
  return typeof value === "object" && value !== null && "level" in value && typeof value.level === "number";
}

/**
 * Keeps every JSON line a logger writes. Used by tests to assert on log output.
 */
export function createMemoryDestination(): MemoryDestination {
  const lines: LogLine[] = [];
  return {
    lines,
    write(msg: string): void {
      const parsed: unknown = JSON.parse(msg);
      if (isLogLine(parsed)) {
        lines.push(parsed);
      }
    },
  };
}
