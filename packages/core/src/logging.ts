export type IndexLogger = {
  log?: (line: string) => void;
  warn?: (line: string) => void;
};

export function logLine(logger: IndexLogger | undefined, line: string): void {
  logger?.log?.(line);
}

export function warnLine(logger: IndexLogger | undefined, line: string): void {
  logger?.warn?.(line);
}
