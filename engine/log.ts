// engine/log.ts
// Structured one-line JSON logs for the HTTP entrypoints.

const SERVICE = 'mfg-diagnosis';

export type LogContext = Record<string, unknown>;

export function logInfo(event: string, ctx: LogContext = {}): void {
  console.info(JSON.stringify({ level: 'info', service: SERVICE, event, ...ctx }));
}

export function logWarn(event: string, ctx: LogContext = {}): void {
  console.warn(JSON.stringify({ level: 'warn', service: SERVICE, event, ...ctx }));
}

export function logError(event: string, ctx: LogContext = {}): void {
  console.error(JSON.stringify({ level: 'error', service: SERVICE, event, ...ctx }));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
