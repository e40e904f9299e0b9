// engine/logger.ts
// Structured single-line JSON logging shared by the engine and the API handlers.

const SERVICE = 't12-kpi-engine';

export type LogContext = Record<string, unknown>;

export function logEngineInfo(event: string, ctx: LogContext = {}): void {
  console.info(JSON.stringify({ level: 'info', service: SERVICE, event, ...ctx }));
}

export function logEngineWarn(event: string, ctx: LogContext = {}): void {
  console.warn(JSON.stringify({ level: 'warn', service: SERVICE, event, ...ctx }));
}

export function logEngineError(event: string, ctx: LogContext = {}): void {
  console.error(JSON.stringify({ level: 'error', service: SERVICE, event, ...ctx }));
}
