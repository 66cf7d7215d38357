import type { ScoredImage } from "@wallshade/core";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

function withDetail(message: string, error?: unknown): string {
  if (error === undefined) return message;
  const detail = error instanceof Error ? error.message : String(error);
  return `${message}: ${detail}`;
}

/** Console logger with a `[wallshade:<scope>]` prefix. Plain `[wallshade]` without a scope. */
export function createConsoleLogger(scope?: string): Logger {
  const prefix = scope ? `[wallshade:${scope}]` : "[wallshade]";
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message, error) => console.error(`${prefix} ${withDetail(message, error)}`),
  };
}

export function formatTickLine(at: Date, hour: number, image: ScoredImage): string {
  return `[${at.toISOString()}] Hour: ${hour} | Selected: ${image.path} | Score: ${image.score}`;
}
