import { Envelope } from "./envelope";
import { StagePayload } from "./types";

/**
 * Contract shared by every pipeline stage: a named function from its input
 * to an envelope of its output. Failures travel inside the envelope.
 */
export interface Agent<Input, Output extends StagePayload> {
  readonly name: string;
  run(input: Input): Promise<Envelope<Output>>;
}

export interface AgentLogger {
  info(message: string, ...extra: unknown[]): void;
  warn(message: string, ...extra: unknown[]): void;
  error(message: string, ...extra: unknown[]): void;
}

function isSilent(): boolean {
  return process.env.LOG_LEVEL === "silent";
}

export function createAgentLogger(name: string): AgentLogger {
  const prefix = () => `[${new Date().toISOString()}] ${name}:`;
  return {
    info(message, ...extra) {
      if (!isSilent()) console.log(prefix(), message, ...extra);
    },
    warn(message, ...extra) {
      if (!isSilent()) console.warn(prefix(), message, ...extra);
    },
    error(message, ...extra) {
      if (!isSilent()) console.error(prefix(), message, ...extra);
    },
  };
}
