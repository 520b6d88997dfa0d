export class AgentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A tool call the model got wrong. The loop reports these back to the model
 * as a tool result instead of ending the run.
 */
export class ActionError extends AgentError {}

export class ValidationError extends ActionError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.field = field;
  }
}

export class UnsupportedActionError extends ActionError {
  readonly action: string;

  constructor(action: string, message = `Unsupported action: ${action}`) {
    super(message);
    this.action = action;
  }
}

export class MalformedArgumentsError extends ActionError {
  readonly raw: string;

  constructor(raw: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Tool call arguments are not valid JSON${reason}`, { cause });
    this.raw = raw;
  }
}

export class DisplayUnavailableError extends AgentError {}

export class EndpointError extends AgentError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

export class ConfigError extends AgentError {}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
