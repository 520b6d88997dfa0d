import type { EventEmitter } from "events";
import type { AgentEvent } from "./events.js";
import type { RunOutcome } from "./loop.js";
import { getLogger } from "../util/logger.js";

/** Progress line for an event, or null for events that print nothing. */
export function formatEvent(event: AgentEvent): string | null {
  switch (event.type) {
    case "turn:response":
      return event.toolCallCount === 0 || event.response ? `[Assistant] ${event.response ?? ""}` : null;
    case "turn:action":
      return `[Turn ${event.turn}] ${event.action ?? "unknown"}`;
    case "turn:result":
      return event.result?.detail ? `[Turn ${event.turn}] ${event.result.detail}` : null;
    case "agent:answer":
      return `[Agent Answer] ${event.answer ?? ""}`;
    case "agent:terminate":
      return `[Terminate] status=${event.verdict ?? ""}`;
    case "tool:error":
      return `[Tool Error] ${event.error?.message ?? "unknown error"}`;
    default:
      return null;
  }
}

/** Closing summary printed once a run is over. */
export function formatOutcome(outcome: RunOutcome): string[] {
  const lines: string[] = [];
  if (outcome.finalAnswer) lines.push(`[Final Answer] ${outcome.finalAnswer}`);
  if (outcome.terminated) lines.push(`[Task Status] ${outcome.terminated}`);
  lines.push(`run finished after ${outcome.turns} turn(s): ${outcome.reason}`);
  return lines;
}

/** The two log levels progress lines go to. */
export interface ProgressLog {
  info(message: string): unknown;
  warn(message: string): unknown;
}

/** Log human-readable progress for every event `source` emits. */
export function attachReporter(source: EventEmitter, log: ProgressLog = getLogger("run")): void {
  source.on("agent:event", (event: AgentEvent) => {
    const line = formatEvent(event);
    if (!line) return;
    if (event.type === "tool:error") log.warn(line);
    else log.info(line);
  });
}
