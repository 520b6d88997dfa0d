import type { ActionResult } from "../computer/executor.js";
import type { FinishReason, RunOutcome } from "./loop.js";

export type AgentEventType =
  | "run:start"
  | "run:end"
  | "turn:start"
  | "turn:response"
  | "turn:action"
  | "turn:result"
  | "agent:answer"
  | "agent:terminate"
  | "tool:error";

export interface AgentEvent {
  type: AgentEventType;
  timestamp: number;
  turn: number;
  /** Assistant text of the reply, when it has any. */
  response?: string;
  toolCallCount?: number;
  callId?: string;
  action?: string;
  result?: ActionResult;
  answer?: string;
  verdict?: "success" | "failure";
  error?: Error;
  reason?: FinishReason;
  outcome?: RunOutcome;
}
