import { EventEmitter } from "events";
import { ActionError, UnsupportedActionError, toError } from "../errors.js";
import { buildComputerUseTool, COMPUTER_USE_TOOL_NAME, type DisplaySize } from "./schema.js";
import { buildSystemPrompt } from "./prompt.js";
import { parseToolArguments } from "./parser.js";
import { getLogger } from "../util/logger.js";
import type { ActionExecutor, ActionResult } from "../computer/executor.js";
import type { ChatMessage, ChatModel, ModelReply, ToolCallRequest, ToolMessage } from "../llm/openai.js";
import type { AgentEvent } from "./events.js";

const log = getLogger("agent");

export type LoopState = "RUNNING" | "AWAITING_MODEL" | "DISPATCHING_TOOLS" | "FINISHED";

export type FinishReason = "model-text-answer" | "terminate-signal" | "turn-limit";

export interface RunOutcome {
  finalAnswer: string | null;
  terminated: "success" | "failure" | null;
  reason: FinishReason;
  turns: number;
}

/** What the model gets back for a call that could not be carried out. */
export interface ToolErrorResult {
  status: "error";
  error: string;
  detail: string;
}

export interface AgentLoopOptions {
  model: string;
  task: string;
  temperature: number;
  maxTurns: number;
  /** Put into the tool description when known. */
  display?: DisplaySize;
}

export class AgentLoop extends EventEmitter {
  private chat: ChatModel;
  private executor: ActionExecutor;
  private options: AgentLoopOptions;

  private state: LoopState = "RUNNING";
  private turnCount = 0;
  private history: ChatMessage[] = [];
  private finalAnswer: string | null = null;
  private terminated: "success" | "failure" | null = null;
  private started = false;

  constructor(chat: ChatModel, executor: ActionExecutor, options: AgentLoopOptions) {
    super();
    this.chat = chat;
    this.executor = executor;
    this.options = options;
  }

  private emitEvent(event: Partial<AgentEvent> & { type: AgentEvent["type"] }): void {
    const full: AgentEvent = {
      timestamp: Date.now(),
      turn: this.turnCount,
      ...event,
    };
    this.emit("agent:event", full);
  }

  getState(): LoopState {
    return this.state;
  }

  getTurnCount(): number {
    return this.turnCount;
  }

  /** Snapshot of the conversation so far. */
  getHistory(): readonly ChatMessage[] {
    return [...this.history];
  }

  /** Drive the conversation to one of its terminal states. A loop runs once. */
  async run(): Promise<RunOutcome> {
    if (this.started) {
      throw new Error("AgentLoop.run() may only be called once");
    }
    this.started = true;

    const tools = [buildComputerUseTool(this.options.display)];
    this.history.push({ role: "system", content: buildSystemPrompt() });
    this.history.push({ role: "user", content: this.options.task });

    log.info(`agent loop started: model=${this.options.model}, max_turns=${this.options.maxTurns}`);
    this.emitEvent({ type: "run:start" });

    let reason: FinishReason = "turn-limit";
    while (this.turnCount < this.options.maxTurns) {
      this.turnCount++;
      this.emitEvent({ type: "turn:start" });

      this.state = "AWAITING_MODEL";
      const reply = await this.chat.complete({
        model: this.options.model,
        messages: [...this.history],
        tools,
        temperature: this.options.temperature,
      });
      this.history.push(toAssistantMessage(reply));
      this.emitEvent({
        type: "turn:response",
        response: reply.content ?? undefined,
        toolCallCount: reply.toolCalls.length,
      });

      if (reply.toolCalls.length === 0) {
        this.finalAnswer = reply.content ?? "";
        reason = "model-text-answer";
        break;
      }

      this.state = "DISPATCHING_TOOLS";
      // Every call gets its result, even after a terminate earlier in the round.
      for (const call of reply.toolCalls) {
        await this.dispatch(call);
      }

      if (this.terminated !== null) {
        reason = "terminate-signal";
        break;
      }
      this.state = "RUNNING";
    }

    if (reason === "turn-limit") {
      log.info(`max turns reached (${this.options.maxTurns})`);
    }

    this.state = "FINISHED";
    const outcome: RunOutcome = {
      finalAnswer: this.finalAnswer,
      terminated: this.terminated,
      reason,
      turns: this.turnCount,
    };
    this.emitEvent({ type: "run:end", reason, outcome });
    return outcome;
  }

  private async dispatch(call: ToolCallRequest): Promise<void> {
    let payload: ActionResult | ToolErrorResult;
    try {
      payload = await this.execute(call);
    } catch (err) {
      if (!(err instanceof ActionError)) throw err;
      log.warn(`tool call ${call.id} rejected: ${err.message}`);
      this.emitEvent({ type: "tool:error", callId: call.id, error: toError(err) });
      payload = { status: "error", error: err.name, detail: err.message };
    }

    const message: ToolMessage = {
      role: "tool",
      tool_call_id: call.id,
      name: call.name,
      content: JSON.stringify(payload),
    };
    this.history.push(message);
  }

  private async execute(call: ToolCallRequest): Promise<ActionResult> {
    if (call.name !== COMPUTER_USE_TOOL_NAME) {
      throw new UnsupportedActionError(call.name, `Unknown tool "${call.name}"; only ${COMPUTER_USE_TOOL_NAME} is available.`);
    }

    const args = parseToolArguments(call.arguments);
    this.emitEvent({ type: "turn:action", callId: call.id, action: describeAction(args) });

    const result = await this.executor.execute(args);
    this.emitEvent({ type: "turn:result", callId: call.id, result });

    if (result.status === "answer") {
      this.finalAnswer = result.text ?? "";
      this.emitEvent({ type: "agent:answer", callId: call.id, answer: this.finalAnswer });
    }
    if (result.status === "terminate" && result.result) {
      this.terminated = result.result;
      this.emitEvent({ type: "agent:terminate", callId: call.id, verdict: result.result });
    }
    return result;
  }
}

function toAssistantMessage(reply: ModelReply): ChatMessage {
  if (reply.toolCalls.length === 0) {
    return { role: "assistant", content: reply.content };
  }
  return {
    role: "assistant",
    content: reply.content,
    tool_calls: reply.toolCalls.map((call) => ({
      id: call.id,
      type: "function" as const,
      function: { name: call.name, arguments: call.arguments },
    })),
  };
}

function describeAction(args: unknown): string {
  if (typeof args === "object" && args !== null && "action" in args && typeof args.action === "string") {
    return args.action;
  }
  return "unknown";
}
