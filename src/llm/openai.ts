import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
  ChatCompletionToolMessageParam,
} from "openai/resources/chat/completions";
import { EndpointError, toError } from "../errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("llm");

export type ChatMessage = ChatCompletionMessageParam;

/** Tool results also carry the function name, as OpenAI-compatible servers accept. */
export type ToolMessage = ChatCompletionToolMessageParam & { name: string };

export interface ToolCallRequest {
  id: string;
  name: string;
  /** JSON text exactly as the model produced it. */
  arguments: string;
}

export interface ModelReply {
  content: string | null;
  toolCalls: ToolCallRequest[];
}

export interface ChatRequest {
  model: string;
  messages: readonly ChatMessage[];
  tools: ChatCompletionTool[];
  temperature: number;
}

/** The model endpoint as the conversation loop sees it. */
export interface ChatModel {
  complete(request: ChatRequest): Promise<ModelReply>;
}

export interface ChatClientOptions {
  apiKey: string;
  baseURL: string;
  timeoutMs: number;
}

/** The slice of the OpenAI client this module calls. */
export interface CompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export function createOpenAIClient(options: ChatClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    // Failures end the run; nothing is retried behind the loop's back.
    maxRetries: 0,
  });
}

export class OpenAIChatModel implements ChatModel {
  private client: CompletionsClient;

  constructor(client: CompletionsClient) {
    this.client = client;
  }

  async complete(request: ChatRequest): Promise<ModelReply> {
    log.debug(`requesting completion (${request.messages.length} messages, model=${request.model})`);

    let completion: ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: request.model,
        messages: [...request.messages],
        tools: request.tools,
        temperature: request.temperature,
      });
    } catch (err) {
      throw toEndpointError(err);
    }

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new EndpointError("Model endpoint returned no choices");
    }

    const toolCalls = (message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    }));

    log.debug(`reply: ${message.content?.length ?? 0} chars, ${toolCalls.length} tool call(s)`);
    return { content: message.content, toolCalls };
  }
}

function toEndpointError(err: unknown): EndpointError {
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new EndpointError(`Model request timed out: ${err.message}`, { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    const status = typeof err.status === "number" ? err.status : undefined;
    const label = status === undefined ? "Model request failed" : `Model endpoint returned HTTP ${status}`;
    return new EndpointError(`${label}: ${err.message}`, { status, cause: err });
  }
  const error = toError(err);
  return new EndpointError(`Model request failed: ${error.message}`, { cause: err });
}
