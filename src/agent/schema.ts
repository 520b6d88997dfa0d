import { z } from "zod";
import type { ChatCompletionTool } from "openai/resources/chat/completions";
import { UnsupportedActionError, ValidationError } from "../errors.js";

export const COMPUTER_USE_TOOL_NAME = "computer_use";

export const ACTION_KINDS = [
  "key",
  "type",
  "mouse_move",
  "left_click",
  "left_click_drag",
  "right_click",
  "middle_click",
  "double_click",
  "triple_click",
  "scroll",
  "hscroll",
  "wait",
  "terminate",
  "answer",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

const ACTION_KIND_SET: ReadonlySet<string> = new Set(ACTION_KINDS);

export function isActionKind(value: string): value is ActionKind {
  return ACTION_KIND_SET.has(value);
}

export interface DisplaySize {
  width: number;
  height: number;
}

/**
 * The function declaration sent with every model request. Advisory only:
 * whatever comes back still goes through `validateAction`.
 */
export function buildComputerUseTool(display?: DisplaySize): ChatCompletionTool {
  const resolution = display
    ? `* The screen's resolution is ${display.width}x${display.height}.\n`
    : "* The screen's resolution is dynamically detected from the host system.\n";

  return {
    type: "function",
    function: {
      name: COMPUTER_USE_TOOL_NAME,
      description:
        "Use a mouse and keyboard to interact with a computer, and take screenshots.\n" +
        "* This is an interface to a desktop GUI. You do not have access to a terminal or " +
        "applications menu. You must click on desktop icons to start applications.\n" +
        "* Some applications may take time to start or process actions, so you may need to wait " +
        "and take successive screenshots to see the results of your actions. E.g. if you click on " +
        "Firefox and a window doesn't open, try wait and taking another screenshot.\n" +
        resolution +
        "* Whenever you intend to move the cursor to click on an element like an icon, you should consult " +
        "a screenshot to determine the coordinates of the element before moving the cursor.\n" +
        "* Make sure to click any buttons, links, icons, etc with the cursor tip in the center of the element.",
      parameters: {
        type: "object",
        required: ["action"],
        properties: {
          action: {
            type: "string",
            enum: [...ACTION_KINDS],
            description: "The action to perform.",
          },
          keys: {
            type: "array",
            items: { type: "string" },
            description: "Keys used with action=key.",
          },
          text: {
            type: "string",
            description: "Text for action=type or action=answer.",
          },
          coordinate: {
            type: "array",
            items: { type: "number" },
            description: "Target coordinate [x, y] for mouse actions.",
          },
          pixels: {
            type: "number",
            description: "Scroll amount for action=scroll or action=hscroll.",
          },
          time: {
            type: "number",
            description: "Seconds to wait for action=wait.",
          },
          status: {
            type: "string",
            enum: ["success", "failure"],
            description: "Task status for action=terminate.",
          },
        },
      },
    },
  };
}

const coordinate = z
  .tuple([z.number().finite(), z.number().finite()])
  .transform(([x, y]) => ({ x: Math.trunc(x), y: Math.trunc(y) }));

// An empty list means "no coordinate", same as leaving the field out.
const optionalCoordinate = z.preprocess(
  (value) => (Array.isArray(value) && value.length === 0 ? undefined : value),
  coordinate.optional(),
);

const scrollPixels = z
  .number()
  .finite()
  .optional()
  .transform((value) => Math.trunc(value ?? 0));

export const ActionRequestSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("mouse_move"), coordinate: optionalCoordinate }),
  z.object({ action: z.literal("left_click"), coordinate: optionalCoordinate }),
  z.object({ action: z.literal("right_click"), coordinate: optionalCoordinate }),
  z.object({ action: z.literal("middle_click"), coordinate: optionalCoordinate }),
  z.object({ action: z.literal("double_click"), coordinate }),
  z.object({ action: z.literal("triple_click"), coordinate }),
  z.object({ action: z.literal("left_click_drag"), coordinate }),
  z.object({ action: z.literal("scroll"), pixels: scrollPixels }),
  z.object({ action: z.literal("hscroll"), pixels: scrollPixels }),
  z.object({ action: z.literal("type"), text: z.string() }),
  z.object({ action: z.literal("key"), keys: z.array(z.string().min(1)).min(1) }),
  z.object({ action: z.literal("wait"), time: z.number().finite().nonnegative() }),
  z.object({ action: z.literal("answer"), text: z.string().optional().transform((t) => t ?? "") }),
  z.object({ action: z.literal("terminate"), status: z.enum(["success", "failure"]) }),
]);

export type ActionRequest = z.infer<typeof ActionRequestSchema>;
export type Point = { x: number; y: number };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate one set of tool-call arguments. Models often send `null` for
 * fields that do not apply to the chosen action; those count as absent.
 */
export function validateAction(raw: unknown): ActionRequest {
  if (!isRecord(raw)) {
    throw new ValidationError("arguments", "Tool call arguments must be a JSON object.");
  }

  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== null) fields[key] = value;
  }

  const action = fields.action;
  if (typeof action !== "string") {
    throw new ValidationError("action", "action is required.");
  }
  if (!isActionKind(action)) {
    throw new UnsupportedActionError(action);
  }

  const parsed = ActionRequestSchema.safeParse(fields);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? String(issue.path[0]) : "arguments";
  if (fields[field] === undefined) {
    throw new ValidationError(field, `${field} is required for action=${action}.`);
  }
  const reason = issue ? `: ${issue.message}` : "";
  throw new ValidationError(field, `${field} is invalid for action=${action}${reason}.`);
}
