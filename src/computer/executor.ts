import { validateAction, type ActionRequest, type Point } from "../agent/schema.js";
import { getLogger } from "../util/logger.js";
import { sleep, typeWithDelay } from "../util/timing.js";
import { expandChord } from "./keys.js";
import type { InputBackend, MouseButton } from "./backend.js";
import type { ScreenshotRef, ScreenshotService } from "./screenshot.js";

const log = getLogger("executor");

export interface ActionResult {
  status: "ok" | "answer" | "terminate";
  detail?: string;
  text?: string;
  result?: "success" | "failure";
  screenshot?: ScreenshotRef;
}

export interface ExecutorOptions {
  mouseMoveDurationMs: number;
  dragDurationMs: number;
  typingIntervalMs: number;
}

type Effect = { detail: string };

const CLICK_COUNTS = { double_click: 2, triple_click: 3 } as const;

/**
 * Runs one validated action against the input backend. Anything with a
 * physical effect is followed by a fresh screenshot.
 */
export class ActionExecutor {
  private input: InputBackend;
  private screenshots: ScreenshotService;
  private options: ExecutorOptions;

  constructor(input: InputBackend, screenshots: ScreenshotService, options: ExecutorOptions) {
    this.input = input;
    this.screenshots = screenshots;
    this.options = options;
  }

  /** Validate raw tool-call arguments, then run them. */
  async execute(raw: unknown): Promise<ActionResult> {
    const request = validateAction(raw);
    return this.run(request);
  }

  async run(request: ActionRequest): Promise<ActionResult> {
    log.debug(`executing ${request.action}`);

    switch (request.action) {
      case "answer":
        return { status: "answer", text: request.text };
      case "terminate":
        return { status: "terminate", result: request.status };
      default: {
        const effect = await this.perform(request);
        const screenshot = await this.screenshots.capture();
        return { status: "ok", detail: effect.detail, screenshot };
      }
    }
  }

  private async perform(
    request: Exclude<ActionRequest, { action: "answer" | "terminate" }>,
  ): Promise<Effect> {
    switch (request.action) {
      case "mouse_move": {
        if (!request.coordinate) {
          return { detail: "Cursor left at its current position." };
        }
        const { x, y } = request.coordinate;
        await this.input.moveTo(request.coordinate, this.options.mouseMoveDurationMs);
        return { detail: `Moved to (${x}, ${y}).` };
      }
      case "left_click":
        return this.clickAt("left", "Left", request.coordinate);
      case "right_click":
        return this.clickAt("right", "Right", request.coordinate);
      case "middle_click":
        return this.clickAt("middle", "Middle", request.coordinate);
      case "double_click":
      case "triple_click": {
        const { x, y } = request.coordinate;
        await this.input.moveTo(request.coordinate, 0);
        await this.input.click("left", CLICK_COUNTS[request.action]);
        const label = request.action === "double_click" ? "Double" : "Triple";
        return { detail: `${label} click at (${x}, ${y}).` };
      }
      case "left_click_drag": {
        const { x, y } = request.coordinate;
        await this.input.pressButton("left");
        try {
          await this.input.moveTo(request.coordinate, this.options.dragDurationMs);
        } finally {
          await this.input.releaseButton("left");
        }
        return { detail: `Drag to (${x}, ${y}).` };
      }
      case "scroll":
        await this.input.scroll(request.pixels);
        return { detail: `Scroll ${request.pixels} vertically.` };
      case "hscroll":
        await this.input.hscroll(request.pixels);
        return { detail: `Scroll ${request.pixels} horizontally.` };
      case "type":
        await typeWithDelay((char) => this.input.typeChar(char), request.text, this.options.typingIntervalMs);
        return { detail: `Typed "${request.text.slice(0, 50)}".` };
      case "key":
        return this.pressChord(request.keys);
      case "wait":
        await sleep(request.time * 1000);
        return { detail: `Waited ${request.time} seconds.` };
    }
  }

  private async clickAt(button: MouseButton, label: string, coordinate: Point | undefined): Promise<Effect> {
    if (!coordinate) {
      await this.input.click(button, 1);
      return { detail: `${label} click at current cursor.` };
    }
    await this.input.moveTo(coordinate, 0);
    await this.input.click(button, 1);
    return { detail: `${label} click at (${coordinate.x}, ${coordinate.y}).` };
  }

  /** Press every key in order, then release in reverse. */
  private async pressChord(requested: string[]): Promise<Effect> {
    const keys = expandChord(requested);
    const held: string[] = [];
    try {
      for (const key of keys) {
        await this.input.keyDown(key);
        held.push(key);
      }
    } finally {
      for (const key of held.reverse()) {
        await this.input.keyUp(key);
      }
    }
    return { detail: `Pressed keys ${JSON.stringify(requested)}.` };
  }
}
