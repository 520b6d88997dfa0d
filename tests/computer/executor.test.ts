import fs from "fs";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ActionExecutor, type ActionResult, type ExecutorOptions } from "../../src/computer/executor.js";
import { ScreenshotService } from "../../src/computer/screenshot.js";
import { UnsupportedActionError, ValidationError } from "../../src/errors.js";
import { RecordingInput, SolidCapture, makeTempDir } from "../fakes.js";

const PNG_PREFIX = "data:image/png;base64,";

describe("ActionExecutor", () => {
  let input: RecordingInput;
  let capture: SolidCapture;
  let dir: string;
  let executor: ActionExecutor;

  beforeEach(() => {
    input = new RecordingInput();
    capture = new SolidCapture();
    dir = makeTempDir();
    const screenshots = new ScreenshotService(capture, input, { directory: dir, monitorIndex: 1 });
    executor = new ActionExecutor(input, screenshots, {
      mouseMoveDurationMs: 0,
      dragDurationMs: 150,
      typingIntervalMs: 0,
    });
  });

  function expectScreenshot(result: ActionResult): void {
    expect(result.status).toBe("ok");
    const shot = result.screenshot;
    expect(shot).toBeDefined();
    if (!shot) return;
    expect(shot.image.startsWith(PNG_PREFIX)).toBe(true);
    expect(shot.image.length).toBeGreaterThan(PNG_PREFIX.length);
    expect(fs.existsSync(shot.path)).toBe(true);
    expect(shot.display).toEqual({ width: 64, height: 48 });
  }

  describe("key", () => {
    it("presses keys in order and releases them in reverse", async () => {
      const result = await executor.execute({ action: "key", keys: ["ctrl", "c"] });
      expect(input.events).toEqual([
        ["down", "ctrl"],
        ["down", "c"],
        ["up", "c"],
        ["up", "ctrl"],
      ]);
      expect(result.detail).toBe('Pressed keys ["ctrl","c"].');
      expectScreenshot(result);
    });

    it("splits combined entries into a chord", async () => {
      await executor.execute({ action: "key", keys: ["ctrl+shift+t"] });
      expect(input.events).toEqual([
        ["down", "ctrl"],
        ["down", "shift"],
        ["down", "t"],
        ["up", "t"],
        ["up", "shift"],
        ["up", "ctrl"],
      ]);
    });

    it("releases keys already held when a later key fails", async () => {
      input.unknownKeys.add("hyper");
      await expect(executor.execute({ action: "key", keys: ["ctrl", "hyper"] })).rejects.toThrow(ValidationError);
      expect(input.events).toEqual([
        ["down", "ctrl"],
        ["up", "ctrl"],
      ]);
    });

    it("rejects an empty key list before touching the keyboard", async () => {
      await expect(executor.execute({ action: "key", keys: [] })).rejects.toThrow(ValidationError);
      expect(input.events).toEqual([]);
      expect(capture.grabs).toEqual([]);
    });
  });

  describe("clicks", () => {
    it("moves to the coordinate before a left click", async () => {
      const result = await executor.execute({ action: "left_click", coordinate: [100, 200] });
      expect(input.events).toEqual([
        ["move", 100, 200, 0],
        ["click", "left", 1],
      ]);
      expect(result.detail).toBe("Left click at (100, 200).");
      expect(result.screenshot?.cursor).toEqual({ x: 100, y: 200 });
      expectScreenshot(result);
    });

    it("clicks in place without a coordinate", async () => {
      input.cursor = { x: 7, y: 9 };
      const result = await executor.execute({ action: "right_click" });
      expect(input.events).toEqual([["click", "right", 1]]);
      expect(result.detail).toBe("Right click at current cursor.");
      expect(result.screenshot?.cursor).toEqual({ x: 7, y: 9 });
    });

    it("middle clicks with the middle button", async () => {
      const result = await executor.execute({ action: "middle_click", coordinate: [5, 6] });
      expect(input.events).toEqual([
        ["move", 5, 6, 0],
        ["click", "middle", 1],
      ]);
      expect(result.detail).toBe("Middle click at (5, 6).");
    });

    it("double and triple click at the coordinate", async () => {
      await executor.execute({ action: "double_click", coordinate: [10, 20] });
      await executor.execute({ action: "triple_click", coordinate: [30, 40] });
      expect(input.events).toEqual([
        ["move", 10, 20, 0],
        ["click", "left", 2],
        ["move", 30, 40, 0],
        ["click", "left", 3],
      ]);
    });

    it.each(["double_click", "triple_click", "left_click_drag"])(
      "%s without a coordinate fails and takes no screenshot",
      async (action) => {
        await expect(executor.execute({ action })).rejects.toThrow(ValidationError);
        expect(input.events).toEqual([]);
        expect(fs.readdirSync(dir)).toEqual([]);
      },
    );
  });

  it("drags with the primary button held over the drag duration", async () => {
    const result = await executor.execute({ action: "left_click_drag", coordinate: [300, 400] });
    expect(input.events).toEqual([
      ["press", "left"],
      ["move", 300, 400, 150],
      ["release", "left"],
    ]);
    expect(result.detail).toBe("Drag to (300, 400).");
    expect(capture.grabs).toHaveLength(1);
  });

  it("moves the cursor over the configured duration", async () => {
    const screenshots = new ScreenshotService(capture, input, { directory: dir, monitorIndex: 1 });
    const slow = new ActionExecutor(input, screenshots, {
      mouseMoveDurationMs: 250,
      dragDurationMs: 150,
      typingIntervalMs: 0,
    });
    const result = await slow.execute({ action: "mouse_move", coordinate: [12.9, 34.1] });
    expect(input.events).toEqual([["move", 12, 34, 250]]);
    expect(result.detail).toBe("Moved to (12, 34).");
  });

  it("leaves the cursor alone for mouse_move without a coordinate", async () => {
    const result = await executor.execute({ action: "mouse_move" });
    expect(input.events).toEqual([]);
    expectScreenshot(result);
  });

  it("scrolls zero pixels by default", async () => {
    const result = await executor.execute({ action: "scroll" });
    expect(input.events).toEqual([["scroll", 0]]);
    expect(result.detail).toBe("Scroll 0 vertically.");
  });

  it("scrolls horizontally by whole pixels", async () => {
    const result = await executor.execute({ action: "hscroll", pixels: -3.9 });
    expect(input.events).toEqual([["hscroll", -3]]);
    expect(result.detail).toBe("Scroll -3 horizontally.");
  });

  it("types text one character at a time", async () => {
    const result = await executor.execute({ action: "type", text: "hi!" });
    expect(input.events).toEqual([
      ["char", "h"],
      ["char", "i"],
      ["char", "!"],
    ]);
    expect(result.detail).toBe('Typed "hi!".');
  });

  it("accepts empty text", async () => {
    const result = await executor.execute({ action: "type", text: "" });
    expect(input.events).toEqual([]);
    expect(result.detail).toBe('Typed "".');
    expectScreenshot(result);
  });

  it("waits and then captures", async () => {
    const result = await executor.execute({ action: "wait", time: 0 });
    expect(result.detail).toBe("Waited 0 seconds.");
    expectScreenshot(result);
  });

  it("returns answers without a screenshot", async () => {
    const result = await executor.execute({ action: "answer" });
    expect(result).toEqual({ status: "answer", text: "" });
    expect(capture.grabs).toEqual([]);
  });

  it("returns terminate verdicts without a screenshot", async () => {
    expect(await executor.execute({ action: "terminate", status: "success" })).toEqual({
      status: "terminate",
      result: "success",
    });
    expect(await executor.execute({ action: "terminate", status: "failure" })).toEqual({
      status: "terminate",
      result: "failure",
    });
    expect(capture.grabs).toEqual([]);
  });

  it("rejects an invalid terminate status", async () => {
    await expect(executor.execute({ action: "terminate", status: "maybe" })).rejects.toThrow(ValidationError);
  });

  it("rejects unsupported actions", async () => {
    await expect(executor.execute({ action: "zoom" })).rejects.toThrow(UnsupportedActionError);
  });
});

describe("ActionExecutor pacing", () => {
  let input: RecordingInput;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    input = new RecordingInput();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function makeExecutor(options: Partial<ExecutorOptions>): ActionExecutor {
    const screenshots = new ScreenshotService(new SolidCapture(), input, {
      directory: makeTempDir(),
      monitorIndex: 1,
    });
    return new ActionExecutor(input, screenshots, {
      mouseMoveDurationMs: 0,
      dragDurationMs: 0,
      typingIntervalMs: 0,
      ...options,
    });
  }

  const typed = () => input.events.flatMap((e) => (e[0] === "char" ? [e[1]] : []));

  it("types one character per interval", async () => {
    const pending = makeExecutor({ typingIntervalMs: 10 }).execute({ action: "type", text: "abc" });

    await vi.advanceTimersByTimeAsync(0);
    expect(typed()).toEqual(["a"]);
    await vi.advanceTimersByTimeAsync(9);
    expect(typed()).toEqual(["a"]);
    await vi.advanceTimersByTimeAsync(1);
    expect(typed()).toEqual(["a", "b"]);
    await vi.advanceTimersByTimeAsync(10);
    expect(typed()).toEqual(["a", "b", "c"]);
    await vi.advanceTimersByTimeAsync(10);

    expect((await pending).detail).toBe('Typed "abc".');
  });

  it("waits the requested number of seconds before capturing", async () => {
    const capture = new SolidCapture();
    const screenshots = new ScreenshotService(capture, input, { directory: makeTempDir(), monitorIndex: 1 });
    const executor = new ActionExecutor(input, screenshots, {
      mouseMoveDurationMs: 0,
      dragDurationMs: 0,
      typingIntervalMs: 0,
    });
    const settled = vi.fn();
    const pending = executor.execute({ action: "wait", time: 2 });
    pending.then(settled, settled);

    await vi.advanceTimersByTimeAsync(1999);
    expect(settled).not.toHaveBeenCalled();
    expect(capture.grabs).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect((await pending).detail).toBe("Waited 2 seconds.");
    expect(capture.grabs).toHaveLength(1);
  });

  it("passes the drag duration to the move", async () => {
    await makeExecutor({ dragDurationMs: 400 }).execute({ action: "left_click_drag", coordinate: [1, 2] });
    expect(input.events).toEqual([
      ["press", "left"],
      ["move", 1, 2, 400],
      ["release", "left"],
    ]);
  });
});
