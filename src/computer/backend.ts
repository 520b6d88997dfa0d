import type { Point } from "../agent/schema.js";

export type MouseButton = "left" | "right" | "middle";

/**
 * Input-injection primitives. One instance drives the real mouse and
 * keyboard; tests substitute a recorder.
 */
export interface InputBackend {
  /** Move the cursor, animated over `durationMs` (0 = jump). */
  moveTo(target: Point, durationMs: number): Promise<void>;
  /** Click `count` times with `button` at the current cursor position. */
  click(button: MouseButton, count: number): Promise<void>;
  pressButton(button: MouseButton): Promise<void>;
  releaseButton(button: MouseButton): Promise<void>;
  /** Positive scrolls up, negative down. */
  scroll(amount: number): Promise<void>;
  /** Positive scrolls right, negative left. */
  hscroll(amount: number): Promise<void>;
  keyDown(key: string): Promise<void>;
  keyUp(key: string): Promise<void>;
  typeChar(char: string): Promise<void>;
  cursorPosition(): Promise<Point>;
}

export interface MonitorGeometry {
  left: number;
  top: number;
  width: number;
  height: number;
}

/** Raw pixels, row-major, `channels` bytes per pixel in RGB(A) order. */
export interface Frame {
  width: number;
  height: number;
  channels: number;
  data: Buffer;
}

export interface CaptureBackend {
  /**
   * Index 0 is the virtual display spanning every monitor; physical monitors
   * follow from index 1.
   */
  monitors(): Promise<MonitorGeometry[]>;
  grab(monitor: MonitorGeometry): Promise<Frame>;
}
