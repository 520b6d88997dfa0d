import type { Button as NutButton, Key as NutKey } from "@nut-tree-fork/nut-js";
import { DisplayUnavailableError, ValidationError, toError } from "../errors.js";
import { getLogger } from "../util/logger.js";
import { normalizeKeyName } from "./keys.js";
import { listPhysicalMonitors, withCombined, type MonitorSource } from "./monitors.js";
import type { Point } from "../agent/schema.js";
import type { CaptureBackend, Frame, InputBackend, MonitorGeometry, MouseButton } from "./backend.js";

// nut.js ships CommonJS; its module.exports arrives as the default export.
type NutModule = typeof import("@nut-tree-fork/nut-js");

const log = getLogger("nut");

const REMEDIATION =
  "An X11 session or a virtual display is required, e.g. " +
  '`sudo apt install xvfb && xvfb-run -s "-screen 0 1920x1080x24" deskpilot ...`.';

/** Fail fast when there is no graphical session to attach to. */
export function ensureDisplay(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): void {
  if (platform === "linux" && !env.DISPLAY) {
    throw new DisplayUnavailableError(`The DISPLAY environment variable is not set. ${REMEDIATION}`);
  }
}

/**
 * Load nut.js. Its native module binds to the display on load, so this runs
 * only after `ensureDisplay` has passed.
 */
export async function loadNut(): Promise<NutModule> {
  ensureDisplay();
  try {
    const nut = await import("@nut-tree-fork/nut-js");
    return nut.default;
  } catch (err) {
    throw new DisplayUnavailableError(
      `Could not load the native input backend: ${toError(err).message}. ${REMEDIATION}`,
      { cause: err },
    );
  }
}

export class NutInputBackend implements InputBackend {
  private nut: NutModule;
  private keys = new Map<string, NutKey>();

  constructor(nut: NutModule) {
    this.nut = nut;
    // Pacing is decided by the executor (typing cadence, move durations).
    nut.mouse.config.autoDelayMs = 0;
    nut.keyboard.config.autoDelayMs = 0;

    for (const [name, value] of Object.entries(nut.Key)) {
      if (typeof value === "number") {
        this.keys.set(name.toLowerCase(), value);
      }
    }
  }

  async moveTo(target: Point, durationMs: number): Promise<void> {
    const { mouse, straightTo, Point: NutPoint } = this.nut;
    const point = new NutPoint(target.x, target.y);
    if (durationMs <= 0) {
      await mouse.setPosition(point);
      return;
    }

    const from = await mouse.getPosition();
    const distance = Math.hypot(target.x - from.x, target.y - from.y);
    if (distance === 0) return;

    // mouseSpeed is in pixels per second
    mouse.config.mouseSpeed = Math.max(1, distance / (durationMs / 1000));
    await mouse.move(straightTo(point));
  }

  async click(button: MouseButton, count: number): Promise<void> {
    const nutButton = this.button(button);
    for (let i = 0; i < count; i++) {
      await this.nut.mouse.click(nutButton);
    }
  }

  async pressButton(button: MouseButton): Promise<void> {
    await this.nut.mouse.pressButton(this.button(button));
  }

  async releaseButton(button: MouseButton): Promise<void> {
    await this.nut.mouse.releaseButton(this.button(button));
  }

  async scroll(amount: number): Promise<void> {
    if (amount > 0) await this.nut.mouse.scrollUp(amount);
    else if (amount < 0) await this.nut.mouse.scrollDown(-amount);
  }

  async hscroll(amount: number): Promise<void> {
    if (amount > 0) await this.nut.mouse.scrollRight(amount);
    else if (amount < 0) await this.nut.mouse.scrollLeft(-amount);
  }

  async keyDown(key: string): Promise<void> {
    await this.nut.keyboard.pressKey(this.resolveKey(key));
  }

  async keyUp(key: string): Promise<void> {
    await this.nut.keyboard.releaseKey(this.resolveKey(key));
  }

  async typeChar(char: string): Promise<void> {
    await this.nut.keyboard.type(char);
  }

  async cursorPosition(): Promise<Point> {
    const { x, y } = await this.nut.mouse.getPosition();
    return { x, y };
  }

  private resolveKey(name: string): NutKey {
    const key = this.keys.get(normalizeKeyName(name).toLowerCase());
    if (key === undefined) {
      throw new ValidationError("keys", `Unknown key "${name}".`);
    }
    return key;
  }

  private button(button: MouseButton): NutButton {
    const { Button } = this.nut;
    switch (button) {
      case "left":
        return Button.LEFT;
      case "right":
        return Button.RIGHT;
      case "middle":
        return Button.MIDDLE;
    }
  }
}

export class NutCaptureBackend implements CaptureBackend {
  private nut: NutModule;
  private layout: MonitorGeometry[] | undefined;
  private listMonitors: MonitorSource;

  /**
   * `layout` follows the 0 = combined convention and overrides enumeration.
   * Without it the attached monitors are enumerated once; if that yields
   * nothing the whole screen is monitor 1.
   */
  constructor(nut: NutModule, layout?: MonitorGeometry[], listMonitors: MonitorSource = listPhysicalMonitors) {
    this.nut = nut;
    this.layout = layout;
    this.listMonitors = listMonitors;
  }

  async monitors(): Promise<MonitorGeometry[]> {
    if (!this.layout) {
      this.layout = await this.enumerate();
    }
    return this.layout;
  }

  private async enumerate(): Promise<MonitorGeometry[]> {
    try {
      const physical = await this.listMonitors();
      if (physical.length > 0) {
        log.debug(`found ${physical.length} monitor(s)`);
        return withCombined(physical);
      }
      log.warn("monitor enumeration returned no monitors, using the full screen as monitor 1");
    } catch (err) {
      log.warn(`monitor enumeration failed (${toError(err).message}), using the full screen as monitor 1`);
    }
    const { screen } = this.nut;
    const full = { left: 0, top: 0, width: await screen.width(), height: await screen.height() };
    return [full, full];
  }

  async grab(monitor: MonitorGeometry): Promise<Frame> {
    const { screen, Region } = this.nut;
    const region = new Region(monitor.left, monitor.top, monitor.width, monitor.height);
    const image = await (await screen.grabRegion(region)).toRGB();
    log.debug(`grabbed ${image.width}x${image.height} at (${monitor.left}, ${monitor.top})`);
    return { width: image.width, height: image.height, channels: image.channels, data: image.data };
  }
}
