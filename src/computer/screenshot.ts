import fs from "fs";
import path from "path";
import sharp from "sharp";
import { DisplayUnavailableError } from "../errors.js";
import { getLogger } from "../util/logger.js";
import { timestampSlug } from "../util/timing.js";
import type { Point } from "../agent/schema.js";
import type { CaptureBackend, Frame, InputBackend, MonitorGeometry } from "./backend.js";

const log = getLogger("screenshot");

export interface ScreenshotRef {
  /** `data:image/png;base64,...` */
  image: string;
  path: string;
  cursor: Point;
  display: { width: number; height: number };
}

export interface ScreenshotServiceOptions {
  directory: string;
  /** 1-based; 0 selects the combined virtual display. */
  monitorIndex: number;
  now?: () => Date;
}

type RawChannels = 1 | 2 | 3 | 4;

function isRawChannels(n: number): n is RawChannels {
  return n === 1 || n === 2 || n === 3 || n === 4;
}

export class ScreenshotService {
  private backend: CaptureBackend;
  private input: InputBackend;
  private directory: string;
  private monitorIndex: number;
  private now: () => Date;

  constructor(capture: CaptureBackend, input: InputBackend, options: ScreenshotServiceOptions) {
    this.backend = capture;
    this.input = input;
    this.directory = path.resolve(options.directory);
    this.monitorIndex = options.monitorIndex;
    this.now = options.now ?? (() => new Date());
  }

  /** Geometry of the configured monitor. */
  async describeDisplay(): Promise<MonitorGeometry> {
    const monitors = await this.backend.monitors();
    const monitor = monitors[this.monitorIndex];
    if (!monitor) {
      throw new DisplayUnavailableError(
        `Monitor ${this.monitorIndex} not found: ${Math.max(monitors.length - 1, 0)} monitor(s) available ` +
          `(index 0 is the combined display). Pass --monitor-index or a --display-profile that lists it.`,
      );
    }
    return monitor;
  }

  async capture(): Promise<ScreenshotRef> {
    const monitor = await this.describeDisplay();
    const frame = await this.backend.grab(monitor);
    const png = await encodePng(frame);

    await fs.promises.mkdir(this.directory, { recursive: true });
    const filePath = await this.writeUnique(png);
    log.debug(`saved ${frame.width}x${frame.height} screenshot to ${filePath}`);

    const cursor = await this.input.cursorPosition();
    return {
      image: `data:image/png;base64,${png.toString("base64")}`,
      path: filePath,
      cursor,
      display: { width: monitor.width, height: monitor.height },
    };
  }

  /** Write under the current timestamp, adding -1, -2, ... while that name is taken. */
  private async writeUnique(png: Buffer): Promise<string> {
    const slug = timestampSlug(this.now());
    for (let n = 0; ; n++) {
      const filePath = path.join(this.directory, n === 0 ? `${slug}.png` : `${slug}-${n}.png`);
      try {
        await fs.promises.writeFile(filePath, png, { flag: "wx" });
        return filePath;
      } catch (err) {
        if (!isAlreadyExists(err)) throw err;
      }
    }
  }
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

export async function encodePng(frame: Frame): Promise<Buffer> {
  const { width, height, channels, data } = frame;
  if (!isRawChannels(channels)) {
    throw new Error(`Unsupported frame layout: ${channels} channels`);
  }
  return sharp(data, { raw: { width, height, channels } }).png().toBuffer();
}
