import { config as dotenvConfig } from "dotenv";
import { Command } from "commander";
import { z } from "zod";
import { ConfigError } from "./errors.js";

dotenvConfig();

export interface AppConfig {
  model: string;
  task: string;
  apiKey: string;
  baseURL: string;
  timeoutMs: number;
  maxTurns: number;
  temperature: number;
  screenshotDir: string;
  monitorIndex: number;
  mouseMoveDurationMs: number;
  dragDurationMs: number;
  typingIntervalMs: number;
  displayProfile?: string;
  verbose: boolean;
  logLevel: string;
}

const seconds = (name: string) =>
  z.coerce.number({ invalid_type_error: `${name} must be a number` }).finite().nonnegative();

const OptionsSchema = z.object({
  model: z.string().min(1),
  task: z.string().min(1),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url(),
  timeout: seconds("--timeout").positive(),
  maxTurns: z.coerce.number().int().positive(),
  temperature: z.coerce.number().min(0).max(2),
  screenshotDir: z.string().min(1),
  monitorIndex: z.coerce.number().int().nonnegative(),
  mouseMoveDuration: seconds("--mouse-move-duration"),
  dragDuration: seconds("--drag-duration"),
  typingInterval: z.coerce.number().int().nonnegative(),
  displayProfile: z.string().optional(),
  verbose: z.boolean(),
});

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
  return new Command()
    .name("deskpilot")
    .description("Desktop GUI agent: a vision-language model driving mouse, keyboard and screenshots")
    .option("--model <name>", "model name", env.AGENT_MODEL || "Qwen/Qwen3-VL-30B-A3B-Instruct")
    .option("--task <text>", "task for the agent", "Open a browser and search for the weather.")
    // No default here: commander would print the key in --help.
    .option("--api-key <key>", "API key for the model endpoint (env OPENAI_API_KEY)")
    .option("--base-url <url>", "chat-completions base URL", env.OPENAI_BASE_URL || "http://localhost:8000/v1")
    .option("--timeout <seconds>", "model request timeout", "600")
    .option("--max-turns <number>", "max model rounds", "200")
    .option("--temperature <number>", "sampling temperature", "0")
    .option("--screenshot-dir <dir>", "where screenshots are written", "./screenshots")
    .option("--monitor-index <number>", "monitor to capture (1-based, 0 = all combined)", "1")
    .option("--mouse-move-duration <seconds>", "duration of mouse_move animations", "0")
    .option("--drag-duration <seconds>", "duration of left_click_drag moves", "0.15")
    .option("--typing-interval <ms>", "pause between typed characters", "10")
    .option("--display-profile <name>", "monitor layout from displays/<name>.yaml")
    .option("-v, --verbose", "debug logging", false);
}

/**
 * Parse command-line arguments (without the node and script entries) into an
 * AppConfig. Environment values act as defaults for the endpoint settings.
 */
export function parseConfig(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const program = buildProgram(env).parse(args, { from: "user" });
  const parsed = OptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `--${toKebab(String(i.path[0] ?? ""))}: ${i.message}`);
    throw new ConfigError(`Invalid options: ${issues.join("; ")}`);
  }

  const opts = parsed.data;
  return {
    model: opts.model,
    task: opts.task,
    apiKey: opts.apiKey ?? (env.OPENAI_API_KEY || "EMPTY"),
    baseURL: opts.baseUrl,
    timeoutMs: Math.round(opts.timeout * 1000),
    maxTurns: opts.maxTurns,
    temperature: opts.temperature,
    screenshotDir: opts.screenshotDir,
    monitorIndex: opts.monitorIndex,
    mouseMoveDurationMs: Math.round(opts.mouseMoveDuration * 1000),
    dragDurationMs: Math.round(opts.dragDuration * 1000),
    typingIntervalMs: opts.typingInterval,
    displayProfile: opts.displayProfile,
    verbose: opts.verbose,
    logLevel: env.LOG_LEVEL || "info",
  };
}

function toKebab(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}
