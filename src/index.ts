#!/usr/bin/env node
import { parseConfig } from "./config.js";
import { initLogger, getLogger } from "./util/logger.js";
import { AgentError } from "./errors.js";
import { loadNut, NutCaptureBackend, NutInputBackend } from "./computer/nut.js";
import { ScreenshotService } from "./computer/screenshot.js";
import { ActionExecutor } from "./computer/executor.js";
import { loadDisplayProfile } from "./display/loader.js";
import { profileMonitors } from "./display/types.js";
import { createOpenAIClient, OpenAIChatModel } from "./llm/openai.js";
import { AgentLoop } from "./agent/loop.js";
import { attachReporter, formatOutcome } from "./agent/reporter.js";

async function main(): Promise<void> {
  const config = parseConfig();
  initLogger(config.verbose ? "debug" : config.logLevel);
  const log = getLogger("main");

  log.info(`deskpilot v0.1.0: model ${config.model} at ${config.baseURL}`);

  const layout = config.displayProfile ? profileMonitors(loadDisplayProfile(config.displayProfile)) : undefined;

  // Input and capture backends are acquired once and shared for the whole run
  const nut = await loadNut();
  const input = new NutInputBackend(nut);
  const screenshots = new ScreenshotService(new NutCaptureBackend(nut, layout), input, {
    directory: config.screenshotDir,
    monitorIndex: config.monitorIndex,
  });
  const display = await screenshots.describeDisplay();
  log.info(`capturing monitor ${config.monitorIndex} (${display.width}x${display.height}) into ${config.screenshotDir}`);

  const executor = new ActionExecutor(input, screenshots, {
    mouseMoveDurationMs: config.mouseMoveDurationMs,
    dragDurationMs: config.dragDurationMs,
    typingIntervalMs: config.typingIntervalMs,
  });

  const chat = new OpenAIChatModel(
    createOpenAIClient({ apiKey: config.apiKey, baseURL: config.baseURL, timeoutMs: config.timeoutMs }),
  );

  const agent = new AgentLoop(chat, executor, {
    model: config.model,
    task: config.task,
    temperature: config.temperature,
    maxTurns: config.maxTurns,
    display: { width: display.width, height: display.height },
  });
  attachReporter(agent);

  process.on("SIGINT", () => {
    log.info("SIGINT received, stopping");
    process.exit(130);
  });

  process.on("SIGTERM", () => {
    log.info("SIGTERM received, stopping");
    process.exit(143);
  });

  log.info(`task: ${config.task}`);
  const outcome = await agent.run();
  for (const line of formatOutcome(outcome)) {
    log.info(line);
  }
}

main().catch((err: unknown) => {
  if (err instanceof AgentError) {
    getLogger("main").error(`${err.name}: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
