import { z } from "zod";
import type { MonitorGeometry } from "../computer/backend.js";
import { withCombined } from "../computer/monitors.js";

export const MonitorSchema = z.object({
  name: z.string().optional(),
  left: z.number().int().default(0),
  top: z.number().int().default(0),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const DisplayProfileSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  monitors: z.array(MonitorSchema).min(1),
});

export type MonitorSpec = z.infer<typeof MonitorSchema>;
export type DisplayProfile = z.infer<typeof DisplayProfileSchema>;

/** Monitor list indexed the way the screenshot service expects: 0 = combined. */
export function profileMonitors(profile: DisplayProfile): MonitorGeometry[] {
  return withCombined(profile.monitors.map(({ left, top, width, height }) => ({ left, top, width, height })));
}
