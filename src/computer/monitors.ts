import type { MonitorGeometry } from "./backend.js";

/** Physical monitors, in the order the windowing system reports them. */
export type MonitorSource = () => Promise<MonitorGeometry[]>;

/** Enumerate the attached monitors through node-screenshots. */
export const listPhysicalMonitors: MonitorSource = async () => {
  // node-screenshots ships CommonJS, like nut.js.
  const { Monitor } = (await import("node-screenshots")).default;
  return Monitor.all().map((monitor) => ({
    left: monitor.x(),
    top: monitor.y(),
    width: monitor.width(),
    height: monitor.height(),
  }));
};

/** Smallest rectangle covering every monitor. */
export function combinedGeometry(monitors: MonitorGeometry[]): MonitorGeometry {
  if (monitors.length === 0) {
    return { left: 0, top: 0, width: 0, height: 0 };
  }
  const left = Math.min(...monitors.map((m) => m.left));
  const top = Math.min(...monitors.map((m) => m.top));
  const right = Math.max(...monitors.map((m) => m.left + m.width));
  const bottom = Math.max(...monitors.map((m) => m.top + m.height));
  return { left, top, width: right - left, height: bottom - top };
}

/** Prefix the physical monitors with the virtual display spanning them all. */
export function withCombined(physical: MonitorGeometry[]): MonitorGeometry[] {
  return [combinedGeometry(physical), ...physical];
}
