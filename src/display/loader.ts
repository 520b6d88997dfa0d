import fs from "fs";
import path from "path";
import { parse as parseYAML } from "yaml";
import { ConfigError } from "../errors.js";
import { DisplayProfileSchema, type DisplayProfile } from "./types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("display");

/**
 * Load a display profile from a YAML file.
 * Looks in ./displays/<name>.yaml relative to the working directory, or takes
 * `name` as a path when it already ends in .yaml/.yml.
 */
export function loadDisplayProfile(name: string, baseDir = "displays"): DisplayProfile {
  const searchPaths = /\.ya?ml$/i.test(name)
    ? [path.resolve(name)]
    : [path.resolve(baseDir, `${name}.yaml`), path.resolve(baseDir, `${name}.yml`)];

  const filePath = searchPaths.find((p) => fs.existsSync(p));
  if (!filePath) {
    throw new ConfigError(`Display profile "${name}" not found. Searched: ${searchPaths.join(", ")}`);
  }

  log.info(`loading display profile from ${filePath}`);
  const raw = fs.readFileSync(filePath, "utf-8");
  const parsed = DisplayProfileSchema.safeParse(parseYAML(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new ConfigError(`Invalid display profile ${filePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}
