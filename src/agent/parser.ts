import { MalformedArgumentsError } from "../errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("parser");

/**
 * Parse the JSON arguments of one tool call. Blank arguments mean `{}`;
 * shape checks happen later, in `validateAction`.
 */
export function parseToolArguments(raw: string): unknown {
  if (!raw.trim()) return {};

  try {
    return JSON.parse(raw);
  } catch (err) {
    log.warn(`unparseable tool arguments: ${raw.slice(0, 120)}`);
    throw new MalformedArgumentsError(raw, err);
  }
}
