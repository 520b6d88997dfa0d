import { describe, it, expect } from "vitest";
import { parseToolArguments } from "../../src/agent/parser.js";
import { MalformedArgumentsError } from "../../src/errors.js";

describe("parseToolArguments", () => {
  it("parses JSON arguments", () => {
    expect(parseToolArguments('{"action":"left_click","coordinate":[1,2]}')).toEqual({
      action: "left_click",
      coordinate: [1, 2],
    });
  });

  it("treats blank arguments as an empty object", () => {
    expect(parseToolArguments("")).toEqual({});
    expect(parseToolArguments("  \n")).toEqual({});
  });

  it("raises MalformedArgumentsError for invalid JSON", () => {
    const raw = '{"action": "type", "text": "unterminated}';
    expect(() => parseToolArguments(raw)).toThrow(MalformedArgumentsError);
    try {
      parseToolArguments(raw);
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedArgumentsError);
      if (err instanceof MalformedArgumentsError) {
        expect(err.raw).toBe(raw);
        expect(err.message.startsWith("Tool call arguments are not valid JSON: ")).toBe(true);
      }
    }
  });
});
