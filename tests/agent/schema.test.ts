import { describe, it, expect } from "vitest";
import {
  ACTION_KINDS,
  buildComputerUseTool,
  COMPUTER_USE_TOOL_NAME,
  validateAction,
} from "../../src/agent/schema.js";
import { UnsupportedActionError, ValidationError } from "../../src/errors.js";

function validationFailure(raw: unknown): ValidationError {
  try {
    validateAction(raw);
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

describe("validateAction", () => {
  describe.each(["double_click", "triple_click", "left_click_drag"])("%s", (action) => {
    it("requires a coordinate", () => {
      const err = validationFailure({ action });
      expect(err.field).toBe("coordinate");
      expect(err.message).toBe(`coordinate is required for action=${action}.`);
    });

    it("rejects a coordinate with fewer than two numbers", () => {
      expect(validationFailure({ action, coordinate: [5] }).field).toBe("coordinate");
      expect(validationFailure({ action, coordinate: [] }).field).toBe("coordinate");
    });

    it("rejects non-numeric coordinates", () => {
      expect(validationFailure({ action, coordinate: ["10", "20"] }).field).toBe("coordinate");
    });
  });

  it("truncates coordinates to integer pixels", () => {
    expect(validateAction({ action: "double_click", coordinate: [100.7, 200.2] })).toEqual({
      action: "double_click",
      coordinate: { x: 100, y: 200 },
    });
    expect(validateAction({ action: "mouse_move", coordinate: [-3.5, 4.9] })).toEqual({
      action: "mouse_move",
      coordinate: { x: -3, y: 4 },
    });
  });

  it("treats a missing or empty coordinate as the current cursor for clicks", () => {
    expect(validateAction({ action: "left_click" })).toEqual({ action: "left_click" });
    expect(validateAction({ action: "right_click", coordinate: [] })).toEqual({
      action: "right_click",
      coordinate: undefined,
    });
  });

  it("rejects a malformed optional coordinate", () => {
    expect(validationFailure({ action: "left_click", coordinate: [1, 2, 3] }).field).toBe("coordinate");
    expect(validationFailure({ action: "middle_click", coordinate: [1] }).field).toBe("coordinate");
  });

  it("requires a non-empty key list", () => {
    expect(validationFailure({ action: "key" }).message).toBe("keys is required for action=key.");
    expect(validationFailure({ action: "key", keys: [] }).field).toBe("keys");
    expect(validateAction({ action: "key", keys: ["ctrl", "c"] })).toEqual({ action: "key", keys: ["ctrl", "c"] });
  });

  it("accepts empty text for type but not missing text", () => {
    expect(validateAction({ action: "type", text: "" })).toEqual({ action: "type", text: "" });
    expect(validationFailure({ action: "type" }).field).toBe("text");
  });

  it("requires a non-negative wait time", () => {
    expect(validationFailure({ action: "wait" }).field).toBe("time");
    expect(validationFailure({ action: "wait", time: -1 }).field).toBe("time");
    expect(validateAction({ action: "wait", time: 1.5 })).toEqual({ action: "wait", time: 1.5 });
  });

  it("defaults scroll pixels to zero and truncates them", () => {
    expect(validateAction({ action: "scroll" })).toEqual({ action: "scroll", pixels: 0 });
    expect(validateAction({ action: "hscroll", pixels: -3.9 })).toEqual({ action: "hscroll", pixels: -3 });
  });

  it.each([["done"], ["SUCCESS"], [""], [true]])("rejects terminate status %j", (status) => {
    const err = validationFailure({ action: "terminate", status });
    expect(err.field).toBe("status");
  });

  it("requires a terminate status", () => {
    expect(validationFailure({ action: "terminate" }).message).toBe("status is required for action=terminate.");
  });

  it("accepts success and failure verdicts", () => {
    expect(validateAction({ action: "terminate", status: "success" })).toEqual({
      action: "terminate",
      status: "success",
    });
    expect(validateAction({ action: "terminate", status: "failure" })).toEqual({
      action: "terminate",
      status: "failure",
    });
  });

  it("defaults answer text to an empty string", () => {
    expect(validateAction({ action: "answer" })).toEqual({ action: "answer", text: "" });
  });

  it("ignores null fields", () => {
    expect(validateAction({ action: "left_click", coordinate: null, text: null, keys: null })).toEqual({
      action: "left_click",
    });
    expect(validateAction({ action: "answer", text: null })).toEqual({ action: "answer", text: "" });
  });

  it("raises UnsupportedActionError for actions outside the vocabulary", () => {
    expect(() => validateAction({ action: "screenshot" })).toThrow(UnsupportedActionError);
    try {
      validateAction({ action: "screenshot" });
    } catch (err) {
      expect(err).toBeInstanceOf(UnsupportedActionError);
      if (err instanceof UnsupportedActionError) {
        expect(err.action).toBe("screenshot");
        expect(err.message).toBe("Unsupported action: screenshot");
      }
    }
  });

  it("requires an action name", () => {
    expect(validationFailure({ text: "hello" }).field).toBe("action");
    expect(validationFailure({ action: 7 }).field).toBe("action");
  });

  it("requires a JSON object", () => {
    expect(validationFailure(["left_click"]).field).toBe("arguments");
    expect(validationFailure("left_click").field).toBe("arguments");
  });
});

describe("buildComputerUseTool", () => {
  it("declares every action kind", () => {
    const tool = buildComputerUseTool();
    expect(tool.type).toBe("function");
    expect(tool.function.name).toBe(COMPUTER_USE_TOOL_NAME);
    expect(tool.function.parameters).toMatchObject({
      type: "object",
      required: ["action"],
      properties: { action: { enum: [...ACTION_KINDS] } },
    });
    expect(ACTION_KINDS).toHaveLength(14);
  });

  it("states the display resolution when it is known", () => {
    expect(buildComputerUseTool({ width: 1920, height: 1080 }).function.description).toContain(
      "* The screen's resolution is 1920x1080.\n",
    );
    expect(buildComputerUseTool().function.description).toContain("dynamically detected");
  });
});
