import { describe, it, expect } from "vitest";
import { ControlCommandType, controlRequest, parseControlReply } from "../../src/channels/control";

describe("Control commands", () => {
  it("should build the wire request", () => {
    expect(controlRequest("cmd-1", { type: ControlCommandType.SET_STATE, data: { model: "small" }, clearQueue: true })).toEqual({
      id: "cmd-1",
      cmd_type: "set_state",
      clear_queue: true,
      data: { model: "small" },
    });
    expect(controlRequest("cmd-2", { type: ControlCommandType.GET_STATE })).toEqual({
      id: "cmd-2",
      cmd_type: "get_state",
      clear_queue: false,
    });
  });

  it("should parse replies", () => {
    expect(parseControlReply({ id: "cmd-1", success: true, data: { state: "ready" } })).toEqual({
      id: "cmd-1",
      success: true,
      data: { state: "ready" },
    });
    expect(parseControlReply({ id: "cmd-2", success: false, message: "busy" })).toEqual({
      id: "cmd-2",
      success: false,
      message: "busy",
    });
  });

  it("should reject values that are not replies", () => {
    expect(parseControlReply(null)).toBeNull();
    expect(parseControlReply([1])).toBeNull();
    expect(parseControlReply({ id: 1, success: true })).toBeNull();
    expect(parseControlReply({ id: "cmd-1" })).toBeNull();
  });
});
