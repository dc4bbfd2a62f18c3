import { isJsonValue } from "./codecs/json";
import type { JsonObject, JsonValue } from "./types";

/** Channel name reserved for control commands and their replies */
export const CONTROL_CHANNEL = "control";

export enum ControlCommandType {
  /** Initialise or reconfigure the NetApp */
  SET_STATE = "set_state",
  GET_STATE = "get_state",
  RESET_STATE = "reset_state",
}

export interface ControlCommand {
  type: ControlCommandType;
  data?: JsonObject;
  /** Ask the NetApp to drop queued input before applying the command */
  clearQueue?: boolean;
}

export interface ControlReply {
  id: string;
  success: boolean;
  message?: string;
  data?: JsonValue;
}

/**
 * Wire form of a command, as sent on the control channel.
 */
export function controlRequest(id: string, command: ControlCommand): JsonObject {
  const request: JsonObject = {
    id,
    cmd_type: command.type,
    clear_queue: command.clearQueue ?? false,
  };
  if (command.data !== undefined) {
    request.data = command.data;
  }
  return request;
}

/**
 * Returns null when `value` is not a reply to a control command.
 */
export function parseControlReply(value: unknown): ControlReply | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  const id = "id" in value ? value.id : undefined;
  const success = "success" in value ? value.success : undefined;
  if (typeof id !== "string" || typeof success !== "boolean") {
    return null;
  }

  const reply: ControlReply = { id, success };
  const message = "message" in value ? value.message : undefined;
  if (typeof message === "string") {
    reply.message = message;
  }
  const data = "data" in value ? value.data : undefined;
  if (data !== undefined && isJsonValue(data)) {
    reply.data = data;
  }
  return reply;
}
