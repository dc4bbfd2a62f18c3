export class SDKError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: string = "SDK_ERROR",
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SDKError";
    this.code = code;
    this.details = details;
  }

  static from(error: unknown, code: string = "SDK_ERROR"): SDKError {
    if (error instanceof SDKError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new SDKError(message, code, {}, { cause: error });
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Bad pipeline or channel setup. Fatal to the operation that raised it.
 */
export class ConfigurationError extends SDKError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

/**
 * A value does not fit the encoding of the channel it was sent on.
 */
export class EncodingMismatchError extends SDKError {
  constructor(channelType: string, reason: string) {
    super(
      `Value cannot be encoded as ${channelType}: ${reason}`,
      "ENCODING_MISMATCH",
      { channelType }
    );
    this.name = "EncodingMismatchError";
  }
}

/**
 * An inbound payload could not be decoded.
 */
export class CodecError extends SDKError {
  constructor(channelType: string, reason: string, cause?: unknown) {
    super(
      `Failed to decode ${channelType} payload: ${reason}`,
      "CODEC_ERROR",
      { channelType },
      { cause }
    );
    this.name = "CodecError";
  }
}

export class UnknownChannelError extends SDKError {
  constructor(channel: string) {
    super(`Channel "${channel}" is not registered`, "UNKNOWN_CHANNEL", {
      channel,
    });
    this.name = "UnknownChannelError";
  }
}

export class DuplicateChannelError extends SDKError {
  constructor(channel: string, boundType: string, requestedType: string) {
    super(
      `Channel "${channel}" is already bound to ${boundType} (requested ${requestedType})`,
      "DUPLICATE_CHANNEL",
      { channel, boundType, requestedType }
    );
    this.name = "DuplicateChannelError";
  }
}

export class NotConnectedError extends SDKError {
  constructor(message: string = "Not connected to the NetApp") {
    super(message, "NOT_CONNECTED");
    this.name = "NotConnectedError";
  }
}

export class AlreadyConnectedError extends SDKError {
  constructor() {
    super("Client is already connected", "ALREADY_CONNECTED");
    this.name = "AlreadyConnectedError";
  }
}

export class ConnectionError extends SDKError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, "CONNECT_FAILED", details, { cause });
    this.name = "ConnectionError";
  }
}

export class TimeoutError extends SDKError {
  constructor(message: string, timeoutMs: number) {
    super(message, "TIMEOUT", { timeoutMs });
    this.name = "TimeoutError";
  }
}

/**
 * Raised on pushes into a pipeline that has stopped, either on request or
 * because the encoder failed. The fault, if any, is the `cause`.
 */
export class PipelineStoppedError extends SDKError {
  constructor(fault?: unknown) {
    super(
      fault ? "Encode pipeline stopped after a fault" : "Encode pipeline is stopped",
      "PIPELINE_STOPPED",
      {},
      { cause: fault }
    );
    this.name = "PipelineStoppedError";
  }
}

export class BackPressureError extends SDKError {
  constructor(channel: string, bufferedAmount: number, limit: number) {
    super(
      `Transport buffer is full (${bufferedAmount} > ${limit} bytes), message on "${channel}" dropped`,
      "BACK_PRESSURE",
      { channel, bufferedAmount, limit }
    );
    this.name = "BackPressureError";
  }
}

/**
 * The NetApp reported that it failed to process something we sent.
 */
export class RemoteError extends SDKError {
  constructor(channel: string, reason: string) {
    super(`NetApp reported an error on "${channel}": ${reason}`, "REMOTE_ERROR", {
      channel,
      reason,
    });
    this.name = "RemoteError";
  }
}

export class ControlCommandError extends SDKError {
  constructor(commandType: string, reason: string) {
    super(
      `Control command ${commandType} failed: ${reason}`,
      "CONTROL_COMMAND_FAILED",
      { commandType }
    );
    this.name = "ControlCommandError";
  }
}
