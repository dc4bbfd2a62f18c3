import type { IMessageTransport } from "../../src/core/interfaces/IMessageTransport";
import { NotConnectedError } from "../../src/errors";
import { createDefaultRegistry } from "../../src/channels/registry";
import { buildEnvelope, serializeEnvelope } from "../../src/channels/envelope";
import type { ChannelType, MessageMetadata, RawEnvelope } from "../../src/channels/types";

/**
 * In-process transport: records what is sent and lets a test play the NetApp.
 */
export class LoopbackTransport implements IMessageTransport {
  sent: string[] = [];
  bufferedAmount = 0;
  connectError?: Error;
  /** Thrown from every send while set */
  sendError?: Error;
  connectCalls = 0;
  closed = false;

  private connected = false;
  private messageHandlers = new Set<(data: string) => void>();
  private errorHandlers = new Set<(error: Error) => void>();
  private closeHandlers = new Set<() => void>();

  async connect(): Promise<void> {
    this.connectCalls++;
    if (this.connectError) {
      throw this.connectError;
    }
    this.connected = true;
  }

  close(): void {
    this.closed = true;
    this.connected = false;
  }

  send(data: string): void {
    if (!this.connected) {
      throw new NotConnectedError("Loopback is not connected");
    }
    if (this.sendError) {
      throw this.sendError;
    }
    this.sent.push(data);
  }

  onMessage(handler: (data: string) => void): () => void {
    this.messageHandlers.add(handler);
    return () => {
      this.messageHandlers.delete(handler);
    };
  }

  onError(handler: (error: Error) => void): () => void {
    this.errorHandlers.add(handler);
    return () => {
      this.errorHandlers.delete(handler);
    };
  }

  onClose(handler: () => void): () => void {
    this.closeHandlers.add(handler);
    return () => {
      this.closeHandlers.delete(handler);
    };
  }

  isConnected(): boolean {
    return this.connected;
  }

  /** Deliver a raw inbound message */
  deliver(raw: string): void {
    this.messageHandlers.forEach((handler) => handler(raw));
  }

  /** The NetApp drops the connection */
  remoteClose(): void {
    this.connected = false;
    this.closeHandlers.forEach((handler) => handler());
  }

  sentEnvelopes(): RawEnvelope[] {
    return this.sent.map((raw) => JSON.parse(raw));
  }
}

const registry = createDefaultRegistry();

/**
 * Serialized envelope carrying `value` encoded as `type`.
 */
export function envelopeFor(
  channel: string,
  type: ChannelType,
  value: unknown,
  timestamp: number = 1,
  metadata?: MessageMetadata
): string {
  return serializeEnvelope(buildEnvelope(channel, type, registry.encode(type, value), timestamp, metadata));
}

export function decodePayload(envelope: RawEnvelope): unknown {
  return registry.decode(envelope.type, Uint8Array.from(Buffer.from(envelope.data, "base64")));
}
