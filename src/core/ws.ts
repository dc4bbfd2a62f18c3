import WebSocket from "isomorphic-ws";
import { ConnectionError, NotConnectedError, TimeoutError } from "../errors";
import type { IMessageTransport } from "./interfaces/IMessageTransport";
import { silentLogger, type Logger } from "./logger";

export interface WSClientConfig {
  wsURL: string;
  timeout?: number;
  logger?: Logger;
  WebSocket?: typeof WebSocket;
}

export type WSMessageHandler = (data: string) => void;
export type WSErrorHandler = (error: Error) => void;
export type WSCloseHandler = () => void;

function dataToText(data: WebSocket.Data): string {
  if (typeof data === "string") {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf-8");
  }
  return data.toString("utf-8");
}

/**
 * WebSocket transport for the channel protocol.
 * One connection per client; it does not reconnect on its own.
 */
export class WSClient implements IMessageTransport {
  private url: string;
  private timeout: number;
  private logger: Logger;
  private WebSocketClass: typeof WebSocket;

  private ws?: WebSocket;
  private messageHandlers: Set<WSMessageHandler> = new Set();
  private errorHandlers: Set<WSErrorHandler> = new Set();
  private closeHandlers: Set<WSCloseHandler> = new Set();

  constructor(config: WSClientConfig) {
    this.url = config.wsURL;
    this.timeout = config.timeout ?? 10000;
    this.logger = (config.logger ?? silentLogger).child("WSClient");
    this.WebSocketClass = config.WebSocket ?? WebSocket;
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      let ws: WebSocket;
      try {
        ws = new this.WebSocketClass(this.url);
      } catch (error) {
        reject(new ConnectionError(`Invalid NetApp address ${this.url}`, { url: this.url }, error));
        return;
      }
      this.ws = ws;

      const timeout = setTimeout(() => {
        ws.close();
        settle(new TimeoutError("WebSocket connection timeout", this.timeout));
      }, this.timeout);

      ws.addEventListener("open", () => {
        this.logger.debug(`Connected to ${this.url}`);
        settle();
      });

      ws.addEventListener("message", (event) => {
        const text = dataToText(event.data);
        this.messageHandlers.forEach((handler) => handler(text));
      });

      ws.addEventListener("error", (event) => {
        const error = new ConnectionError(`WebSocket error: ${event.message}`, {
          url: this.url,
        });
        if (!settled) {
          settle(error);
          return;
        }
        this.errorHandlers.forEach((handler) => handler(error));
      });

      ws.addEventListener("close", (event) => {
        if (this.ws === ws) {
          this.ws = undefined;
        }
        if (!settled) {
          settle(
            new ConnectionError(`WebSocket closed during connect (${event.code})`, {
              url: this.url,
              code: event.code,
            })
          );
          return;
        }
        this.logger.debug(`Connection closed (${event.code})`);
        this.closeHandlers.forEach((handler) => handler());
      });
    });
  }

  onMessage(handler: WSMessageHandler) {
    this.messageHandlers.add(handler);
    return () => {
      this.messageHandlers.delete(handler);
    };
  }

  onError(handler: WSErrorHandler) {
    this.errorHandlers.add(handler);
    return () => {
      this.errorHandlers.delete(handler);
    };
  }

  onClose(handler: WSCloseHandler) {
    this.closeHandlers.add(handler);
    return () => {
      this.closeHandlers.delete(handler);
    };
  }

  send(data: string) {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      throw new NotConnectedError("WebSocket is not connected");
    }
    this.ws.send(data);
  }

  close() {
    this.ws?.close();
  }

  isConnected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  get bufferedAmount(): number {
    return this.ws?.bufferedAmount ?? 0;
  }
}
