/**
 * Message transport abstraction
 * One ordered, bidirectional connection carrying whole text messages
 */
export interface IMessageTransport {
  /**
   * Open the connection
   */
  connect(): Promise<void>;

  /**
   * Close the connection. Close handlers fire once the transport is down.
   */
  close(): void;

  /**
   * Send one whole message. Throws when the transport is not open.
   */
  send(data: string): void;

  /**
   * Register message handler, returns an unsubscribe function
   */
  onMessage(handler: (data: string) => void): () => void;

  /**
   * Register error handler, returns an unsubscribe function
   */
  onError(handler: (error: Error) => void): () => void;

  /**
   * Register close handler, returns an unsubscribe function
   */
  onClose(handler: () => void): () => void;

  /**
   * Check if the transport is open
   */
  isConnected(): boolean;

  /**
   * Bytes queued for sending but not yet handed to the network
   */
  readonly bufferedAmount: number;
}

export type TransportFactory = (url: string, timeoutMs: number) => IMessageTransport;
