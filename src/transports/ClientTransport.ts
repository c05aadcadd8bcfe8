/**
 * Generic client-side transport interface.
 *
 * The transport provides a single text-frame connection used by the socket.
 * Reconnection is the socket's job, not the transport's.
 */

export interface ClientTransport {
  /**
   * Whether currently connected.
   */
  readonly connected: boolean;

  /**
   * Open a connection to a URL.
   */
  connect(url: string): Promise<void>;

  /**
   * Close the connection.
   */
  close(): void;

  /**
   * Send a text message.
   */
  send(text: string): void;

  /**
   * Register lifecycle callbacks.
   *
   * `onClose` fires whenever a connection attempt or an open connection ends,
   * with the error that caused it, if any.
   */
  onOpen(cb: () => void): void;
  onClose(cb: (error?: Error) => void): void;
  onMessage(cb: (text: string) => void): void;
}
