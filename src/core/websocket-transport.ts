/**
 * WebSocket transport adapters
 * Wraps `ws` sockets in the TransportHandle contract and dials outbound connections
 */

import WebSocket from "ws";
import type { Dialer, DialOptions, Logger, TransportHandle } from "../types";
import { ConnectionError, TimeoutError, normalizeError } from "../types";
import { AbortedError } from "../utils/abortable";

/**
 * The slice of a `ws` socket the transport relies on.
 * Both `ws` client sockets and server-side sockets satisfy it.
 */
export interface WebSocketLike {
  readonly readyState: number;
  ping(data?: undefined, mask?: undefined, cb?: (error?: Error | null) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: string, listener: (...args: never[]) => void): unknown;
  off(event: string, listener: (...args: never[]) => void): unknown;
}

/**
 * TransportHandle backed by a WebSocket.
 * A probe is a protocol-level ping; the matching pong resolves it with the round-trip time.
 * The transport keeps an `error` listener on the socket for its whole life, so a
 * socket error (an invalid frame, a reset) reaches `onError` subscribers instead
 * of being thrown by the emitter.
 *
 * @example
 * ```typescript
 * wss.on('connection', (socket, request) => {
 *   supervisor.registerConnection(id, new WebSocketTransport(socket), attributes);
 * });
 * ```
 */
export class WebSocketTransport implements TransportHandle {
  private readonly errorListeners = new Set<(error: Error) => void>();
  private lastSocketError?: Error;

  constructor(private readonly socket: WebSocketLike) {
    this.socket.on("error", (error: Error) => this.handleSocketError(error));
  }

  public get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  public ping(timeoutMs: number): Promise<number> {
    if (!this.isOpen) {
      return Promise.reject(
        new ConnectionError("Cannot probe a connection that is not open", {
          readyState: this.socket.readyState
        })
      );
    }

    const startedAt = Date.now();

    return new Promise<number>((resolve, reject) => {
      let settled = false;

      const settle = (): boolean => {
        if (settled) return false;
        settled = true;
        clearTimeout(timer);
        this.socket.off("pong", onPong);
        this.socket.off("close", onClose);
        return true;
      };

      const onPong = (): void => {
        if (settle()) resolve(Date.now() - startedAt);
      };

      const onClose = (): void => {
        if (settle()) reject(new ConnectionError("Connection closed while awaiting pong"));
      };

      const timer = setTimeout(() => {
        if (settle()) {
          reject(new TimeoutError(`No pong received within ${timeoutMs}ms`, { timeoutMs }));
        }
      }, timeoutMs);

      this.socket.on("pong", onPong);
      this.socket.on("close", onClose);

      try {
        this.socket.ping(undefined, undefined, (error) => {
          if (error && settle()) {
            reject(new ConnectionError("Failed to send ping", { reason: error.message }));
          }
        });
      } catch (error) {
        if (settle()) reject(normalizeError(error, { operation: "ping" }));
      }
    });
  }

  public close(code: number = 1000, reason: string = ""): void {
    const state = this.socket.readyState;
    if (state === WebSocket.CLOSING || state === WebSocket.CLOSED) {
      return;
    }
    this.socket.close(code, reason);
  }

  public onError(listener: (error: Error) => void): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  /**
   * Last error the socket raised, whether or not anyone was subscribed
   */
  public get lastError(): Error | undefined {
    return this.lastSocketError;
  }

  private handleSocketError(error: Error): void {
    this.lastSocketError = error;
    for (const listener of [...this.errorListeners]) {
      listener(error);
    }
  }
}

/**
 * Options passed to the socket factory when dialing
 */
export interface SocketDialOptions {
  headers?: Record<string, string>;
  handshakeTimeout: number;
}

export type SocketFactory = (url: string, options: SocketDialOptions) => WebSocketLike;

const defaultSocketFactory: SocketFactory = (url, options) =>
  new WebSocket(url, { headers: options.headers, handshakeTimeout: options.handshakeTimeout });

/**
 * Dials outbound WebSocket connections for the recovery engine.
 * The returned promise settles on open, on handshake failure, on
 * `handshakeTimeout`, or when `signal` aborts (the socket is terminated).
 */
export class WebSocketDialer implements Dialer {
  constructor(
    private readonly logger: Logger,
    private readonly createSocket: SocketFactory = defaultSocketFactory
  ) {}

  public dial(url: string, options: DialOptions): Promise<TransportHandle> {
    const { signal, handshakeTimeout } = options;
    if (signal?.aborted) {
      return Promise.reject(new AbortedError("Dial aborted before start"));
    }

    return new Promise<TransportHandle>((resolve, reject) => {
      let settled = false;
      let socket: WebSocketLike;

      const settle = (): boolean => {
        if (settled) return false;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        socket.off("open", onOpen);
        socket.off("error", onError);
        socket.off("unexpected-response", onUnexpectedResponse);
        return true;
      };

      const onOpen = (): void => {
        if (settle()) {
          this.logger.debug("WebSocketDialer: connection opened", { url });
          resolve(new WebSocketTransport(socket));
        }
      };

      const onError = (error: Error): void => {
        if (settle()) {
          reject(new ConnectionError(`Failed to connect to ${url}`, { url, reason: error.message }));
        }
      };

      const onUnexpectedResponse = (_request: unknown, response: { statusCode?: number }): void => {
        if (settle()) {
          socket.terminate();
          reject(
            new ConnectionError(`Unexpected handshake response from ${url}`, {
              url,
              statusCode: response.statusCode
            })
          );
        }
      };

      const onAbort = (): void => {
        if (settle()) {
          socket.terminate();
          reject(new AbortedError("Dial aborted"));
        }
      };

      const timer = setTimeout(() => {
        if (settle()) {
          socket.terminate();
          reject(new TimeoutError(`Handshake with ${url} timed out`, { url, handshakeTimeout }));
        }
      }, handshakeTimeout);

      try {
        socket = this.createSocket(url, { headers: options.headers, handshakeTimeout });
      } catch (error) {
        settled = true;
        clearTimeout(timer);
        reject(normalizeError(error, { url }));
        return;
      }

      socket.on("open", onOpen);
      socket.on("error", onError);
      socket.on("unexpected-response", onUnexpectedResponse);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
