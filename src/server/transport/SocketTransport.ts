import { Transport } from '../../shared/core';
import { createSendFailedError, createTransportClosedError } from '../../shared/errors';

/**
 * The part of net.Socket a transport writes through
 */
export interface WritableSocket {
  readonly destroyed: boolean;
  readonly writable: boolean;
  readonly remoteAddress?: string;
  readonly remotePort?: number;
  write(text: string, callback: (error?: Error | null) => void): boolean;
  destroy(): void;
}

let transportCounter = 0;

/**
 * Transport over a TCP socket
 */
export class SocketTransport implements Transport {
  readonly id: string;
  private readonly socket: WritableSocket;
  private closed = false;

  constructor(socket: WritableSocket) {
    this.socket = socket;
    transportCounter++;
    this.id = `tcp#${transportCounter} ${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
  }

  get isClosed(): boolean {
    return this.closed || this.socket.destroyed;
  }

  send(text: string): Promise<void> {
    if (this.isClosed || !this.socket.writable) {
      return Promise.reject(createTransportClosedError(this.id));
    }

    return new Promise((resolve, reject) => {
      this.socket.write(text, (error) => {
        if (error) {
          reject(createSendFailedError(this.id, error));
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.destroy();
  }
}
