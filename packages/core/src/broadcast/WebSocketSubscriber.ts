import { WebSocket } from 'ws';
import type { Subscriber } from './Broadcaster.js';

export class WebSocketSubscriber implements Subscriber {
  private socket: WebSocket;

  constructor(socket: WebSocket) {
    this.socket = socket;
  }

  send(payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error(`WebSocket is not open (readyState ${this.socket.readyState})`));
        return;
      }

      this.socket.send(payload, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    this.socket.terminate();
  }
}
