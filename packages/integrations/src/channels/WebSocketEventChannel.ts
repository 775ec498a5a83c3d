import { WebSocket } from "ws";
import type { RelayMessage } from "@reposcout/shared";
import type { EventChannel } from "./EventChannel.js";

type SocketLike = Pick<WebSocket, "readyState" | "send">;

export class WebSocketEventChannel implements EventChannel {
  private tail: Promise<void> = Promise.resolve();

  constructor(private socket: SocketLike) {}

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  /** Writes are chained so a shared socket only has one frame in flight. */
  send(message: string): Promise<void> {
    const next = this.tail.then(() => this.write(message));
    this.tail = next.catch(() => undefined);
    return next;
  }

  sendMessage(message: RelayMessage): Promise<void> {
    return this.send(JSON.stringify(message));
  }

  private write(message: string): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(new Error("WebSocket connection is not open"));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(message, (error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}
