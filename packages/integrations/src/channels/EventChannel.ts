/** Outbound side of an open bidirectional connection. */
export interface EventChannel {
  send(message: string): Promise<void>;
}
