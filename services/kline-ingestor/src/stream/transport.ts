/** One open transport session carrying text frames. */
export interface StreamConnection {
  send(text: string): void;
  /**
   * Resolves with the next inbound text frame, in arrival order.
   * Rejects with ConnectionLost when the session closes, or FrameTimeout when no frame
   * arrives within `timeoutMs`.
   */
  next(timeoutMs: number): Promise<string>;
  close(): void;
}

export type ConnectOptions = {
  handshakeTimeoutMs: number;
  signal: AbortSignal;
  /** Unread frames held before the session fails with ConnectionLost. */
  maxBufferedFrames?: number;
  /**
   * Buffered frames with the same key supersede each other: only the newest is
   * read, in the place of the oldest. Frames without a key are always kept.
   */
  coalesceKey?: (frame: string) => string | undefined;
};

export interface StreamTransport {
  /** Rejects with ConnectionLost when the session cannot be opened. */
  connect(url: string, opts: ConnectOptions): Promise<StreamConnection>;
}
