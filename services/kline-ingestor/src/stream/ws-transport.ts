import WebSocket from 'ws';
import { ConnectionLost, FrameTimeout } from '../errors.js';
import type { ConnectOptions, StreamConnection, StreamTransport } from './transport.js';

const DEFAULT_MAX_BUFFERED_FRAMES = 1000;

function decodeWsData(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

type Waiter = {
  resolve: (frame: string) => void;
  reject: (err: ConnectionLost) => void;
  timer: NodeJS.Timeout;
};

type Buffered = { frame: string; key: string | undefined };

class WsConnection implements StreamConnection {
  private readonly frames: Buffered[] = [];
  private waiter: Waiter | null = null;
  private failure: ConnectionLost | null = null;
  private readonly maxBuffered: number;
  private readonly coalesceKey: (frame: string) => string | undefined;

  constructor(
    private readonly ws: WebSocket,
    opts: Pick<ConnectOptions, 'maxBufferedFrames' | 'coalesceKey'>
  ) {
    this.maxBuffered = opts.maxBufferedFrames ?? DEFAULT_MAX_BUFFERED_FRAMES;
    this.coalesceKey = opts.coalesceKey ?? (() => undefined);
    ws.on('message', (data) => this.push(decodeWsData(data)));
    ws.on('close', (code, reason) =>
      this.fail(new ConnectionLost(`socket closed code=${code} reason=${reason.toString() || 'n/a'}`))
    );
    ws.on('error', (err) => this.fail(new ConnectionLost(`socket error: ${err.message}`, { cause: err })));
  }

  send(text: string): void {
    if (this.failure) throw this.failure;
    if (this.ws.readyState !== WebSocket.OPEN) throw new ConnectionLost('socket is not open');
    this.ws.send(text);
  }

  next(timeoutMs: number): Promise<string> {
    const head = this.frames.shift();
    if (head !== undefined) return Promise.resolve(head.frame);
    if (this.failure) return Promise.reject(this.failure);

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new FrameTimeout(`heartbeat timeout: no frame within ${timeoutMs}ms`));
      }, timeoutMs);
      this.waiter = { resolve, reject, timer };
    });
  }

  close(): void {
    this.fail(new ConnectionLost('closed by client'));
    if (this.ws.readyState !== WebSocket.CLOSED) this.ws.terminate();
  }

  private push(frame: string) {
    if (this.failure) return;
    const w = this.waiter;
    if (w) {
      this.waiter = null;
      clearTimeout(w.timer);
      w.resolve(frame);
      return;
    }

    const key = this.coalesceKey(frame);
    const older = key === undefined ? undefined : this.frames.find((b) => b.key === key);
    if (older) {
      older.frame = frame;
      return;
    }
    if (this.frames.length >= this.maxBuffered) {
      this.fail(new ConnectionLost(`frame backlog exceeded ${this.maxBuffered} unread frames`));
      this.ws.terminate();
      return;
    }
    this.frames.push({ frame, key });
  }

  private fail(err: ConnectionLost) {
    if (this.failure) return;
    this.failure = err;
    // frames already buffered stay readable; the failure surfaces once they are drained
    const w = this.waiter;
    if (w) {
      this.waiter = null;
      clearTimeout(w.timer);
      w.reject(err);
    }
  }
}

export class WsStreamTransport implements StreamTransport {
  connect(url: string, opts: ConnectOptions): Promise<StreamConnection> {
    return new Promise<StreamConnection>((resolve, reject) => {
      if (opts.signal.aborted) {
        reject(new ConnectionLost('connect aborted'));
        return;
      }
      const ws = new WebSocket(url, { handshakeTimeout: opts.handshakeTimeoutMs });

      const onAbort = () => ws.terminate();
      // stays attached after a failure so a late second 'error' is not unhandled
      const onError = (err: Error) => {
        settle();
        reject(new ConnectionLost(`connect failed: ${err.message}`, { cause: err }));
      };
      const onClose = (code: number) => {
        settle();
        reject(new ConnectionLost(`socket closed before open code=${code}`));
      };
      const onOpen = () => {
        settle();
        ws.off('error', onError);
        resolve(new WsConnection(ws, opts));
      };
      const settle = () => {
        opts.signal.removeEventListener('abort', onAbort);
        ws.off('close', onClose);
        ws.off('open', onOpen);
      };

      opts.signal.addEventListener('abort', onAbort, { once: true });
      ws.on('error', onError);
      ws.on('close', onClose);
      ws.on('open', onOpen);
    });
  }
}
