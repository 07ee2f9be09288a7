import * as dgram from 'dgram';
import * as net from 'net';
import { MideaNetworkError } from './errors';

/**
 * Byte stream to one appliance. The LAN session only ever has one request
 * in flight, so a single pending reader is enough.
 */
export interface DeviceConnection {
  readonly isOpen: boolean;

  /** Rejects when the appliance cannot be reached */
  open(): Promise<void>;

  send(data: Buffer): Promise<void>;

  /**
   * Next chunk of at most `readSize` bytes.
   * Resolves undefined on timeout and an empty buffer once the peer closed.
   * Rejects on socket errors.
   */
  receive(readSize: number): Promise<Buffer | undefined>;

  close(): void;
}

export type ConnectionFactory = (address: string, port: number, timeoutSeconds: number) => DeviceConnection;

/**
 * One datagram out, first datagram back
 */
export type UdpQuery = (address: string, port: number, message: Buffer, timeoutSeconds: number, readSize: number) => Promise<Buffer>;

/**
 * TCP connection on a net.Socket. Incoming data is queued until the
 * session asks for it.
 */
export class TcpConnection implements DeviceConnection {
  private socket?: net.Socket;
  private chunks: Buffer[] = [];
  private ended = false;
  private failure?: Error;
  private wake?: () => void;

  constructor(
    private readonly address: string,
    private readonly port: number,
    private readonly timeoutSeconds: number,
  ) {}

  get isOpen(): boolean {
    return this.socket !== undefined;
  }

  open(): Promise<void> {
    this.chunks = [];
    this.ended = false;
    this.failure = undefined;
    return new Promise<void>((resolve, reject) => {
      const socket = net.createConnection({ host: this.address, port: this.port });
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new MideaNetworkError(`Timeout connecting to ${this.address}:${this.port}`));
      }, this.timeoutSeconds * 1000);

      const onConnectError = (err: Error) => {
        clearTimeout(timer);
        reject(new MideaNetworkError(`Could not connect to ${this.address}:${this.port}: ${err.message}`));
      };
      socket.once('error', onConnectError);

      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', onConnectError);
        socket.setKeepAlive(true);
        socket.on('data', (data: Buffer) => {
          this.chunks.push(data);
          this.notify();
        });
        socket.on('error', (err: Error) => {
          this.failure = err;
          this.notify();
        });
        socket.on('close', () => {
          this.ended = true;
          this.notify();
        });
        this.socket = socket;
        resolve();
      });
    });
  }

  send(data: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new MideaNetworkError('Socket is not open'));
    }
    return new Promise<void>((resolve, reject) => {
      socket.write(data, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  async receive(readSize: number): Promise<Buffer | undefined> {
    if (this.chunks.length === 0 && !this.ended && this.failure === undefined) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          this.wake = undefined;
          resolve();
        }, this.timeoutSeconds * 1000);
        this.wake = () => {
          clearTimeout(timer);
          this.wake = undefined;
          resolve();
        };
      });
    }
    if (this.failure) {
      const failure = this.failure;
      this.failure = undefined;
      throw failure;
    }
    if (this.chunks.length > 0) {
      const all = Buffer.concat(this.chunks);
      const head = all.subarray(0, readSize);
      this.chunks = all.length > readSize ? [all.subarray(readSize)] : [];
      return head;
    }
    return this.ended ? Buffer.alloc(0) : undefined;
  }

  close(): void {
    if (this.socket) {
      this.socket.removeAllListeners();
      this.socket.destroy();
      this.socket = undefined;
    }
    this.chunks = [];
    this.notify();
  }

  private notify(): void {
    if (this.wake) {
      this.wake();
    }
  }
}

export const tcpConnectionFactory: ConnectionFactory = (address, port, timeoutSeconds) =>
  new TcpConnection(address, port, timeoutSeconds);

/**
 * Sends `message` to address:port over UDP and waits for the first reply
 */
export const udpQuery: UdpQuery = (address, port, message, timeoutSeconds, readSize) => {
  return new Promise<Buffer>((resolve, reject) => {
    const socket = dgram.createSocket('udp4');
    let done = false;
    const finish = (err: Error | undefined, data?: Buffer) => {
      if (done) {
        return;
      }
      done = true;
      clearTimeout(timer);
      socket.close();
      if (err || !data) {
        reject(err ?? new MideaNetworkError(`No reply from appliance ${address}:${port}`));
      } else {
        resolve(data);
      }
    };
    const timer = setTimeout(() => {
      finish(new MideaNetworkError(`Timeout while connecting to appliance ${address}:${port}`));
    }, timeoutSeconds * 1000);

    socket.on('error', (err) => {
      finish(new MideaNetworkError(`Could not connect to appliance ${address}:${port}: ${err.message}`));
    });
    socket.on('message', (msg: Buffer) => {
      finish(undefined, msg.subarray(0, readSize));
    });
    socket.send(message, port, address, (err) => {
      if (err) {
        finish(new MideaNetworkError(`Could not connect to appliance ${address}:${port}: ${err.message}`));
      }
    });
  });
};
