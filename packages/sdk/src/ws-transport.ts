import {
  EdgeError,
  type RelayAddress,
  type RelayControlMessage,
  type TransportAdapter,
  createLogger,
  decodeRelayFrame,
  encodeRelayFrame,
  parseControlMessage,
} from 'edgli-protocol';
import WebSocket from 'ws';

export interface WebSocketTransportOptions {
  /** ws:// or wss:// URL of the entry relay */
  url: string;
  /** This node's address, registered with the relay */
  address: RelayAddress;
  /** Expected address of the entry relay; registration fails on mismatch */
  relayAddress?: RelayAddress;
  connectTimeoutMs?: number;
  events?: Partial<WebSocketTransportEvents>;
}

export interface WebSocketTransportEvents {
  onDisconnected: (code: number) => void;
}

const log = createLogger('WebSocketTransport');

function rawDataToBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

function sendControl(ws: WebSocket, message: RelayControlMessage): void {
  ws.send(JSON.stringify(message));
}

/**
 * Transport over a single WebSocket to the entry relay. Every packet goes to that relay, framed
 * with the address it is meant for; the relay delivers inbound packets framed with ours.
 */
export class WebSocketTransport implements TransportAdapter {
  onRawReceived: ((bytes: Uint8Array) => void) | null = null;
  private url: string;
  private address: RelayAddress;
  private expectedRelay: RelayAddress | null;
  private connectTimeoutMs: number;
  private events: Partial<WebSocketTransportEvents>;
  private ws: WebSocket | null = null;

  constructor(options: WebSocketTransportOptions) {
    this.url = options.url;
    this.address = options.address;
    this.expectedRelay = options.relayAddress ?? null;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
    this.events = options.events ?? {};
  }

  get connected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  /** Opens the socket and registers; resolves with the relay's address. */
  async connect(): Promise<RelayAddress> {
    if (this.ws) {
      throw new EdgeError('TRANSPORT_FAILED', 'Already connected', { url: this.url });
    }

    const ws = new WebSocket(this.url);
    this.ws = ws;

    let relayAddress: RelayAddress;
    try {
      relayAddress = await this.register(ws);
      if (this.expectedRelay && relayAddress !== this.expectedRelay) {
        throw new EdgeError('TRANSPORT_FAILED', 'Relay answered with an unexpected address', {
          expected: this.expectedRelay,
          actual: relayAddress,
        });
      }
    } catch (error) {
      this.ws = null;
      ws.on('error', (late) => log.debug('socket error after failed registration', { error: late.message }));
      ws.terminate();
      throw error;
    }

    ws.on('message', (data, isBinary) => this.handleMessage(data, isBinary));
    ws.on('error', (error) => log.warn('socket error', { url: this.url, error: error.message }));
    ws.on('close', (code) => {
      if (this.ws === ws) this.ws = null;
      log.info('disconnected from relay', { url: this.url, code });
      this.events.onDisconnected?.(code);
    });

    log.info('registered with relay', { url: this.url, relay: relayAddress });
    return relayAddress;
  }

  sendRaw(relayAddress: RelayAddress, bytes: Uint8Array): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new EdgeError('TRANSPORT_FAILED', 'Not connected to a relay', { relayAddress }));
    }

    return new Promise((resolve, reject) => {
      ws.send(encodeRelayFrame(relayAddress, bytes), (error) => {
        if (error) {
          reject(new EdgeError('TRANSPORT_FAILED', 'WebSocket send failed', { relayAddress, error: error.message }));
          return;
        }
        resolve();
      });
    });
  }

  /** Resolves once the socket is closed. */
  close(): Promise<void> {
    const ws = this.ws;
    this.ws = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) return Promise.resolve();

    return new Promise((resolve) => {
      ws.once('close', () => resolve());
      ws.close();
    });
  }

  private register(ws: WebSocket): Promise<RelayAddress> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        ws.off('open', onOpen);
        ws.off('message', onMessage);
        ws.off('error', onError);
        ws.off('close', onClose);
      };
      const fail = (message: string, context: Record<string, unknown> = {}) => {
        cleanup();
        reject(new EdgeError('TRANSPORT_FAILED', message, { url: this.url, ...context }));
      };

      const onOpen = () => sendControl(ws, { type: 'register', address: this.address });
      const onMessage = (data: WebSocket.RawData, isBinary: boolean) => {
        if (isBinary) return;
        const message = parseControlMessage(data.toString());
        if (message?.type === 'registered') {
          cleanup();
          resolve(message.address);
        } else if (message?.type === 'error') {
          fail('Relay refused registration', { error: message.error });
        }
      };
      const onError = (error: Error) => fail('Failed to connect to relay', { error: error.message });
      const onClose = (code: number) => fail('Relay closed the connection during registration', { code });
      const timer = setTimeout(() => fail('Timed out registering with relay'), this.connectTimeoutMs);

      ws.on('open', onOpen);
      ws.on('message', onMessage);
      ws.on('error', onError);
      ws.on('close', onClose);
    });
  }

  private handleMessage(data: WebSocket.RawData, isBinary: boolean): void {
    if (!isBinary) {
      const message = parseControlMessage(data.toString());
      if (message?.type === 'error') {
        log.warn('relay reported an error', { error: message.error });
      }
      return;
    }

    const frame = decodeRelayFrame(rawDataToBytes(data));
    if (!frame || frame.target !== this.address) {
      log.debug('dropping frame not addressed to us', { size: frame?.packet.length ?? 0 });
      return;
    }
    this.onRawReceived?.(frame.packet);
  }
}
