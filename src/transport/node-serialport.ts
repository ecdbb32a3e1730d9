import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays } from '../utils/utils.js';
import { rootLogger } from '../logger.js';
import {
  SensorConnectionError,
  SensorReadError,
  SensorTransportError,
  SensorWriteError,
} from '../errors.js';
import { NodeSerialTransportOptions, Transport } from '../types/sensor-types.js';

// ========== CONSTANTS ==========
const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 921600,
  DEFAULT_MAX_BUFFER_SIZE: 4096,
} as const;

// ========== LOGGER ==========
const logger = rootLogger.createLogger('NodeSerialTransport');

function toError(err: unknown): Error {
  return err instanceof Error ? err : new SensorTransportError(String(err));
}

/**
 * Serial line transport on top of the `serialport` package. Incoming bytes are
 * buffered by the `data` listener and handed out by `readAvailable`.
 */
class NodeSerialTransport implements Transport {
  private path: string;
  private options: Required<NodeSerialTransportOptions>;
  private port: SerialPort | null = null;
  private readBuffer: Uint8Array = new Uint8Array(0);
  private _isOpen: boolean = false;
  private _failure: Error | null = null;
  private _isClosing: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(path: string, options: NodeSerialTransportOptions = {}) {
    this.path = path;
    this.options = {
      baudRate: 9600,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      maxBufferSize: NODE_SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      ...options,
    };
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async open(): Promise<void> {
    if (this._isOpen) {
      logger.warn(`Serial port ${this.path} is already open`);
      return;
    }
    if (
      this.options.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new SensorConnectionError(`Invalid baud rate: ${this.options.baudRate}`);
    }

    this._failure = null;
    this.readBuffer = new Uint8Array(0);
    await this._createAndOpenPort();
    logger.info(`Serial port ${this.path} opened at ${this.options.baudRate} baud`);
  }

  private _createAndOpenPort(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const port = new SerialPort({
        path: this.path,
        baudRate: this.options.baudRate,
        dataBits: this.options.dataBits,
        stopBits: this.options.stopBits,
        parity: this.options.parity,
        autoOpen: false,
      });
      this.port = port;

      port.open((err: Error | null) => {
        if (err) {
          this._isOpen = false;
          this.port = null;
          const message = err.message.toLowerCase();
          if (message.includes('permission')) {
            reject(new SensorConnectionError(`Permission denied: ${this.path}`));
          } else if (message.includes('busy')) {
            reject(new SensorConnectionError(`Serial port is busy: ${this.path}`));
          } else if (message.includes('no such file')) {
            reject(new SensorConnectionError(`Serial port does not exist: ${this.path}`));
          } else {
            reject(new SensorConnectionError(err.message));
          }
          return;
        }

        this._isOpen = true;
        port.on('data', (data: Buffer) => this._onData(data));
        port.on('error', (error: Error) => this._onError(error));
        port.on('close', () => this._onClose());
        resolve();
      });
    });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
    if (this.readBuffer.length > this.options.maxBufferSize) {
      const dropped = this.readBuffer.length - this.options.maxBufferSize;
      this.readBuffer = this.readBuffer.slice(-this.options.maxBufferSize);
      logger.warn(`Receive buffer overflow, dropped ${dropped} oldest bytes`);
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port ${this.path} error: ${err.message}`);
    this._failure = new SensorReadError(err.message);
  }

  private _onClose(): void {
    if (this._isClosing) return;
    logger.warn(`Serial port ${this.path} closed unexpectedly`);
    this._isOpen = false;
    this._failure ??= new SensorReadError('Port closed');
  }

  async readAvailable(): Promise<Uint8Array> {
    if (this._failure) throw this._failure;
    if (!this._isOpen) throw new SensorReadError('Port closed');
    const data = this.readBuffer;
    this.readBuffer = new Uint8Array(0);
    return data;
  }

  async write(data: Uint8Array): Promise<void> {
    return this._operationMutex.runExclusive(async () => {
      const port = this.port;
      if (!this._isOpen || !port) throw new SensorWriteError('Port closed');
      await new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(data), (err: Error | null | undefined) => {
          if (err) return reject(new SensorWriteError(err.message));
          port.drain((drainErr: Error | null | undefined) => {
            if (drainErr) return reject(new SensorWriteError(drainErr.message));
            resolve();
          });
        });
      });
    });
  }

  async close(): Promise<void> {
    const port = this.port;
    this._isOpen = false;
    this.port = null;
    this.readBuffer = new Uint8Array(0);
    if (!port) return;

    port.removeAllListeners('data');
    port.removeAllListeners('error');
    if (!port.isOpen) return;

    this._isClosing = true;
    try {
      await new Promise<void>((resolve, reject) => {
        port.close((err: Error | null | undefined) => (err ? reject(toError(err)) : resolve()));
      });
      logger.info(`Serial port ${this.path} closed`);
    } finally {
      this._isClosing = false;
      port.removeAllListeners('close');
    }
  }
}

export default NodeSerialTransport;
