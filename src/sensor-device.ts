// src/sensor-device.ts
import { Mutex } from 'async-mutex';
import { buildReadRequest, buildWriteSequence } from './command-encoder.js';
import { resolveSensorDeviceOptions } from './config.js';
import { decodeFrame } from './decoder/register-decoder.js';
import { DeviceRegisterStore } from './device-register-store.js';
import {
  SensorInvalidAddressError,
  SensorNotConnectedError,
  SensorTimeoutError,
  SensorTransportError,
  SensorWriteUnconfirmedError,
} from './errors.js';
import { FrameAssembler } from './framers/frame-assembler.js';
import { rootLogger } from './logger.js';
import { sleep, toHex } from './utils/utils.js';
import {
  DecodeResult,
  DeviceAddress,
  Frame,
  FrameAssemblerStats,
  PendingReadContext,
  RegisterKey,
  ResolvedSensorDeviceOptions,
  SensorDataEvent,
  SensorDataHandler,
  SensorDeviceOptions,
  SensorErrorHandler,
  Transport,
} from './types/sensor-types.js';

const logger = rootLogger.createLogger('SensorDevice');

interface ResponseWaiter {
  resolve: (result: DecodeResult) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new SensorTransportError(String(err));
}

function hexAddress(address: DeviceAddress): string {
  return `0x${address.toString(16).padStart(2, '0')}`;
}

/**
 * One serial line with one or more sensors on it.
 *
 * Owns the receive loop (transport → assembler → decoder → store → data
 * handler) and serializes commands through a mutex, so at most one read is
 * outstanding per line and nothing interleaves with an unlock/write/save
 * sequence.
 */
export class SensorDevice {
  public readonly name: string;

  private readonly options: ResolvedSensorDeviceOptions;
  private readonly transport: Transport;
  private readonly assembler: FrameAssembler;
  private readonly store: DeviceRegisterStore;
  private readonly contexts = new Map<DeviceAddress, PendingReadContext>();
  private readonly waiters = new Map<DeviceAddress, ResponseWaiter>();
  private readonly _mutex: Mutex = new Mutex();

  private dataHandler: SensorDataHandler | null = null;
  private errorHandler: SensorErrorHandler | null = null;
  private _isOpen: boolean = false;
  private _looping: boolean = false;
  private receiveLoop: Promise<void> | null = null;
  private loopRead: Promise<void> | null = null;

  constructor(transport: Transport, options: SensorDeviceOptions) {
    this.options = resolveSensorDeviceOptions(options);
    this.name = this.options.name;
    this.transport = transport;
    this.assembler = new FrameAssembler(this.options.addresses);
    this.store = new DeviceRegisterStore(this.options.addresses);
  }

  public get isOpen(): boolean {
    return this._isOpen;
  }

  public get isLooping(): boolean {
    return this._looping;
  }

  public get stats(): Readonly<FrameAssemblerStats> {
    return this.assembler.stats;
  }

  /**
   * Registers the sink called once per decoded frame.
   */
  public setDataHandler(handler: SensorDataHandler | null): void {
    this.dataHandler = handler;
  }

  /**
   * Registers the handler for transport failures, which end the receive loop.
   */
  public setErrorHandler(handler: SensorErrorHandler | null): void {
    this.errorHandler = handler;
  }

  /**
   * Opens the transport and starts the receive loop.
   * @throws SensorConnectionError If the transport cannot be opened
   */
  public async open(): Promise<void> {
    if (this._isOpen) {
      logger.warn(`${this.name} is already open`);
      return;
    }
    await this.transport.open();
    this._isOpen = true;
    this.assembler.reset();
    this.receiveLoop = this._receive();
    logger.info(`${this.name} opened`);
  }

  /**
   * Stops loop reading and the receive loop, fails pending reads and closes the transport.
   */
  public async close(): Promise<void> {
    this._isOpen = false;
    this._looping = false;
    this._rejectWaiters(new SensorNotConnectedError());
    await Promise.all([this.receiveLoop, this.loopRead]);
    this.receiveLoop = null;
    this.loopRead = null;
    this.assembler.reset();
    this.contexts.clear();
    await this.transport.close();
    logger.info(`${this.name} closed`);
  }

  // === Register store ===

  public get(address: DeviceAddress, key: RegisterKey): number | undefined {
    return this.store.get(address, key);
  }

  public remove(address: DeviceAddress, key: RegisterKey): void {
    this.store.remove(address, key);
  }

  public snapshot(address: DeviceAddress): Record<string, number> {
    return this.store.snapshot(address);
  }

  // === Commands ===

  /**
   * Reads `count` registers starting at `register` and waits for the response.
   * @returns the decode result of the response frame
   * @throws SensorInvalidAddressError If the address is not configured
   * @throws SensorTimeoutError If no frame from the device arrives in time
   */
  public async readRegisters(
    address: DeviceAddress,
    register: number,
    count: number
  ): Promise<DecodeResult> {
    this._assertAddress(address);
    const request = buildReadRequest(address, register, count);

    return this._mutex.runExclusive(async () => {
      this._assertOpen();
      this.contexts.set(address, { startRegister: register });
      const response = this._waitForResponse(address);
      try {
        await this._send(request, address);
      } catch (err: unknown) {
        this._failWaiter(address, toError(err));
      }
      return response;
    });
  }

  /**
   * Persistent single-register write: unlock, settle, write, settle, save.
   * The device sends no acknowledgement; when `verifyWrite` is configured it
   * decides whether the write took effect.
   * @throws SensorWriteUnconfirmedError If the verifier rejects the write
   */
  public async writeRegister(address: DeviceAddress, register: number, value: number): Promise<void> {
    this._assertAddress(address);
    const [unlock, write, save] = buildWriteSequence(address, register, value);

    await this._mutex.runExclusive(async () => {
      this._assertOpen();
      await this._send(unlock, address);
      await sleep(this.options.writeSettleMs);
      await this._send(write, address);
      await sleep(this.options.writeSettleMs);
      await this._send(save, address);
    });

    const verifyWrite = this.options.verifyWrite;
    if (!verifyWrite) {
      logger.debug('Write sent, no acknowledgement expected', { address, register });
      return;
    }
    const confirmed = await verifyWrite({ address, register, value });
    if (!confirmed) {
      logger.warn('Write not confirmed by read-back', { address, register });
      throw new SensorWriteUnconfirmedError(address, register, value);
    }
  }

  // === Loop read ===

  /**
   * Starts cycling read requests over every configured address.
   * @throws SensorNotConnectedError If the device is not open
   */
  public startLoopRead(): void {
    this._assertOpen();
    if (this._looping) {
      logger.debug('Loop read already running');
      return;
    }
    this._looping = true;
    this.loopRead = this._loopRead();
  }

  public async stopLoopRead(): Promise<void> {
    this._looping = false;
    await this.loopRead;
    this.loopRead = null;
  }

  private async _loopRead(): Promise<void> {
    logger.info('Loop reading started');
    const { loopReadRegister, loopReadCount, loopReadIntervalMs } = this.options;
    while (this._looping) {
      for (const address of this.options.addresses) {
        if (!this._looping) break;
        try {
          await this.readRegisters(address, loopReadRegister, loopReadCount);
        } catch (err: unknown) {
          if (!(err instanceof SensorTimeoutError)) {
            logger.debug(`Loop read stopped: ${toError(err).message}`);
            this._looping = false;
            break;
          }
          logger.warn(err.message, { address });
        }
        await sleep(loopReadIntervalMs);
      }
    }
    logger.info('Loop reading ended');
  }

  // === Receive path ===

  private async _receive(): Promise<void> {
    while (this._isOpen) {
      let chunk: Uint8Array;
      try {
        chunk = await this.transport.readAvailable();
      } catch (err: unknown) {
        this._handleTransportFailure(toError(err));
        return;
      }
      if (chunk.length === 0) {
        await sleep(this.options.pollIntervalMs);
        continue;
      }
      this._onDataReceived(chunk);
    }
  }

  private _onDataReceived(chunk: Uint8Array): void {
    logger.debug(`RX: ${toHex(chunk)}`);
    for (const frame of this.assembler.push(chunk)) {
      this._processFrame(frame);
    }
  }

  private _processFrame(frame: Frame): void {
    const { address } = frame;
    const result = decodeFrame(frame, this.contexts.get(address));
    const policy = result.policy;
    if (policy === 'dropped') {
      logger.debug(`Register response without a pending read, ${frame.payload.length} bytes dropped`, {
        address,
      });
      return;
    }
    if (result.context) this.contexts.set(address, result.context);
    this.store.apply(address, result.values);

    const event: SensorDataEvent = {
      address,
      policy,
      values: result.values,
      registers: this.store.snapshot(address),
      checksum: frame.checksum,
    };
    this._notify(event);

    const waiter = this.waiters.get(address);
    if (waiter) {
      this._clearWaiter(address);
      waiter.resolve(result);
    }
  }

  private _notify(event: SensorDataEvent): void {
    if (!this.dataHandler) return;
    try {
      this.dataHandler(event);
    } catch (err: unknown) {
      logger.error('Data handler failed', toError(err), { address: event.address });
    }
  }

  // === Helpers ===

  private async _send(data: Uint8Array, address: DeviceAddress): Promise<void> {
    logger.debug(`TX: ${toHex(data)}`, { address, funcCode: data[1] });
    try {
      await this.transport.write(data);
    } catch (err: unknown) {
      const error = toError(err);
      this._handleTransportFailure(error);
      throw error;
    }
  }

  private _waitForResponse(address: DeviceAddress): Promise<DecodeResult> {
    return new Promise<DecodeResult>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters.delete(address);
        reject(
          new SensorTimeoutError(
            `No response from device ${hexAddress(address)} within ${this.options.responseTimeoutMs}ms`
          )
        );
      }, this.options.responseTimeoutMs);
      this.waiters.set(address, { resolve, reject, timer });
    });
  }

  private _clearWaiter(address: DeviceAddress): void {
    const waiter = this.waiters.get(address);
    if (!waiter) return;
    clearTimeout(waiter.timer);
    this.waiters.delete(address);
  }

  private _failWaiter(address: DeviceAddress, error: Error): void {
    const waiter = this.waiters.get(address);
    if (!waiter) return;
    this._clearWaiter(address);
    waiter.reject(error);
  }

  private _rejectWaiters(error: Error): void {
    for (const address of [...this.waiters.keys()]) {
      this._failWaiter(address, error);
    }
  }

  private _handleTransportFailure(error: Error): void {
    if (!this._isOpen) return;
    this._isOpen = false;
    this._looping = false;
    logger.error(`Transport failure on ${this.name}: ${error.message}`);
    this._rejectWaiters(error);
    this.errorHandler?.(error);
  }

  private _assertAddress(address: DeviceAddress): void {
    if (!this.store.has(address)) throw new SensorInvalidAddressError(address);
  }

  private _assertOpen(): void {
    if (!this._isOpen) throw new SensorNotConnectedError();
  }
}
