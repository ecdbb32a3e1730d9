// src/device-register-store.ts

import { SensorInvalidAddressError } from './errors.js';
import { DeviceAddress, RegisterKey, RegisterValues } from './types/sensor-types.js';

/**
 * Last decoded value of every register, per device address. Address entries
 * are created up front and never removed.
 */
export class DeviceRegisterStore {
  private readonly devices = new Map<DeviceAddress, Map<RegisterKey, number>>();

  constructor(addresses: Iterable<DeviceAddress>) {
    for (const address of addresses) {
      this.devices.set(address, new Map());
    }
  }

  public has(address: DeviceAddress): boolean {
    return this.devices.has(address);
  }

  public addresses(): DeviceAddress[] {
    return [...this.devices.keys()];
  }

  /**
   * @throws SensorInvalidAddressError If the address is not configured
   */
  public set(address: DeviceAddress, key: RegisterKey, value: number): void {
    this._registers(address).set(key, value);
  }

  /**
   * Stores every value decoded from one frame.
   * @throws SensorInvalidAddressError If the address is not configured
   */
  public apply(address: DeviceAddress, values: RegisterValues): void {
    const registers = this._registers(address);
    for (const [key, value] of values) {
      registers.set(key, value);
    }
  }

  public get(address: DeviceAddress, key: RegisterKey): number | undefined {
    return this.devices.get(address)?.get(key);
  }

  public remove(address: DeviceAddress, key: RegisterKey): void {
    this.devices.get(address)?.delete(key);
  }

  /**
   * Plain-object copy of a device's registers; numeric keys become strings.
   */
  public snapshot(address: DeviceAddress): Record<string, number> {
    const registers = this.devices.get(address);
    return registers ? Object.fromEntries(registers) : {};
  }

  private _registers(address: DeviceAddress): Map<RegisterKey, number> {
    const registers = this.devices.get(address);
    if (!registers) throw new SensorInvalidAddressError(address);
    return registers;
  }
}
