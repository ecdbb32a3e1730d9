// src/errors.ts

/**
 * Base class for all sensor errors
 */
export class SensorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SensorError';
  }
}

/**
 * Error class for invalid configuration
 */
export class SensorConfigError extends SensorError {
  constructor(message: string) {
    super(message);
    this.name = 'SensorConfigError';
  }
}

/**
 * Error class for an address outside the configured set
 */
export class SensorInvalidAddressError extends SensorError {
  address: number;

  constructor(address: number) {
    super(`Unknown device address: 0x${address.toString(16).padStart(2, '0')}`);
    this.name = 'SensorInvalidAddressError';
    this.address = address;
  }
}

/**
 * Error class for a read that got no response in time
 */
export class SensorTimeoutError extends SensorError {
  constructor(message: string = 'Sensor response timed out') {
    super(message);
    this.name = 'SensorTimeoutError';
  }
}

/**
 * Error class for commands issued while the device is closed
 */
export class SensorNotConnectedError extends SensorError {
  constructor() {
    super('Sensor device is not open');
    this.name = 'SensorNotConnectedError';
  }
}

/**
 * Error class for a write the read-back check rejected
 */
export class SensorWriteUnconfirmedError extends SensorError {
  address: number;
  register: number;
  value: number;

  constructor(address: number, register: number, value: number) {
    super(
      `Write not confirmed: device 0x${address.toString(16)}, register 0x${register.toString(16)}, value 0x${value.toString(16)}`
    );
    this.name = 'SensorWriteUnconfirmedError';
    this.address = address;
    this.register = register;
    this.value = value;
  }
}

// --- Transport errors ---

/**
 * Base error class for transport failures
 */
export class SensorTransportError extends SensorError {
  constructor(message: string) {
    super(message);
    this.name = 'SensorTransportError';
  }
}

/**
 * Error class for failures while opening the transport
 */
export class SensorConnectionError extends SensorTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SensorConnectionError';
  }
}

/**
 * Error class for read failures
 */
export class SensorReadError extends SensorTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SensorReadError';
  }
}

/**
 * Error class for write failures
 */
export class SensorWriteError extends SensorTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SensorWriteError';
  }
}
