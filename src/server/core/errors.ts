/**
 * Failure conditions surfaced by device operations.
 * Codes follow the errno a character device would hand back to its caller.
 */
export type DeviceErrorCode =
  | "ERESTARTSYS"
  | "ENOMEM"
  | "EFAULT"
  | "EINVAL"
  | "ENODEV"
  | "EBADF"
  | "EBUSY";

export class DeviceError extends Error {
  readonly code: DeviceErrorCode;

  constructor(code: DeviceErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Lock wait abandoned before entry; nothing was touched, safe to retry. */
export class CancelledError extends DeviceError {
  constructor(message = "lock acquisition cancelled") {
    super("ERESTARTSYS", message);
  }
}

/**
 * The memory pool refused a segment, slot array or quantum.
 * Structure linked before the failure stays in place.
 */
export class AllocationFailureError extends DeviceError {
  constructor(what: string) {
    super("ENOMEM", `out of memory allocating ${what}`);
  }
}

export class BoundaryFaultError extends DeviceError {
  constructor(message: string) {
    super("EFAULT", message);
  }
}

export class InvalidArgumentError extends DeviceError {
  constructor(message: string) {
    super("EINVAL", message);
  }
}

export class NoSuchDeviceError extends DeviceError {
  constructor(minor: number) {
    super("ENODEV", `no device with minor ${minor}`);
  }
}

export class BadFileError extends DeviceError {
  constructor(message: string) {
    super("EBADF", message);
  }
}

export class DeviceBusyError extends DeviceError {
  constructor(message: string) {
    super("EBUSY", message);
  }
}

export function isDeviceError(err: unknown): err is DeviceError {
  return err instanceof DeviceError;
}
