import { randomBytes, randomInt } from "node:crypto";
import type { Logger } from "pino";
import { AlreadyLockedOutError, NotFoundError } from "./errors.js";
import { hash, verify } from "./hashUtils.js";
import { KeyedLock } from "./keyedLock.js";
import type { DeviceType, SecurityLevel } from "./shared/types.js";

interface DeviceTemplate {
  label: string;
  encryptionAlgorithm: string;
  defaultCodes: readonly string[];
}

const DEVICE_TEMPLATES: Record<DeviceType, DeviceTemplate> = {
  flash_drive: {
    label: "Flash Drive",
    encryptionAlgorithm: "AES-256",
    defaultCodes: ["password", "123456", "admin", "usb", "drive"],
  },
  external_hdd: {
    label: "External HDD",
    encryptionAlgorithm: "AES-256-XTS",
    defaultCodes: ["harddrive", "backup", "storage", "data", "secure"],
  },
  usb_ssd: {
    label: "USB SSD",
    encryptionAlgorithm: "AES-256-GCM",
    defaultCodes: ["ssd", "fast", "performance", "speed", "reliable"],
  },
  encrypted_device: {
    label: "Encrypted Device",
    encryptionAlgorithm: "ChaCha20-Poly1305",
    defaultCodes: ["encrypted", "secret", "private", "confidential", "secure"],
  },
  smart_card: {
    label: "Smart Card",
    encryptionAlgorithm: "RSA-2048",
    defaultCodes: ["pin", "card", "smart", "access", "identity"],
  },
};

/**
 * Failed attempts allowed before lockout. Stricter levels allow fewer.
 */
export const MAX_ATTEMPTS_BY_LEVEL: Record<SecurityLevel, number> = {
  basic: 10,
  standard: 5,
  advanced: 3,
  military: 2,
};

/**
 * Devices created by `quickSetup`, in order.
 */
const QUICK_SETUP: ReadonlyArray<{ deviceType: DeviceType; securityLevel: SecurityLevel; code: string }> = [
  { deviceType: "flash_drive", securityLevel: "standard", code: "usb" },
  { deviceType: "external_hdd", securityLevel: "advanced", code: "backup" },
  { deviceType: "encrypted_device", securityLevel: "military", code: "secret" },
];

/**
 * `locked_out` once the attempt budget is spent, `locked` while failed
 * attempts are pending, `unlocked` otherwise.
 */
export type DeviceState = "unlocked" | "locked" | "locked_out";

/**
 * Stored form of a simulated device. Only the digest of the unlock code is kept.
 */
export interface SimulatedDevice {
  id: string;
  deviceType: DeviceType;
  securityLevel: SecurityLevel;
  description: string;
  digest: string;
  encryptionAlgorithm: string;
  failedAttempts: number;
  maxAttempts: number;
  locked: boolean;
  createdAt: string;
  lastUnlockedAt: string | null;
}

/**
 * Read-only view of a device returned to callers.
 */
export interface DeviceInfo extends Readonly<SimulatedDevice> {
  state: DeviceState;
  remainingAttempts: number;
}

export type UnlockOutcome =
  | {
      success: true;
      deviceId: string;
      state: DeviceState;
      attemptsUsed: number;
      message: string;
    }
  | {
      success: false;
      deviceId: string;
      state: DeviceState;
      failedAttempts: number;
      remainingAttempts: number;
      lockedOut: boolean;
      message: string;
    };

/**
 * One verified unlock attempt, kept for statistics.
 */
export interface UnlockRecord {
  deviceId: string;
  method: string;
  success: boolean;
  timestamp: string;
  deviceType: DeviceType;
  securityLevel: SecurityLevel;
}

export interface MethodTotals {
  total: number;
  successful: number;
  successRate: number;
}

export interface UnlockStatistics {
  totalAttempts: number;
  successfulAttempts: number;
  failedAttempts: number;
  successRate: number;
  /**
   * Keyed by method label. Built with `Object.fromEntries`, so every label
   * is an own property.
   */
  methods: Record<string, MethodTotals>;
  devicesTargeted: number;
}

/**
 * In-memory device collection shared by every caller in the process.
 */
export class DeviceStore {
  private readonly devices = new Map<string, SimulatedDevice>();

  get(id: string): SimulatedDevice | undefined {
    return this.devices.get(id);
  }

  has(id: string): boolean {
    return this.devices.has(id);
  }

  save(device: SimulatedDevice): void {
    this.devices.set(device.id, device);
  }

  all(): SimulatedDevice[] {
    return [...this.devices.values()];
  }

  get size(): number {
    return this.devices.size;
  }
}

export interface UsbSimulatorOptions {
  log: Logger;
  store?: DeviceStore;
}

export function deviceState(device: SimulatedDevice): DeviceState {
  if (device.locked) {
    return "locked_out";
  }
  return device.failedAttempts > 0 ? "locked" : "unlocked";
}

function toInfo(device: SimulatedDevice): DeviceInfo {
  return {
    ...device,
    state: deviceState(device),
    remainingAttempts: Math.max(0, device.maxAttempts - device.failedAttempts),
  };
}

/**
 * Simulates password-protected USB devices with attempt counting and lockout.
 * Each device's read-modify-write runs under its own lock.
 */
export class UsbSimulator {
  private readonly log: Logger;
  private readonly store: DeviceStore;
  private readonly locks = new KeyedLock();
  private readonly records: UnlockRecord[] = [];

  constructor(options: UsbSimulatorOptions) {
    this.log = options.log.child({ component: "UsbSimulator" });
    this.store = options.store ?? new DeviceStore();
  }

  /**
   * Create a device. Without a code, one is picked from the device type's
   * common codes.
   */
  create(deviceType: DeviceType, securityLevel: SecurityLevel, code?: string): DeviceInfo {
    const template = DEVICE_TEMPLATES[deviceType];
    const unlockCode = code ?? template.defaultCodes[randomInt(template.defaultCodes.length)] ?? "password";

    const device: SimulatedDevice = {
      id: this.generateId(),
      deviceType,
      securityLevel,
      description: `Simulated ${template.label}`,
      digest: hash(unlockCode),
      encryptionAlgorithm: template.encryptionAlgorithm,
      failedAttempts: 0,
      maxAttempts: MAX_ATTEMPTS_BY_LEVEL[securityLevel],
      locked: false,
      createdAt: new Date().toISOString(),
      lastUnlockedAt: null,
    };

    this.store.save(device);
    this.log.info({ deviceId: device.id, deviceType, securityLevel }, "Created simulated device");
    return toInfo(device);
  }

  /**
   * Populate a fixed set of demo devices.
   */
  quickSetup(): DeviceInfo[] {
    return QUICK_SETUP.map(({ deviceType, securityLevel, code }) =>
      this.create(deviceType, securityLevel, code),
    );
  }

  list(): DeviceInfo[] {
    return this.store.all().map(toInfo);
  }

  /**
   * @throws NotFoundError if the id is unknown
   */
  detect(deviceId: string): DeviceInfo {
    return toInfo(this.require(deviceId));
  }

  /**
   * Try an unlock code. A locked-out device rejects the attempt without
   * counting it; otherwise a wrong code counts towards lockout and a correct
   * one clears the counter.
   * @throws NotFoundError if the id is unknown
   * @throws AlreadyLockedOutError if the device is locked out
   */
  async unlock(deviceId: string, plaintext: string, method = "manual"): Promise<UnlockOutcome> {
    return this.locks.run(deviceId, (): UnlockOutcome => {
      const device = this.require(deviceId);
      if (device.locked) {
        this.log.info({ deviceId }, "Unlock refused, device is locked out");
        throw new AlreadyLockedOutError(deviceId);
      }

      const success = verify(plaintext, device.digest);
      const timestamp = new Date().toISOString();
      this.records.push({
        deviceId,
        method,
        success,
        timestamp,
        deviceType: device.deviceType,
        securityLevel: device.securityLevel,
      });

      if (success) {
        const attemptsUsed = device.failedAttempts + 1;
        device.failedAttempts = 0;
        device.lastUnlockedAt = timestamp;
        this.log.info({ deviceId, method, attemptsUsed }, "Device unlocked");
        return {
          success: true,
          deviceId,
          state: deviceState(device),
          attemptsUsed,
          message: `Device ${deviceId} unlocked successfully`,
        };
      }

      device.failedAttempts++;
      if (device.failedAttempts >= device.maxAttempts) {
        device.locked = true;
      }
      const remainingAttempts = Math.max(0, device.maxAttempts - device.failedAttempts);
      this.log.info(
        { deviceId, method, failedAttempts: device.failedAttempts, lockedOut: device.locked },
        "Unlock attempt failed",
      );

      return {
        success: false,
        deviceId,
        state: deviceState(device),
        failedAttempts: device.failedAttempts,
        remainingAttempts,
        lockedOut: device.locked,
        message: device.locked
          ? "Incorrect code. The device is now locked out."
          : `Incorrect code. ${remainingAttempts} attempts remaining.`,
      };
    });
  }

  /**
   * Clear the attempt counter and lockout, whatever the current state.
   * @throws NotFoundError if the id is unknown
   */
  async reset(deviceId: string): Promise<DeviceInfo> {
    return this.locks.run(deviceId, () => {
      const device = this.require(deviceId);
      device.failedAttempts = 0;
      device.locked = false;
      this.log.info({ deviceId }, "Device reset");
      return toInfo(device);
    });
  }

  /**
   * Aggregate all recorded unlock attempts. Recomputed on every call.
   */
  statistics(): UnlockStatistics {
    // Labels are caller-supplied; keep them off plain-object keys
    const methods = new Map<string, MethodTotals>();
    let successfulAttempts = 0;

    for (const record of this.records) {
      const entry = methods.get(record.method) ?? { total: 0, successful: 0, successRate: 0 };
      entry.total++;
      if (record.success) {
        entry.successful++;
        successfulAttempts++;
      }
      entry.successRate = entry.successful / entry.total;
      methods.set(record.method, entry);
    }

    const totalAttempts = this.records.length;
    return {
      totalAttempts,
      successfulAttempts,
      failedAttempts: totalAttempts - successfulAttempts,
      successRate: totalAttempts > 0 ? successfulAttempts / totalAttempts : 0,
      methods: Object.fromEntries(methods),
      devicesTargeted: new Set(this.records.map((record) => record.deviceId)).size,
    };
  }

  get deviceCount(): number {
    return this.store.size;
  }

  private require(deviceId: string): SimulatedDevice {
    const device = this.store.get(deviceId);
    if (!device) {
      throw new NotFoundError(`Device ${deviceId} not found`);
    }
    return device;
  }

  private generateId(): string {
    let id: string;
    do {
      id = `USB_${Date.now()}_${randomBytes(4).toString("hex")}`;
    } while (this.store.has(id));
    return id;
  }
}
