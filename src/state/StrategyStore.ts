export const PERMANENT_PASSWORD_KEY = 'permanent-password'

export interface Strategy {
  config_options: Record<string, string>
  extra: Record<string, string>
}

/**
 * Payload returned to a device whose cached strategy is stale
 */
export interface StrategySnapshot {
  modified_at: number
  strategy: Strategy
}

/**
 * Versioned per-device strategy storage
 * Separates strategy bookkeeping from HTTP concerns
 */
export interface StrategyStore {
  /** Returns the new version stamp */
  setPassword(deviceId: string, newPassword: string): number
  /** Returns null for unknown devices and for clients already at the stored version */
  getStrategyIfModified(deviceId: string, clientVersion: number): StrategySnapshot | null
}

interface DeviceStrategy {
  modifiedAt: number
  configOptions: Record<string, string>
  extra: Record<string, string>
}

/**
 * In-memory implementation of the strategy store
 * Entries live for the lifetime of the process.
 *
 * Every method is synchronous, so each call runs to completion on the event
 * loop before any other store call starts; a reader never sees half a write.
 */
export class InMemoryStrategyStore implements StrategyStore {
  private readonly entries = new Map<string, DeviceStrategy>()

  constructor(private readonly now: () => number = Date.now) {}

  setPassword(deviceId: string, newPassword: string): number {
    const previous = this.entries.get(deviceId)
    // stamps for one device never repeat, even within the same millisecond
    const modifiedAt = previous ? Math.max(this.now(), previous.modifiedAt + 1) : this.now()

    this.entries.set(deviceId, {
      modifiedAt,
      configOptions: { [PERMANENT_PASSWORD_KEY]: newPassword },
      extra: {},
    })
    return modifiedAt
  }

  getStrategyIfModified(deviceId: string, clientVersion: number): StrategySnapshot | null {
    const entry = this.entries.get(deviceId)
    if (!entry || entry.modifiedAt === clientVersion) {
      return null
    }

    return {
      modified_at: entry.modifiedAt,
      strategy: {
        config_options: { ...entry.configOptions },
        extra: { ...entry.extra },
      },
    }
  }
}
