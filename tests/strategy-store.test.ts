/**
 * Tests for the in-memory strategy store
 */

import { InMemoryStrategyStore, PERMANENT_PASSWORD_KEY } from '../src/state/StrategyStore'

function fixedClock(...times: number[]): () => number {
  let index = 0
  return () => times[Math.min(index++, times.length - 1)]
}

describe('InMemoryStrategyStore', () => {
  describe('getStrategyIfModified', () => {
    it('returns null for devices that were never written', () => {
      const store = new InMemoryStrategyStore()

      expect(store.getStrategyIfModified('unknown', 0)).toBeNull()
      expect(store.getStrategyIfModified('unknown', 12345)).toBeNull()
      expect(store.getStrategyIfModified('', 0)).toBeNull()
    })

    it('returns the full strategy when the client version differs', () => {
      const store = new InMemoryStrategyStore(fixedClock(1000))
      store.setPassword('dev1', 'secret123')

      expect(store.getStrategyIfModified('dev1', 0)).toEqual({
        modified_at: 1000,
        strategy: {
          config_options: { 'permanent-password': 'secret123' },
          extra: {},
        },
      })
    })

    it('returns null when the client is at the stored version', () => {
      const store = new InMemoryStrategyStore(fixedClock(1000))
      const version = store.setPassword('dev1', 'secret123')

      expect(store.getStrategyIfModified('dev1', version)).toBeNull()
    })

    it('still returns the strategy when the client reports a newer version', () => {
      const store = new InMemoryStrategyStore(fixedClock(1000))
      store.setPassword('dev1', 'secret123')

      const snapshot = store.getStrategyIfModified('dev1', 5000)
      expect(snapshot?.modified_at).toBe(1000)
    })

    it('gives the same answer for repeated reads without writes', () => {
      const store = new InMemoryStrategyStore(fixedClock(1000))
      store.setPassword('dev1', 'pw')

      expect(store.getStrategyIfModified('dev1', 1000)).toBeNull()
      expect(store.getStrategyIfModified('dev1', 1000)).toBeNull()
      expect(store.getStrategyIfModified('dev1', 7)).toEqual(store.getStrategyIfModified('dev1', 7))
    })

    it('hands out copies that cannot change stored state', () => {
      const store = new InMemoryStrategyStore(fixedClock(1000))
      store.setPassword('dev1', 'original')

      const snapshot = store.getStrategyIfModified('dev1', 0)
      if (!snapshot) throw new Error('expected a snapshot')
      snapshot.strategy.config_options[PERMANENT_PASSWORD_KEY] = 'tampered'
      snapshot.strategy.extra.injected = 'yes'

      expect(store.getStrategyIfModified('dev1', 0)?.strategy).toEqual({
        config_options: { 'permanent-password': 'original' },
        extra: {},
      })
    })
  })

  describe('setPassword', () => {
    it('returns the clock time as the version', () => {
      const store = new InMemoryStrategyStore(fixedClock(1700000000000))

      expect(store.setPassword('dev1', 'pw')).toBe(1700000000000)
    })

    it('overwrites the previous password', () => {
      const store = new InMemoryStrategyStore(fixedClock(1000, 2000))
      store.setPassword('dev1', 'first')
      const latest = store.setPassword('dev1', 'second')

      expect(latest).toBe(2000)
      expect(store.getStrategyIfModified('dev1', 1000)?.strategy.config_options).toEqual({
        'permanent-password': 'second',
      })
      expect(store.getStrategyIfModified('dev1', 2000)).toBeNull()
    })

    it('keeps versions strictly increasing when the clock stalls or steps back', () => {
      const store = new InMemoryStrategyStore(fixedClock(1000, 1000, 900))

      expect(store.setPassword('dev1', 'a')).toBe(1000)
      expect(store.setPassword('dev1', 'b')).toBe(1001)
      expect(store.setPassword('dev1', 'c')).toBe(1002)
    })

    it('tracks versions per device', () => {
      const store = new InMemoryStrategyStore(fixedClock(1000, 1000))

      expect(store.setPassword('dev1', 'a')).toBe(1000)
      expect(store.setPassword('dev2', 'b')).toBe(1000)
    })

    it('keeps the last of many concurrent writes to the same device', async () => {
      const store = new InMemoryStrategyStore()

      const versions = await Promise.all(
        Array.from({ length: 50 }, (_, i) =>
          Promise.resolve().then(() => store.setPassword('dev1', `pw-${i}`))
        )
      )

      const latest = Math.max(...versions)
      expect(new Set(versions).size).toBe(50)
      expect(versions[49]).toBe(latest)
      expect(store.getStrategyIfModified('dev1', 0)).toEqual({
        modified_at: latest,
        strategy: {
          config_options: { 'permanent-password': 'pw-49' },
          extra: {},
        },
      })
    })

    it('loses no updates across concurrent writes to distinct devices', async () => {
      const store = new InMemoryStrategyStore()

      await Promise.all(
        Array.from({ length: 20 }, (_, i) =>
          Promise.resolve().then(() => store.setPassword(`dev-${i}`, `pw-${i}`))
        )
      )

      for (let i = 0; i < 20; i++) {
        expect(store.getStrategyIfModified(`dev-${i}`, 0)?.strategy.config_options).toEqual({
          'permanent-password': `pw-${i}`,
        })
      }
    })
  })
})
