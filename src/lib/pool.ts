import type { Channel } from './channel'

export interface WorkUnit<T> {
  readonly key: string
  run(): Promise<T>
}

export type UnitResult<T> = { key: string; ok: true; value: T } | { key: string; ok: false; error: Error }

export interface PoolStats {
  succeeded: number
  failed: number
  peakInFlight: number
}

// Drains the channel, keeping at most `workers` units running. A unit is only received once a slot is free,
// so a saturated pool leaves the channel to fill up and block its producers. Failed units are reported
// and never stop the pool.
export async function runPool<T>(
  workers: number,
  channel: Channel<WorkUnit<T>>,
  onSettled?: (result: UnitResult<T>) => void,
): Promise<PoolStats> {
  const size = Math.max(1, workers)
  const inFlight = new Set<Promise<void>>()
  const stats: PoolStats = { succeeded: 0, failed: 0, peakInFlight: 0 }

  const settle = (result: UnitResult<T>) => {
    if (result.ok) {
      stats.succeeded += 1
    } else {
      stats.failed += 1
    }
    onSettled?.(result)
  }

  const spawn = (unit: WorkUnit<T>) => {
    const task: Promise<void> = Promise.resolve()
      .then(() => unit.run())
      .then(
        value => settle({ key: unit.key, ok: true, value }),
        error => settle({ key: unit.key, ok: false, error: toError(error) }),
      )
      .finally(() => {
        inFlight.delete(task)
      })
    inFlight.add(task)
    stats.peakInFlight = Math.max(stats.peakInFlight, inFlight.size)
  }

  while (true) {
    while (inFlight.size >= size) {
      await Promise.race(inFlight)
    }
    const unit = await channel.recv()
    if (unit === undefined) {
      break
    }
    spawn(unit)
  }

  await Promise.all(inFlight)
  return stats
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
