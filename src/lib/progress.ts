import cliProgress from 'cli-progress'
import { formatBytes } from './format'

export interface TrackProgress {
  advance(position: number): void
  message(text: string): void
  finish(message: string): void
}

export interface ProgressSink {
  readonly enabled: boolean
  start(key: string, totalBytes: number, label: string): TrackProgress
  println(line: string): void
  stop(): void
}

export interface BarHandle {
  update(value: number, payload?: Record<string, unknown>): void
}

export interface BarHost {
  create(total: number, startValue: number, payload?: Record<string, unknown>): BarHandle
  remove(bar: BarHandle): boolean
  log(data: string): void
  stop(): void
}

const NOOP_TRACK: TrackProgress = {
  advance: () => {},
  message: () => {},
  finish: () => {},
}

export class NoopProgress implements ProgressSink {
  readonly enabled = false

  start(): TrackProgress {
    return NOOP_TRACK
  }

  println(): void {}

  stop(): void {}
}

// One bar per in-flight track, keyed by track id. Starting a key that is already on screen replaces its bar.
export class MultiBarProgress implements ProgressSink {
  readonly enabled = true
  private readonly bars = new Map<string, BarHandle>()

  constructor(
    private readonly host: BarHost,
    private readonly writeLine: (line: string) => void,
  ) {}

  start(key: string, totalBytes: number, label: string): TrackProgress {
    this.drop(key)
    const bar = this.host.create(totalBytes, 0, { label, transferred: formatBytes(0), size: formatBytes(totalBytes) })
    this.bars.set(key, bar)

    let position = 0
    let done = false
    return {
      advance: value => {
        if (done) return
        position = Math.min(Math.max(position, value), totalBytes)
        bar.update(position, { transferred: formatBytes(position) })
      },
      message: text => {
        if (done) return
        bar.update(position, { label: text })
      },
      finish: message => {
        if (done) return
        done = true
        if (this.bars.get(key) === bar) {
          this.drop(key)
        }
        this.println(message)
      },
    }
  }

  println(line: string): void {
    // MultiBar only flushes its log buffer while bars are drawn.
    if (this.bars.size === 0) {
      this.writeLine(line)
      return
    }
    this.host.log(`${line}\n`)
  }

  stop(): void {
    for (const key of Array.from(this.bars.keys())) {
      this.drop(key)
    }
    this.host.stop()
  }

  private drop(key: string): void {
    const bar = this.bars.get(key)
    if (bar) {
      this.host.remove(bar)
      this.bars.delete(key)
    }
  }
}

export function createProgress(
  enabled: boolean,
  refreshRate: number,
  stream: NodeJS.WriteStream = process.stderr,
): ProgressSink {
  if (!enabled || !stream.isTTY) {
    return new NoopProgress()
  }

  const host = new cliProgress.MultiBar(
    {
      format: '{bar} {percentage}% | {transferred}/{size} | {label}',
      fps: Math.max(1, refreshRate),
      stream,
      hideCursor: true,
      clearOnComplete: true,
      autopadding: true,
    },
    cliProgress.Presets.shades_classic,
  )
  return new MultiBarProgress(host, line => stream.write(`${line}\n`))
}
