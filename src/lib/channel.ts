import { DownloadError } from './errors'

interface PendingSend<T> {
  value: T
  resolve: () => void
  reject: (error: Error) => void
}

// Bounded multi-producer/multi-consumer queue. send() suspends while the buffer is full,
// recv() suspends while it is empty and resolves undefined once closed and drained.
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = []
  private readonly senders: PendingSend<T>[] = []
  private readonly receivers: Array<(value: T | undefined) => void> = []
  private closed = false

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`channel capacity must be a positive integer, got ${capacity}`)
    }
  }

  get size(): number {
    return this.buffer.length
  }

  get pendingSends(): number {
    return this.senders.length
  }

  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(closedError())
    }

    const receiver = this.receivers.shift()
    if (receiver) {
      receiver(value)
      return Promise.resolve()
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value)
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject })
    })
  }

  recv(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift()
      const sender = this.senders.shift()
      if (sender) {
        this.buffer.push(sender.value)
        sender.resolve()
      }
      return Promise.resolve(value)
    }

    if (this.closed) {
      return Promise.resolve(undefined)
    }

    return new Promise(resolve => {
      this.receivers.push(resolve)
    })
  }

  // Buffered values stay receivable; blocked and future senders fail with CHANNEL_CLOSED.
  close(): void {
    if (this.closed) {
      return
    }
    this.closed = true
    for (const sender of this.senders.splice(0)) {
      sender.reject(closedError())
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined)
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const value = await this.recv()
      if (value === undefined) {
        return
      }
      yield value
    }
  }
}

function closedError(): DownloadError {
  return new DownloadError('CHANNEL_CLOSED', 'channel closed')
}
