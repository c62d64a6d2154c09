import { open, type FileHandle } from 'node:fs/promises'

export const WRITE_BUFFER_BYTES = 1024 * 1024

// Collects chunks in memory and hands them to the file in writes of at least `capacity` bytes.
export class BufferedFileWriter {
  private chunks: Uint8Array[] = []
  private pending = 0
  private written = 0

  private constructor(
    private readonly handle: FileHandle,
    private readonly capacity: number,
  ) {}

  static async open(path: string, capacity = WRITE_BUFFER_BYTES): Promise<BufferedFileWriter> {
    const handle = await open(path, 'w')
    return new BufferedFileWriter(handle, Math.max(1, capacity))
  }

  get bytesWritten(): number {
    return this.written
  }

  async write(chunk: Uint8Array): Promise<void> {
    this.chunks.push(chunk)
    this.pending += chunk.byteLength
    if (this.pending >= this.capacity) {
      await this.flush()
    }
  }

  async flush(): Promise<void> {
    if (this.pending === 0) {
      return
    }
    const data = Buffer.concat(this.chunks, this.pending)
    this.chunks = []
    this.pending = 0
    let offset = 0
    while (offset < data.byteLength) {
      const { bytesWritten } = await this.handle.write(data, offset, data.byteLength - offset, this.written + offset)
      offset += bytesWritten
    }
    this.written += data.byteLength
  }

  async close(): Promise<void> {
    try {
      await this.flush()
      await this.handle.sync()
    } finally {
      await this.handle.close()
    }
  }
}
