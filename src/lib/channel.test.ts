import { describe, expect, it } from 'vitest'
import { Channel } from './channel'

const tick = () => new Promise(resolve => setImmediate(resolve))

describe('Channel', () => {
  it('delivers values in order', async () => {
    const ch = new Channel<number>(2)
    await ch.send(1)
    await ch.send(2)
    expect(await ch.recv()).toBe(1)
    expect(await ch.recv()).toBe(2)
  })

  it('suspends senders while full and resumes them as values are received', async () => {
    const ch = new Channel<number>(1)
    await ch.send(1)

    let sent = false
    const pending = ch.send(2).then(() => {
      sent = true
    })
    await tick()
    expect(sent).toBe(false)
    expect(ch.size).toBe(1)
    expect(ch.pendingSends).toBe(1)

    expect(await ch.recv()).toBe(1)
    await pending
    expect(sent).toBe(true)
    expect(await ch.recv()).toBe(2)
  })

  it('hands a value straight to a waiting receiver', async () => {
    const ch = new Channel<string>(1)
    const received = ch.recv()
    await ch.send('a')
    expect(await received).toBe('a')
    expect(ch.size).toBe(0)
  })

  it('drains buffered values after close, then yields undefined', async () => {
    const ch = new Channel<number>(3)
    await ch.send(1)
    await ch.send(2)
    ch.close()

    const seen: number[] = []
    for await (const value of ch) {
      seen.push(value)
    }
    expect(seen).toEqual([1, 2])
    expect(await ch.recv()).toBeUndefined()
  })

  it('wakes waiting receivers on close', async () => {
    const ch = new Channel<number>(1)
    const received = ch.recv()
    ch.close()
    expect(await received).toBeUndefined()
  })

  it('rejects blocked and later senders with CHANNEL_CLOSED', async () => {
    const ch = new Channel<number>(1)
    await ch.send(1)
    const blocked = ch.send(2)
    ch.close()
    await expect(blocked).rejects.toMatchObject({ type: 'CHANNEL_CLOSED' })
    await expect(ch.send(3)).rejects.toMatchObject({ type: 'CHANNEL_CLOSED' })
    expect(await ch.recv()).toBe(1)
  })

  it('requires a positive capacity', () => {
    expect(() => new Channel(0)).toThrow(RangeError)
  })
})
