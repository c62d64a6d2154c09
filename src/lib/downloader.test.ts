import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { TrackDownloader, pathExists } from './downloader'
import {
  InMemoryCatalog,
  RecordingProgress,
  RecordingTagWriter,
  fakeStreamServer,
  makeAlbum,
  makeArtist,
  makeTrack,
  openBody,
  recordingLogger,
  type FakeStreamServer,
} from './testing/fakes'

const CHUNKS = [new Uint8Array([1, 2, 3]), new Uint8Array([4, 5]), new Uint8Array([6])]

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'tdl-download-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

function setup(server: Pick<FakeStreamServer, 'fetch'>, downloadCover = true) {
  const artist = makeArtist(1, 'Test Artist')
  const album = makeAlbum(10, artist)
  const track = makeTrack(100, album, artist, { title: 'Song' })
  const catalog = new InMemoryCatalog()
  const tags = new RecordingTagWriter()
  const progress = new RecordingProgress()
  const downloader = new TrackDownloader({
    client: catalog,
    tagWriter: tags,
    progress,
    logger: recordingLogger(),
    downloadCover,
    fetch: server.fetch,
    bufferBytes: 4,
  })
  const base = join(dir, 'Test Artist', 'Album 10', '1 - Song')
  return { track, catalog, tags, progress, downloader, base }
}

describe('TrackDownloader', () => {
  it('streams the track to disk, then tags it', async () => {
    const server = fakeStreamServer(() => CHUNKS)
    const { track, catalog, tags, progress, downloader, base } = setup(server)

    expect(await downloader.download(track, base)).toBe('completed')

    const path = `${base}.flac`
    expect(Array.from(await readFile(path))).toEqual([1, 2, 3, 4, 5, 6])
    expect(await pathExists(`${path}.part`)).toBe(false)
    expect(server.requests).toEqual(['https://stream.test/100'])
    expect(progress.started).toEqual(['100'])
    expect(progress.positions.get('100')).toEqual([3, 5, 6])
    expect(progress.messages).toEqual(['Writing to Disk | Test Artist - Song', 'Writing metadata | Test Artist - Song'])
    expect(progress.lines).toHaveLength(1)
    expect(progress.lines[0]).toMatch(/^Download Complete \| Test Artist - Song \(6 B, /)

    expect(tags.writes).toHaveLength(1)
    expect(tags.writes[0]).toMatchObject({
      path,
      fields: {
        title: 'Song',
        trackNumber: 1,
        artist: 'Test Artist',
        album: 'Album 10',
        copyright: '(P) Test Records',
        isrc: 'ISRC100',
      },
      cover: { contentType: 'image/jpeg' },
    })
    expect(catalog.calls).toEqual(['manifest:100', 'cover:cover-10'])
  })

  it('skips an existing file without opening the stream', async () => {
    const server = fakeStreamServer(() => CHUNKS)
    const { track, tags, progress, downloader, base } = setup(server)
    await mkdir(dirname(base), { recursive: true })
    await writeFile(`${base}.flac`, 'old')

    expect(await downloader.download(track, base)).toBe('skipped')

    expect(server.requests).toEqual([])
    expect(server.bytesServed()).toBe(0)
    expect(progress.lines).toEqual(['File Exists | Test Artist - Song'])
    expect(progress.started).toEqual([])
    expect(tags.writes).toEqual([])
    expect(await readFile(`${base}.flac`, 'utf8')).toBe('old')
  })

  it('fails with MISSING_CONTENT_LENGTH when the length is not declared', async () => {
    const server = fakeStreamServer(() => CHUNKS, { contentLength: false })
    const { track, progress, downloader, base } = setup(server)

    await expect(downloader.download(track, base)).rejects.toMatchObject({
      type: 'MISSING_CONTENT_LENGTH',
      message: 'failed to get content length for Test Artist - Song',
    })
    expect(progress.started).toEqual([])
    expect(await pathExists(`${base}.flac`)).toBe(false)
  })

  it('fails with STREAM_IO_FAILURE on an error status', async () => {
    const server = fakeStreamServer(() => CHUNKS, { status: 503 })
    const { track, downloader, base } = setup(server)

    await expect(downloader.download(track, base)).rejects.toMatchObject({
      type: 'STREAM_IO_FAILURE',
      message: 'download Test Artist - Song failed with status 503',
    })
  })

  it('removes the partial file when the stream ends early', async () => {
    const server = fakeStreamServer(() => CHUNKS, { contentLength: 10 })
    const { track, tags, progress, downloader, base } = setup(server)

    await expect(downloader.download(track, base)).rejects.toMatchObject({
      type: 'STREAM_IO_FAILURE',
      message: 'download Test Artist - Song ended after 6 of 10 bytes',
    })
    expect(await pathExists(`${base}.flac.part`)).toBe(false)
    expect(await pathExists(`${base}.flac`)).toBe(false)
    expect(progress.lines).toEqual(['Download Failed | Test Artist - Song'])
    expect(tags.writes).toEqual([])
  })

  it('releases the body of an error response', async () => {
    const { body, cancelled } = openBody()
    const { track, downloader, base } = setup({ fetch: async () => new Response(body, { status: 503 }) })

    await expect(downloader.download(track, base)).rejects.toMatchObject({ type: 'STREAM_IO_FAILURE' })
    expect(cancelled()).toBe(true)
  })

  it('releases the body when the length is missing', async () => {
    const { body, cancelled } = openBody()
    const { track, downloader, base } = setup({ fetch: async () => new Response(body) })

    await expect(downloader.download(track, base)).rejects.toMatchObject({ type: 'MISSING_CONTENT_LENGTH' })
    expect(cancelled()).toBe(true)
  })

  it('releases the stream when the destination cannot be written', async () => {
    const { body, cancelled } = openBody()
    const { track, progress, downloader } = setup({
      fetch: async () => new Response(body, { headers: { 'content-length': '10' } }),
    })
    await writeFile(join(dir, 'blocker'), 'not a directory')
    const base = join(dir, 'blocker', '1 - Song')

    await expect(downloader.download(track, base)).rejects.toMatchObject({ type: 'STREAM_IO_FAILURE' })
    expect(cancelled()).toBe(true)
    expect(progress.lines).toEqual(['Download Failed | Test Artist - Song'])
  })

  it('keeps the audio file when tagging fails', async () => {
    const server = fakeStreamServer(() => CHUNKS)
    const { track, tags, progress, downloader, base } = setup(server)
    tags.failWith = new Error('tagger exploded')

    await expect(downloader.download(track, base)).rejects.toMatchObject({
      type: 'TAG_WRITE_FAILURE',
      message: 'write metadata for Test Artist - Song: tagger exploded',
    })
    expect(Array.from(await readFile(`${base}.flac`))).toEqual([1, 2, 3, 4, 5, 6])
    expect(progress.lines).toEqual(['Metadata Failed | Test Artist - Song'])
  })

  it('reports MANIFEST_UNAVAILABLE without touching the stream', async () => {
    const server = fakeStreamServer(() => CHUNKS)
    const { track, catalog, downloader, base } = setup(server)
    catalog.failing.add('manifest:100')

    await expect(downloader.download(track, base)).rejects.toMatchObject({
      type: 'MANIFEST_UNAVAILABLE',
      message: 'stream manifest for Test Artist - Song: manifest 100 unavailable',
    })
    expect(server.requests).toEqual([])
  })

  it('leaves the cover out when cover download is off', async () => {
    const server = fakeStreamServer(() => CHUNKS)
    const { track, catalog, tags, downloader, base } = setup(server, false)

    await downloader.download(track, base)

    expect(tags.writes[0]?.cover).toBeUndefined()
    expect(catalog.calls).toEqual(['manifest:100'])
  })
})
