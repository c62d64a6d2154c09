import { spawn } from 'node:child_process'
import { rename, rm, writeFile } from 'node:fs/promises'
import { extname } from 'node:path'
import { DownloadError, errorMessage } from './errors'
import type { CoverArt } from './types'

export interface TagFields {
  title: string
  trackNumber: number
  artist: string
  album: string
  copyright: string
  isrc: string
}

export interface TagWriter {
  writeTags(filePath: string, fields: TagFields, cover?: CoverArt): Promise<void>
}

export async function ensureFFmpeg(): Promise<void> {
  try {
    await runFFmpeg(['-version'], 'ffmpeg check failed')
  } catch (error) {
    throw new Error(`ffmpeg is required but unavailable in PATH (${errorMessage(error)})`)
  }
}

export function coverExtension(contentType: string): string {
  return contentType.toLowerCase().includes('png') ? '.png' : '.jpg'
}

export function buildTagArgs(filePath: string, outPath: string, fields: TagFields, coverPath?: string): string[] {
  const args: string[] = ['-y', '-i', filePath]
  if (coverPath) {
    args.push('-i', coverPath)
  }

  args.push('-map', '0:a')
  if (coverPath) {
    args.push('-map', '1:v')
  }
  args.push('-c', 'copy')
  if (coverPath) {
    args.push('-disposition:v', 'attached_pic', '-metadata:s:v', 'title=Cover', '-metadata:s:v', 'comment=Cover (front)')
  }
  if (extname(filePath).toLowerCase() === '.m4a') {
    args.push('-movflags', 'use_metadata_tags')
  }

  args.push(
    '-metadata',
    `title=${fields.title}`,
    '-metadata',
    `track=${fields.trackNumber}`,
    '-metadata',
    `artist=${fields.artist}`,
    '-metadata',
    `album=${fields.album}`,
    '-metadata',
    `copyright=${fields.copyright}`,
    '-metadata',
    `ISRC=${fields.isrc}`,
    outPath,
  )
  return args
}

export class FfmpegTagWriter implements TagWriter {
  async writeTags(filePath: string, fields: TagFields, cover?: CoverArt): Promise<void> {
    const ext = extname(filePath)
    const tmpPath = `${filePath}.tmp-metadata${ext}`
    const coverPath = cover ? `${filePath}.cover${coverExtension(cover.contentType)}` : undefined

    try {
      if (cover && coverPath) {
        await writeFile(coverPath, cover.data)
      }
      await runFFmpeg(buildTagArgs(filePath, tmpPath, fields, coverPath), `metadata write failed for ${filePath}`)
      await rename(tmpPath, filePath)
    } catch (error) {
      await rm(tmpPath, { force: true })
      throw new DownloadError('TAG_WRITE_FAILURE', errorMessage(error), { cause: error })
    } finally {
      if (coverPath) {
        await rm(coverPath, { force: true })
      }
    }
  }
}

function runFFmpeg(args: string[], errorPrefix: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const proc = spawn('ffmpeg', args, { stdio: ['ignore', 'ignore', 'pipe'] })
    let stderr = ''
    proc.stderr.setEncoding('utf8')
    proc.stderr.on('data', (chunk: string) => {
      stderr += chunk
    })
    proc.on('error', reject)
    proc.on('close', code => {
      if (code !== 0) {
        reject(new Error(`${errorPrefix}: ${stderr.trim()}`))
        return
      }
      resolve()
    })
  })
}
