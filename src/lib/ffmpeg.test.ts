import { describe, expect, it } from 'vitest'
import { buildTagArgs, coverExtension, type TagFields } from './ffmpeg'

const fields: TagFields = {
  title: 'Song',
  trackNumber: 4,
  artist: 'Band',
  album: 'Record',
  copyright: '(P) Test Records',
  isrc: 'ISRC1',
}

const METADATA = [
  '-metadata',
  'title=Song',
  '-metadata',
  'track=4',
  '-metadata',
  'artist=Band',
  '-metadata',
  'album=Record',
  '-metadata',
  'copyright=(P) Test Records',
  '-metadata',
  'ISRC=ISRC1',
]

describe('buildTagArgs', () => {
  it('copies the audio stream and sets the tags', () => {
    expect(buildTagArgs('/m/a.flac', '/m/a.tmp.flac', fields)).toEqual([
      '-y',
      '-i',
      '/m/a.flac',
      '-map',
      '0:a',
      '-c',
      'copy',
      ...METADATA,
      '/m/a.tmp.flac',
    ])
  })

  it('attaches a cover and keeps m4a tags', () => {
    expect(buildTagArgs('/m/a.m4a', '/m/out.m4a', fields, '/m/a.m4a.cover.jpg')).toEqual([
      '-y',
      '-i',
      '/m/a.m4a',
      '-i',
      '/m/a.m4a.cover.jpg',
      '-map',
      '0:a',
      '-map',
      '1:v',
      '-c',
      'copy',
      '-disposition:v',
      'attached_pic',
      '-metadata:s:v',
      'title=Cover',
      '-metadata:s:v',
      'comment=Cover (front)',
      '-movflags',
      'use_metadata_tags',
      ...METADATA,
      '/m/out.m4a',
    ])
  })
})

describe('coverExtension', () => {
  it('follows the image type', () => {
    expect(coverExtension('image/png')).toBe('.png')
    expect(coverExtension('image/jpeg')).toBe('.jpg')
  })
})
