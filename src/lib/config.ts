import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { errorMessage } from './errors'
import { isLogLevel } from './log'
import { AUDIO_QUALITIES, type AppConfig, type AudioQuality } from './types'

export const DEFAULT_DOWNLOAD_PATH =
  '$HOME/Music/{artist_name}/{album_name} [{album_id}] [{album_release_year}]/{track_num} - {track_name}'

export const DEFAULT_CONFIG: AppConfig = {
  downloadPath: DEFAULT_DOWNLOAD_PATH,
  audioQuality: 'HI_RES',
  showProgress: true,
  progressRefreshRate: 5,
  includeSingles: true,
  downloadCover: true,
  downloads: 3,
  workers: 1,
  httpTimeoutMs: 2 * 60 * 1000,
  accessToken: '',
  countryCode: 'US',
  logLevel: 'warn',
}

const LIMITS = {
  downloads: [1, 10],
  workers: [1, 255],
  progressRefreshRate: [1, 255],
} as const

export type Command = 'get' | 'search' | 'help'

export interface CommandLine {
  command: Command
  positionals: string[]
  flags: Map<string, string>
}

// Flags that take a value, with their short aliases.
const VALUE_FLAGS: Record<string, string> = {
  '--downloads': '--downloads',
  '-d': '--downloads',
  '--workers': '--workers',
  '-w': '--workers',
  '--quality': '--quality',
  '-q': '--quality',
  '--show-progress': '--show-progress',
  '-p': '--show-progress',
  '--include-singles': '--include-singles',
  '-s': '--include-singles',
  '--output': '--output',
  '-o': '--output',
  '--http-timeout': '--http-timeout',
  '--config': '--config',
  '--filter': '--filter',
  '-f': '--filter',
  '--max': '--max',
  '-m': '--max',
}

export function parseCommandLine(args: string[]): CommandLine {
  const flags = new Map<string, string>()
  const positionals: string[] = []

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i]
    if (arg === '--help' || arg === '-h') {
      return { command: 'help', positionals: [], flags }
    }
    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg)
      continue
    }

    const eq = arg.indexOf('=')
    const name = eq >= 0 ? arg.slice(0, eq) : arg
    const key = VALUE_FLAGS[name]
    if (key === undefined) {
      throw new Error(`unknown flag: ${name}`)
    }
    if (eq >= 0) {
      flags.set(key, arg.slice(eq + 1))
      continue
    }
    const value = args[i + 1]
    if (value === undefined) {
      throw new Error(`missing value for ${name}`)
    }
    flags.set(key, value)
    i += 1
  }

  const [command, ...rest] = positionals
  if (command === undefined) {
    return { command: 'help', positionals: [], flags }
  }
  if (command !== 'get' && command !== 'search') {
    throw new Error(`unknown command: ${command}`)
  }
  return { command, positionals: rest, flags }
}

export function parseBool(value: string): boolean {
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false
  throw new Error(`invalid boolean: ${value}`)
}

export function parseDurationToMs(raw: string): number {
  const value = raw.trim().toLowerCase()
  if (!value) {
    throw new Error('empty duration')
  }
  const m = value.match(/^(\d+)(ms|s|m|h)$/)
  if (!m) {
    throw new Error(`invalid duration: ${raw}`)
  }
  const amount = Number(m[1])
  const unit = m[2]
  if (unit === 'ms') return amount
  if (unit === 's') return amount * 1000
  if (unit === 'm') return amount * 60 * 1000
  return amount * 60 * 60 * 1000
}

function parseRanged(name: keyof typeof LIMITS, raw: string | number): number {
  const [min, max] = LIMITS[name]
  const value = typeof raw === 'number' ? raw : Number(raw.trim())
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`invalid ${name} value: ${raw} (expected ${min}-${max})`)
  }
  return value
}

function parseQuality(raw: string): AudioQuality {
  const value = raw.trim().toUpperCase()
  const quality = AUDIO_QUALITIES.find(q => q === value)
  if (!quality) {
    throw new Error(`invalid quality: ${raw} (expected one of ${AUDIO_QUALITIES.join(', ')})`)
  }
  return quality
}

export function configDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME && env.XDG_CONFIG_HOME.trim() !== '' ? env.XDG_CONFIG_HOME : join(env.HOME ?? homedir(), '.config')
  return join(base, 'tdl')
}

export function configFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return join(configDir(env), 'config.json')
}

// Missing file means defaults; a file that exists must be valid.
export async function loadConfigFile(path: string): Promise<Partial<AppConfig>> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (isNotFound(error)) {
      return {}
    }
    throw error
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new Error(`invalid config file ${path}: ${errorMessage(error)}`)
  }
  return validateConfigFile(raw, path)
}

export function validateConfigFile(raw: unknown, source = 'config'): Partial<AppConfig> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`${source}: expected a JSON object`)
  }
  const input = new Map(Object.entries(raw))
  const out: Partial<AppConfig> = {}

  const str = (key: string): string | undefined => {
    const value = input.get(key)
    if (value === undefined) return undefined
    if (typeof value !== 'string') throw new Error(`${source}: ${key} must be a string`)
    return value
  }
  const bool = (key: string): boolean | undefined => {
    const value = input.get(key)
    if (value === undefined) return undefined
    if (typeof value !== 'boolean') throw new Error(`${source}: ${key} must be a boolean`)
    return value
  }
  const num = (key: string): number | undefined => {
    const value = input.get(key)
    if (value === undefined) return undefined
    if (typeof value !== 'number') throw new Error(`${source}: ${key} must be a number`)
    return value
  }

  const downloadPath = str('downloadPath')
  if (downloadPath !== undefined) out.downloadPath = downloadPath
  const quality = str('audioQuality')
  if (quality !== undefined) out.audioQuality = parseQuality(quality)
  const showProgress = bool('showProgress')
  if (showProgress !== undefined) out.showProgress = showProgress
  const includeSingles = bool('includeSingles')
  if (includeSingles !== undefined) out.includeSingles = includeSingles
  const downloadCover = bool('downloadCover')
  if (downloadCover !== undefined) out.downloadCover = downloadCover
  const downloads = num('downloads')
  if (downloads !== undefined) out.downloads = parseRanged('downloads', downloads)
  const workers = num('workers')
  if (workers !== undefined) out.workers = parseRanged('workers', workers)
  const refresh = num('progressRefreshRate')
  if (refresh !== undefined) out.progressRefreshRate = parseRanged('progressRefreshRate', refresh)
  const timeout = str('httpTimeout')
  if (timeout !== undefined) out.httpTimeoutMs = parseDurationToMs(timeout)
  const accessToken = str('accessToken')
  if (accessToken !== undefined) out.accessToken = accessToken
  const countryCode = str('countryCode')
  if (countryCode !== undefined) out.countryCode = countryCode
  const logLevel = str('logLevel')
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) throw new Error(`${source}: invalid logLevel ${logLevel}`)
    out.logLevel = logLevel
  }
  return out
}

// Precedence: defaults < config file < environment < flags.
export function parseConfig(
  flags: Map<string, string>,
  file: Partial<AppConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const cfg: AppConfig = { ...DEFAULT_CONFIG, ...file }

  if (env.TDL_ACCESS_TOKEN) cfg.accessToken = env.TDL_ACCESS_TOKEN
  if (env.TDL_COUNTRY_CODE) cfg.countryCode = env.TDL_COUNTRY_CODE
  if (env.TDL_LOG) {
    if (!isLogLevel(env.TDL_LOG)) throw new Error(`invalid TDL_LOG value: ${env.TDL_LOG}`)
    cfg.logLevel = env.TDL_LOG
  }

  const downloads = flags.get('--downloads')
  if (downloads !== undefined) cfg.downloads = parseRanged('downloads', downloads)
  const workers = flags.get('--workers')
  if (workers !== undefined) cfg.workers = parseRanged('workers', workers)
  const quality = flags.get('--quality')
  if (quality !== undefined) cfg.audioQuality = parseQuality(quality)
  const progress = flags.get('--show-progress')
  if (progress !== undefined) cfg.showProgress = parseBool(progress)
  const singles = flags.get('--include-singles')
  if (singles !== undefined) cfg.includeSingles = parseBool(singles)
  const output = flags.get('--output')
  if (output !== undefined && output.trim() !== '') cfg.downloadPath = output
  const timeout = flags.get('--http-timeout')
  if (timeout !== undefined) cfg.httpTimeoutMs = parseDurationToMs(timeout)

  return cfg
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export function printHelp(): void {
  const lines = [
    'tdl: download tracks, albums, artists and playlists from the TIDAL catalog',
    '',
    'Usage:',
    '  tdl get <reference...> [flags]',
    '  tdl search <query> [--filter track|album|artist] [--max n]',
    '',
    'References: catalog URLs (https://tidal.com/browse/album/123) or kind:id (track:123, playlist:<uuid>)',
    '',
    'Flags:',
    '  -d, --downloads <n>          Maximum concurrent downloads, 1-10 (default: 3)',
    '  -w, --workers <n>            Maximum concurrent API requests, 1-255 (default: 1)',
    '  -q, --quality <q>            LOW, HIGH, LOSSLESS or HI_RES (default: HI_RES)',
    '  -p, --show-progress <bool>   Display progress bars (default: true)',
    '  -s, --include-singles <bool> Include EPs and singles for artists (default: true)',
    '  -o, --output <template>      Download path template',
    '      --http-timeout <dur>     HTTP timeout (default: 2m)',
    '      --config <path>          Config file (default: $XDG_CONFIG_HOME/tdl/config.json)',
    '',
    'Path tokens: {artist_name} {artist_id} {album_id} {album_name} {album_duration} {album_tracks}',
    '  {album_explicit} {album_quality} {album_release} {album_release_year} {track_id} {track_name}',
    '  {track_duration} {track_num} {track_volume} {track_isrc} {track_explicit} {track_quality}',
    '',
    'Environment: TDL_ACCESS_TOKEN, TDL_COUNTRY_CODE, TDL_LOG (debug|info|warn|error|silent)',
    'Duration format: 500ms, 10s, 2m, 1h',
  ]
  console.log(lines.join('\n'))
}
