#!/usr/bin/env tsx
import { ApiClient, type SearchKind } from './lib/api'
import { configFilePath, loadConfigFile, parseCommandLine, parseConfig, printHelp } from './lib/config'
import { TrackDownloader } from './lib/downloader'
import { errorMessage } from './lib/errors'
import { FfmpegTagWriter, ensureFFmpeg } from './lib/ffmpeg'
import { searchLine } from './lib/format'
import { createLogger } from './lib/log'
import { createProgress } from './lib/progress'
import { runDownloads } from './lib/run'
import type { AppConfig } from './lib/types'

const SEARCH_KINDS: readonly SearchKind[] = ['track', 'album', 'artist']

function logInfo(message: string): void {
  process.stderr.write(`${message}\n`)
}

async function main() {
  const cli = parseCommandLine(process.argv.slice(2))
  if (cli.command === 'help') {
    printHelp()
    return
  }

  const file = await loadConfigFile(cli.flags.get('--config') ?? configFilePath())
  const cfg = parseConfig(cli.flags, file)
  if (!cfg.accessToken) {
    throw new Error(`no access token configured; set TDL_ACCESS_TOKEN or accessToken in ${configFilePath()}`)
  }

  const client = new ApiClient({
    accessToken: cfg.accessToken,
    countryCode: cfg.countryCode,
    audioQuality: cfg.audioQuality,
    timeoutMs: cfg.httpTimeoutMs,
  })

  if (cli.command === 'search') {
    await search(client, cli.positionals, cli.flags)
    return
  }

  if (cli.positionals.length === 0) {
    throw new Error('get needs at least one reference')
  }
  await download(cfg, client, cli.positionals)
}

async function download(cfg: AppConfig, client: ApiClient, references: string[]): Promise<void> {
  await ensureFFmpeg()

  const progress = createProgress(cfg.showProgress, cfg.progressRefreshRate)
  const logger = createLogger(cfg.logLevel, progress.enabled ? line => progress.println(line) : undefined)
  const downloader = new TrackDownloader({
    client,
    tagWriter: new FfmpegTagWriter(),
    progress,
    logger,
    downloadCover: cfg.downloadCover,
  })

  const summary = await runDownloads(references, {
    client,
    downloader,
    progress,
    logger,
    settings: cfg,
  }).finally(() => progress.stop())

  const line = `completed=${summary.completed}, skipped=${summary.skipped}, failed=${summary.failed}, unresolved=${summary.unresolved}`
  if (summary.failed > 0 || summary.unresolved > 0 || summary.dispatchFailures > 0) {
    logInfo(`Finished with failures. ${line}`)
  } else {
    logInfo(`All tracks processed. ${line}`)
  }
}

async function search(client: ApiClient, positionals: string[], flags: Map<string, string>): Promise<void> {
  const query = positionals.join(' ').trim()
  if (!query) {
    throw new Error('search needs a query')
  }
  const rawFilter = flags.get('--filter') ?? 'track'
  const kind = SEARCH_KINDS.find(k => k === rawFilter)
  if (!kind) {
    throw new Error(`invalid --filter value: ${rawFilter} (expected track, album or artist)`)
  }
  const max = Number(flags.get('--max') ?? '10')
  if (!Number.isInteger(max) || max < 1) {
    throw new Error(`invalid --max value: ${flags.get('--max')}`)
  }

  const lines: string[] = []
  switch (kind) {
    case 'track':
      for (const item of await client.search('track', query, max)) lines.push(searchLine({ kind, item }))
      break
    case 'album':
      for (const item of await client.search('album', query, max)) lines.push(searchLine({ kind, item }))
      break
    case 'artist':
      for (const item of await client.search('artist', query, max)) lines.push(searchLine({ kind, item }))
      break
  }
  console.log(lines.length > 0 ? lines.join('\n') : 'No results.')
}

main().catch(error => {
  console.error(`Error: ${errorMessage(error)}`)
  process.exitCode = 1
})
