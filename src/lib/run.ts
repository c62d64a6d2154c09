import { type Action, tryParseAction } from './action'
import type { CatalogClient } from './api'
import { Channel } from './channel'
import { DownloadTask, type PreparationUnit, type TransferUnit } from './dispatch'
import type { TrackDownloader } from './downloader'
import { errorMessage } from './errors'
import type { Logger } from './log'
import { runPool, type PoolStats } from './pool'
import type { ProgressSink } from './progress'
import type { AppConfig } from './types'

export type TrackStatus = 'completed' | 'skipped' | 'failed'

export interface TrackOutcome {
  trackId: string
  status: TrackStatus
  error?: string
}

export interface RunSummary {
  completed: number
  skipped: number
  failed: number
  unresolved: number
  dispatchFailures: number
  outcomes: TrackOutcome[]
  preparation: PoolStats
  transfer: PoolStats
  durationMs: number
}

export type RunSettings = Pick<AppConfig, 'workers' | 'downloads' | 'downloadPath' | 'includeSingles'>

export interface RunDependencies {
  client: CatalogClient
  downloader: Pick<TrackDownloader, 'download'>
  progress: ProgressSink
  logger: Logger
  settings: RunSettings
  env?: NodeJS.ProcessEnv
}

export async function runDownloads(references: string[], deps: RunDependencies): Promise<RunSummary> {
  const started = Date.now()
  const { logger, settings } = deps

  const actions: Action[] = []
  let unresolved = 0
  for (const reference of references) {
    const action = tryParseAction(reference)
    if (!action) {
      unresolved += 1
      logger.error(`unable to resolve reference "${reference}"`)
      continue
    }
    actions.push(action)
  }

  // The transfer channel holds both stages' worth of units, so a saturated preparation stage
  // can always hand off while the transfer stage is saturated too.
  const preparation = new Channel<PreparationUnit>(settings.workers)
  const transfer = new Channel<TransferUnit>(settings.workers + settings.downloads)

  const task = new DownloadTask({
    client: deps.client,
    downloader: deps.downloader,
    preparation,
    transfer,
    progress: deps.progress,
    logger,
    downloadPath: settings.downloadPath,
    includeSingles: settings.includeSingles,
    env: deps.env,
  })

  const outcomes: TrackOutcome[] = []
  const fail = (trackId: string, error: Error) => {
    logger.error(error.message)
    outcomes.push({ trackId, status: 'failed', error: error.message })
  }

  let dispatchFailures = 0
  const dispatching = Promise.all(
    actions.map(action =>
      task.dispatch(action).then(
        count => logger.debug(`${action.kind} ${action.id}: ${count} track(s) queued`),
        error => {
          dispatchFailures += 1
          logger.error(errorMessage(error))
        },
      ),
    ),
  ).finally(() => preparation.close())

  const preparing = runPool(settings.workers, preparation, result => {
    if (!result.ok) {
      fail(result.key, result.error)
    }
  }).finally(() => transfer.close())

  const transferring = runPool(settings.downloads, transfer, result => {
    if (result.ok) {
      outcomes.push({ trackId: result.key, status: result.value })
    } else {
      fail(result.key, result.error)
    }
  })

  const [, preparationStats, transferStats] = await Promise.all([dispatching, preparing, transferring])

  return {
    completed: count(outcomes, 'completed'),
    skipped: count(outcomes, 'skipped'),
    failed: count(outcomes, 'failed'),
    unresolved,
    dispatchFailures,
    outcomes,
    preparation: preparationStats,
    transfer: transferStats,
    durationMs: Date.now() - started,
  }
}

function count(outcomes: TrackOutcome[], status: TrackStatus): number {
  return outcomes.filter(o => o.status === status).length
}
