/**
 * Checkpoint store
 *
 * Keeps timestamped snapshots of the working dataset in one directory so an
 * interrupted enrichment run can pick up where it stopped. Snapshot names
 * sort lexicographically by recency:
 *
 *   checkpoint-20240501T101500123Z.json
 *
 * A snapshot is written to `<name>.tmp`, flushed to disk and renamed into
 * place, so restore() never sees a partial file.
 */

import fsp from 'fs/promises'
import path from 'path'
import { CheckpointWriteError, toError } from './errors.js'
import { validateDataset } from './dataset.js'
import type { Logger } from './logger.js'
import type { CheckpointHandle, WorkingDataset } from './types.js'

const PREFIX = 'checkpoint-'
const SUFFIX = '.json'
const NAME_PATTERN = /^checkpoint-(\d{8}T\d{9}Z)\.json$/

export interface CheckpointStoreOptions {
  /** Snapshots retained after each save (default: 3) */
  keep?: number
  logger?: Logger
  /** Clock, overridable for tests */
  now?: () => number
}

/**
 * UTC timestamp to the millisecond, without separators
 */
export function formatStamp(ms: number): string {
  return new Date(ms).toISOString().replace(/[-:.]/g, '')
}

function parseStamp(stamp: string): number {
  const m = stamp.match(/^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(\d{3})Z$/)
  if (!m) return Number.NaN
  const [, y, mo, d, h, mi, s, ms] = m
  return Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s), Number(ms))
}

export class CheckpointStore {
  readonly dir: string
  readonly keep: number
  private readonly logger?: Logger
  private readonly now: () => number
  private lastStamp = 0
  private writes: Promise<unknown> = Promise.resolve()

  constructor(dir: string, options: CheckpointStoreOptions = {}) {
    this.dir = dir
    this.keep = options.keep ?? 3
    this.logger = options.logger
    this.now = options.now ?? Date.now
  }

  /**
   * Snapshot names in the directory, oldest first
   */
  async list(): Promise<string[]> {
    let files: string[]
    try {
      files = await fsp.readdir(this.dir)
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return []
      throw error
    }

    const names = files.filter(file => NAME_PATTERN.test(file)).sort()
    const newest = names[names.length - 1]
    if (newest) {
      this.lastStamp = Math.max(this.lastStamp, parseStamp(newest.slice(PREFIX.length, -SUFFIX.length)))
    }
    return names
  }

  /**
   * Most recent readable snapshot, or null when there is none
   */
  async restore(): Promise<WorkingDataset | null> {
    const names = await this.list()

    for (const name of names.reverse()) {
      const filePath = path.join(this.dir, name)
      try {
        const result = validateDataset(JSON.parse(await fsp.readFile(filePath, 'utf8')))
        if (result.ok) {
          this.logger?.info(`Restored checkpoint ${name}`, { path: filePath })
          return result.dataset
        }
        this.logger?.warn(`Skipping checkpoint ${name}: ${result.reason}`, { path: filePath })
      } catch (error) {
        this.logger?.warn(`Skipping unreadable checkpoint ${name}: ${toError(error).message}`, { path: filePath })
      }
    }

    return null
  }

  /**
   * Durably write a new snapshot, then prune to `keep` snapshots.
   *
   * The snapshot is serialized before this method returns control, so later
   * mutations of `snapshot` are not captured. Writes are queued one after
   * another.
   *
   * @throws CheckpointWriteError when the snapshot could not be written
   */
  save(snapshot: WorkingDataset): Promise<CheckpointHandle> {
    const body = JSON.stringify(snapshot)
    const write = this.writes.then(() => this.write(body))
    // keep the queue going after a failed write
    this.writes = write.catch(() => undefined)
    return write
  }

  /**
   * Delete all but the `keep` most recent snapshots
   * @returns Names of the deleted snapshots
   */
  async prune(keep: number = this.keep): Promise<string[]> {
    const names = await this.list()
    const stale = names.slice(0, Math.max(0, names.length - keep))

    for (const name of stale) {
      await fsp.rm(path.join(this.dir, name), { force: true })
    }

    if (stale.length > 0) {
      this.logger?.info(`Pruned ${stale.length} checkpoint(s)`, { removed: stale })
    }
    return stale
  }

  private async nextName(): Promise<{ name: string; savedAt: Date }> {
    await this.list()
    const ms = Math.max(this.now(), this.lastStamp + 1)
    this.lastStamp = ms
    return { name: `${PREFIX}${formatStamp(ms)}${SUFFIX}`, savedAt: new Date(ms) }
  }

  private async write(body: string): Promise<CheckpointHandle> {
    let filePath = this.dir
    let tmpPath: string | undefined

    try {
      await fsp.mkdir(this.dir, { recursive: true })
      const { name, savedAt } = await this.nextName()
      filePath = path.join(this.dir, name)
      tmpPath = `${filePath}.tmp`

      const handle = await fsp.open(tmpPath, 'w')
      try {
        await handle.writeFile(body, 'utf8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      await fsp.rename(tmpPath, filePath)

      this.logger?.info(`Saved checkpoint ${name}`, { path: filePath, bytes: Buffer.byteLength(body) })

      await this.prune().catch(pruneError => {
        this.logger?.warn(`Could not prune checkpoints: ${toError(pruneError).message}`, { dir: this.dir })
      })
      return { name, path: filePath, savedAt }
    } catch (error) {
      if (tmpPath) {
        await fsp.rm(tmpPath, { force: true }).catch(cleanupError => {
          this.logger?.warn(`Could not remove ${tmpPath}: ${toError(cleanupError).message}`)
        })
      }
      throw new CheckpointWriteError(filePath, `Failed to write checkpoint ${filePath}: ${toError(error).message}`, toError(error))
    }
  }
}
