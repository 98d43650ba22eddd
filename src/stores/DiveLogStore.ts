import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { makeAutoObservable, observable, runInAction } from 'mobx'
import { parseGoaBuffer } from '../domain/goa/GoaParser.ts'
import type { DiveProfilePoint, DiveSummary } from '../domain/types/DiveLog.ts'

export type ParseStatus = 'idle' | 'parsing' | 'success' | 'error'

/**
 * Store for a loaded dive and its parsing state
 */
export class DiveLogStore {
  summary: DiveSummary | null = null
  profile: DiveProfilePoint[] = []
  fileName: string | null = null
  parseStatus: ParseStatus = 'idle'
  parseProgress: number = 0
  parseMessage: string = ''
  parseError: string | null = null

  constructor() {
    makeAutoObservable(this, {
      // Replaced wholesale on every load, never mutated in place.
      profile: observable.ref,
      summary: observable.ref,
    })
  }

  get isLoaded(): boolean {
    return this.summary !== null
  }

  get pointCount(): number {
    return this.profile.length
  }

  /** Elapsed time of the last profile point, in seconds */
  get duration(): number {
    const last = this.profile[this.profile.length - 1]
    return last ? last.time : 0
  }

  /** Max depth from the dive header, else the deepest profile point (m) */
  get maxDepth(): number {
    const recorded = this.summary?.maxDepth
    if (recorded !== undefined) return recorded
    let max = 0
    for (const point of this.profile) {
      if (point.depth > max) max = point.depth
    }
    return max
  }

  /** Depth axis range with 5% padding below the deepest point. Cached by MobX. */
  get depthDomain(): [number, number] {
    const max = this.maxDepth
    return max > 0 ? [0, max * 1.05] : [0, 1]
  }

  get temperatureRange(): [number, number] | null {
    let min = Infinity
    let max = -Infinity
    for (const point of this.profile) {
      if (point.temperature === undefined) continue
      if (point.temperature < min) min = point.temperature
      if (point.temperature > max) max = point.temperature
    }
    return min === Infinity ? null : [min, max]
  }

  /** Profile points where the breathed gas changed */
  get gasSwitches(): DiveProfilePoint[] {
    return this.profile.filter(p => p.gasmix !== undefined)
  }

  loadBuffer = (buffer: Uint8Array, fileName: string | null = null): void => {
    this.parseStatus = 'parsing'
    this.parseProgress = 0
    this.parseMessage = 'Starting parse...'
    this.parseError = null
    this.summary = null
    this.profile = []
    this.fileName = fileName

    try {
      const { summary, profile } = parseGoaBuffer(buffer, (progress, message) => {
        runInAction(() => {
          this.parseProgress = progress
          this.parseMessage = message
        })
      })

      this.summary = summary
      this.profile = profile
      this.parseStatus = 'success'
      this.parseMessage = 'Parse complete!'
    } catch (error) {
      this.fail(error)
    }
  }

  loadFile = async (path: string): Promise<void> => {
    runInAction(() => {
      this.parseStatus = 'parsing'
      this.parseProgress = 0
      this.parseMessage = 'Reading file...'
      this.parseError = null
      this.summary = null
      this.profile = []
      this.fileName = basename(path)
    })

    let contents: Buffer
    try {
      contents = await readFile(path)
    } catch (error) {
      runInAction(() => this.fail(error))
      return
    }

    this.loadBuffer(new Uint8Array(contents), basename(path))
  }

  reset = (): void => {
    this.summary = null
    this.profile = []
    this.fileName = null
    this.parseStatus = 'idle'
    this.parseProgress = 0
    this.parseMessage = ''
    this.parseError = null
  }

  getPointsInRange(startTime: number, endTime: number): DiveProfilePoint[] {
    return this.profile.filter(p => p.time >= startTime && p.time <= endTime)
  }

  getPoint(index: number): DiveProfilePoint | undefined {
    return this.profile[index]
  }

  private fail(error: unknown): void {
    console.error('Dive parse failed:', error)
    this.parseStatus = 'error'
    this.parseError = error instanceof Error ? error.message : 'Unknown error'
    this.parseMessage = 'Parse failed'
  }
}
