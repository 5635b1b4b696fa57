import { z } from 'zod'

export interface HighScoreStore {
  load(): number
  save(score: number): void
}

/** The subset of the Web Storage API the store needs. */
export type KeyValueStorage = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>

const highScoreRecordSchema = z.object({
  highScore: z.number(),
  updatedAt: z.number().optional(),
})

interface HighScoreRecord {
  highScore: number
  updatedAt: number
}

const DEFAULT_STORAGE_KEY = 'pulse-survivor:high-score'

export function sanitizeScore(value: unknown) {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return 0
  }
  return Math.max(0, Math.floor(value))
}

/** Throws on malformed JSON; a well-formed record of the wrong shape reads as zero. */
export function parseHighScoreRecord(raw: string): HighScoreRecord {
  const parsed = highScoreRecordSchema.safeParse(JSON.parse(raw))
  if (!parsed.success) {
    return { highScore: 0, updatedAt: 0 }
  }
  return { highScore: sanitizeScore(parsed.data.highScore), updatedAt: parsed.data.updatedAt ?? 0 }
}

function getLocalStorage(): KeyValueStorage | null {
  if (typeof window === 'undefined') {
    return null
  }
  try {
    return window.localStorage
  } catch (error) {
    console.warn('localStorage unavailable', error)
    return null
  }
}

/**
 * Best-effort persistence of the best score. Every failure is logged and
 * swallowed: losing the high score never interrupts a run.
 */
export class LocalHighScoreStore implements HighScoreStore {
  constructor(
    private readonly storage: KeyValueStorage | null = getLocalStorage(),
    private readonly key = DEFAULT_STORAGE_KEY,
  ) {}

  load() {
    if (!this.storage) {
      return 0
    }
    const raw = this.storage.getItem(this.key)
    if (!raw) {
      return 0
    }
    try {
      return parseHighScoreRecord(raw).highScore
    } catch (error) {
      console.warn('Failed to parse stored high score', error)
      this.storage.removeItem(this.key)
      return 0
    }
  }

  save(score: number) {
    if (!this.storage) {
      return
    }
    const highScore = Math.max(this.load(), sanitizeScore(score))
    const record: HighScoreRecord = { highScore, updatedAt: Date.now() }
    try {
      this.storage.setItem(this.key, JSON.stringify(record))
    } catch (error) {
      console.warn('Failed to save high score', error)
    }
  }
}

export class MemoryHighScoreStore implements HighScoreStore {
  constructor(private highScore = 0) {}

  load() {
    return this.highScore
  }

  save(score: number) {
    this.highScore = Math.max(this.highScore, sanitizeScore(score))
  }
}
