import {
  AMBIENT_INTERVAL_TICKS,
  AMBIENT_VARIANTS,
  BASE_BPM,
  InstrumentNames,
  Instruments,
  MelodyPatterns,
  MelodyPriority,
  MusicChannels,
  RHYTHM_THRESHOLDS,
  RhythmPatterns,
  type MelodyId,
  type RhythmId,
} from '../data/music'
import type { EnemyKind } from '../data/types'
import { TICKS_PER_SECOND } from '../constants/dimensions'

export interface MusicSnapshot {
  playerSpeed: number
  enemyCount: number
  enemyKinds: Iterable<EnemyKind>
  elapsedMinutes: number
}

export interface MusicEvent {
  channel: number
  sample: string
}

/** Base speed the tempo is measured against. */
const REFERENCE_SPEED = 2
const MAX_TEMPO_BOOST = 0.5

export function computeBpm(playerSpeed: number) {
  return Math.round(BASE_BPM * (1 + (playerSpeed / REFERENCE_SPEED) * MAX_TEMPO_BOOST))
}

export function selectRhythm(enemyCount: number): RhythmId {
  if (enemyCount > RHYTHM_THRESHOLDS.boss) {
    return 'boss'
  }
  if (enemyCount > RHYTHM_THRESHOLDS.intense) {
    return 'intense'
  }
  return 'normal'
}

export function selectMelody(kinds: ReadonlySet<EnemyKind>): MelodyId {
  return MelodyPriority.find((entry) => kinds.has(entry.kind))?.melody ?? 'normal'
}

/**
 * Adaptive soundtrack. Tempo, rhythm, melody and instruments are derived
 * from the latest snapshot on every tick; only the playback timers carry over.
 */
export default class Music {
  bpm = BASE_BPM

  melody: MelodyId = 'normal'

  rhythm: RhythmId = 'normal'

  activeInstruments = new Set<number>()

  private melodyTimer = 0

  private rhythmTimer = 0

  private ambientTimer = 0

  private noteIndex = 0

  update(snapshot: MusicSnapshot): MusicEvent[] {
    const kinds = new Set(snapshot.enemyKinds)
    this.bpm = computeBpm(snapshot.playerSpeed)
    this.rhythm = selectRhythm(snapshot.enemyCount)
    this.melody = selectMelody(kinds)
    this.activeInstruments = new Set([...kinds].map((kind) => Instruments[kind]))

    const events: MusicEvent[] = []
    this.playAmbient(snapshot.elapsedMinutes, events)
    this.playMelody(events)
    this.playRhythm(events)
    return events
  }

  /** Frames per beat at the current tempo. */
  get beatFrames() {
    return (30 * TICKS_PER_SECOND) / this.bpm
  }

  reset() {
    this.bpm = BASE_BPM
    this.melody = 'normal'
    this.rhythm = 'normal'
    this.activeInstruments = new Set()
    this.melodyTimer = 0
    this.rhythmTimer = 0
    this.ambientTimer = 0
    this.noteIndex = 0
  }

  private playAmbient(elapsedMinutes: number, events: MusicEvent[]) {
    this.ambientTimer += 1
    if (this.ambientTimer < AMBIENT_INTERVAL_TICKS) {
      return
    }
    this.ambientTimer = 0
    if (elapsedMinutes > 0) {
      events.push({ channel: MusicChannels.ambient, sample: `ambient-${elapsedMinutes % AMBIENT_VARIANTS}` })
    }
  }

  private playMelody(events: MusicEvent[]) {
    this.melodyTimer += 1
    if (this.melodyTimer < this.beatFrames) {
      return
    }
    this.melodyTimer = 0
    const pattern = MelodyPatterns[this.melody]
    const note = pattern[this.noteIndex % pattern.length]
    events.push({ channel: MusicChannels.melody, sample: `note-${note}` })
    this.noteIndex = (this.noteIndex + 1) % pattern.length
  }

  private playRhythm(events: MusicEvent[]) {
    this.rhythmTimer += 1
    if (this.rhythmTimer < this.beatFrames / 2) {
      return
    }
    this.rhythmTimer = 0
    const pattern = RhythmPatterns[this.rhythm]
    const step = pattern[this.noteIndex % pattern.length]
    for (const instrument of [...this.activeInstruments].sort((a, b) => a - b)) {
      events.push({ channel: MusicChannels.rhythm, sample: `${InstrumentNames[instrument]}-${step}` })
    }
  }
}
