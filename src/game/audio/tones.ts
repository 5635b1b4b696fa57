import { InstrumentNames } from '../data/music'

export interface Tone {
  frequency: number
  duration: number
  volume: number
}

const MIDDLE_C = 261.63

const INSTRUMENT_ROOTS: Record<(typeof InstrumentNames)[number], number> = {
  bass: 65.41,
  lead: 523.25,
  pad: 196.0,
  drum: 110.0,
}

const AMBIENT_ROOTS = [130.81, 196.0, 261.63]

function semitones(root: number, steps: number) {
  return root * Math.pow(2, steps / 12)
}

function isInstrumentName(value: string): value is (typeof InstrumentNames)[number] {
  return InstrumentNames.some((name) => name === value)
}

/** Maps a sample name emitted by the music system to a synthesized tone. */
export function toneForSample(sample: string): Tone | undefined {
  const match = /^([a-z]+)-(\d+)$/.exec(sample)
  if (!match) {
    return undefined
  }
  const [, prefix, rawValue] = match
  const value = Number(rawValue)

  if (prefix === 'note') {
    return { frequency: semitones(MIDDLE_C, value), duration: 0.15, volume: 0.2 }
  }
  if (prefix === 'ambient') {
    const root = AMBIENT_ROOTS[value % AMBIENT_ROOTS.length]
    return { frequency: root, duration: 0.6, volume: 0.08 }
  }
  if (isInstrumentName(prefix)) {
    return { frequency: semitones(INSTRUMENT_ROOTS[prefix], value * 2), duration: 0.08, volume: 0.12 }
  }
  return undefined
}
