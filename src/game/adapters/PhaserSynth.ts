import Phaser from 'phaser'

import type { Synth } from '../capabilities'
import { toneForSample, type Tone } from '../audio/tones'

type Voice = { stop(): void }

function createToneBuffer(context: AudioContext, tone: Tone) {
  const sampleRate = context.sampleRate
  const length = Math.max(1, Math.floor(sampleRate * tone.duration))
  const buffer = context.createBuffer(1, length, sampleRate)
  const data = buffer.getChannelData(0)
  for (let i = 0; i < length; i += 1) {
    const t = i / sampleRate
    const envelope = Math.exp(-t * (4 / tone.duration))
    data[i] = Math.sin(2 * Math.PI * tone.frequency * t) * envelope * tone.volume
  }
  return buffer
}

/**
 * Plays a loaded audio asset when one exists under the sample name and
 * otherwise synthesizes a short tone for it. One voice per channel.
 */
export default class PhaserSynth implements Synth {
  private readonly voices = new Map<number, Voice>()

  private readonly toneCache = new Map<string, AudioBuffer>()

  private readonly warned = new Set<string>()

  constructor(private readonly scene: Phaser.Scene) {}

  play(channel: number, sample: string) {
    this.voices.get(channel)?.stop()
    this.voices.delete(channel)

    const voice = this.playAsset(channel, sample) ?? this.playTone(sample)
    if (voice) {
      this.voices.set(channel, voice)
      return
    }

    if (!this.warned.has(sample)) {
      this.warned.add(sample)
      console.warn(`Audio sample "${sample}" is not available; skipping playback.`)
    }
  }

  stopAll() {
    for (const voice of this.voices.values()) {
      voice.stop()
    }
    this.voices.clear()
  }

  private playAsset(channel: number, sample: string): Voice | undefined {
    if (!this.scene.cache.audio.exists(sample)) {
      return undefined
    }
    const sound = this.scene.sound.add(sample)
    const voice: Voice = {
      stop: () => {
        sound.stop()
        sound.destroy()
      },
    }
    sound.once('complete', () => {
      if (this.voices.get(channel) === voice) {
        this.voices.delete(channel)
      }
      sound.destroy()
    })
    sound.play()
    return voice
  }

  private playTone(sample: string): Voice | undefined {
    const manager = this.scene.sound
    if (!(manager instanceof Phaser.Sound.WebAudioSoundManager)) {
      return undefined
    }
    const tone = toneForSample(sample)
    if (!tone) {
      return undefined
    }

    const context = manager.context
    let buffer = this.toneCache.get(sample)
    if (!buffer) {
      buffer = createToneBuffer(context, tone)
      this.toneCache.set(sample, buffer)
    }

    const source = context.createBufferSource()
    source.buffer = buffer
    source.connect(context.destination)
    source.start()
    return {
      stop: () => {
        try {
          source.stop()
        } catch (error) {
          console.warn('Failed to stop tone', error)
        }
      },
    }
  }
}
