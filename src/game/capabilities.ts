export type Button = 'up' | 'down' | 'left' | 'right' | 'confirm' | 'cancel'

export interface GameInput {
  /** True while the button is held. */
  isHeld(button: Button): boolean
  /** True only on the tick the button went down. */
  wasPressed(button: Button): boolean
}

export interface Renderer {
  readonly width: number
  readonly height: number
  clear(color: number): void
  rect(x: number, y: number, w: number, h: number, color: number): void
  line(x1: number, y1: number, x2: number, y2: number, color: number): void
  circle(x: number, y: number, radius: number, color: number): void
  text(x: number, y: number, value: string, color: number): void
}

/** Fire-and-forget sample playback; a new trigger on a channel replaces what is playing there. */
export interface Synth {
  play(channel: number, sample: string): void
}
