import Phaser from 'phaser'

import PhaserInput from '../adapters/PhaserInput'
import PhaserRenderer from '../adapters/PhaserRenderer'
import PhaserSynth from '../adapters/PhaserSynth'
import { SCREEN_HEIGHT, SCREEN_WIDTH, TICKS_PER_SECOND } from '../constants/dimensions'
import { drawScene } from '../render/drawScene'
import Simulation from '../Simulation'
import { LocalHighScoreStore } from '../../services/highScoreStorage'

const STEP_MS = 1000 / TICKS_PER_SECOND
// Caps the catch-up after the tab was hidden.
const MAX_FRAME_DELTA = 250

export default class PlayScene extends Phaser.Scene {
  constructor() {
    super('PlayScene')
  }

  private simulation!: Simulation

  private controls!: PhaserInput

  private screen!: PhaserRenderer

  private synth!: PhaserSynth

  private highScores!: LocalHighScoreStore

  private accumulator = 0

  create() {
    const keyboard = this.input.keyboard
    if (!keyboard) {
      throw new Error('Keyboard plugin is not available')
    }

    this.controls = new PhaserInput(keyboard)
    this.screen = new PhaserRenderer(this, SCREEN_WIDTH, SCREEN_HEIGHT)
    this.synth = new PhaserSynth(this)
    this.highScores = new LocalHighScoreStore()
    this.simulation = new Simulation({
      width: SCREEN_WIDTH,
      height: SCREEN_HEIGHT,
      synth: this.synth,
      highScoreStore: this.highScores,
    })
    this.accumulator = 0
  }

  update(_time: number, delta: number) {
    this.accumulator += Math.min(delta, MAX_FRAME_DELTA)

    while (this.accumulator >= STEP_MS) {
      this.accumulator -= STEP_MS
      this.controls.beginTick()
      if (this.simulation.update(this.controls) === 'quit') {
        this.quit()
        return
      }
    }

    this.screen.beginFrame()
    drawScene(this.screen, this.simulation)
    this.screen.endFrame()
  }

  private quit() {
    this.highScores.save(this.simulation.highScore)
    this.synth.stopAll()
    this.game.destroy(true)
  }
}
