import Phaser from 'phaser'

import { SCREEN_HEIGHT, SCREEN_WIDTH } from '../constants/dimensions'

/** Title card; waiting for a key press also unlocks browser audio. */
export default class BootScene extends Phaser.Scene {
  constructor() {
    super('BootScene')
  }

  create() {
    this.add
      .text(SCREEN_WIDTH / 2, SCREEN_HEIGHT / 2 - 8, 'PULSE SURVIVOR', {
        fontFamily: 'monospace',
        fontSize: '12px',
        color: '#eeeeee',
      })
      .setOrigin(0.5)

    this.add
      .text(SCREEN_WIDTH / 2, SCREEN_HEIGHT / 2 + 10, 'Press SPACE', {
        fontFamily: 'monospace',
        fontSize: '8px',
        color: '#a3a3a3',
      })
      .setOrigin(0.5)

    const keyboard = this.input.keyboard
    if (!keyboard) {
      throw new Error('Keyboard plugin is not available')
    }

    keyboard.once('keydown-SPACE', () => {
      this.scene.start('PlayScene')
    })
  }
}
