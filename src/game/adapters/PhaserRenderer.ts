import Phaser from 'phaser'

import type { Renderer } from '../capabilities'
import { toHexColor } from '../constants/palette'

export function toCssColor(color: number) {
  return `#${toHexColor(color).toString(16).padStart(6, '0')}`
}

/**
 * Immediate-mode drawing on top of one Graphics object; text objects are
 * pooled and reused from frame to frame.
 */
export default class PhaserRenderer implements Renderer {
  private readonly graphics: Phaser.GameObjects.Graphics

  private readonly texts: Phaser.GameObjects.Text[] = []

  private usedTexts = 0

  constructor(
    private readonly scene: Phaser.Scene,
    readonly width: number,
    readonly height: number,
  ) {
    this.graphics = scene.add.graphics({ x: 0, y: 0 })
  }

  beginFrame() {
    this.graphics.clear()
    this.usedTexts = 0
  }

  endFrame() {
    for (let i = this.usedTexts; i < this.texts.length; i += 1) {
      this.texts[i].setVisible(false)
    }
  }

  clear(color: number) {
    this.graphics.fillStyle(toHexColor(color), 1)
    this.graphics.fillRect(0, 0, this.width, this.height)
  }

  rect(x: number, y: number, w: number, h: number, color: number) {
    this.graphics.fillStyle(toHexColor(color), 1)
    this.graphics.fillRect(Math.floor(x), Math.floor(y), w, h)
  }

  line(x1: number, y1: number, x2: number, y2: number, color: number) {
    this.graphics.lineStyle(1, toHexColor(color), 1)
    this.graphics.lineBetween(x1, y1, x2, y2)
  }

  circle(x: number, y: number, radius: number, color: number) {
    this.graphics.lineStyle(1, toHexColor(color), 1)
    this.graphics.strokeCircle(x, y, radius)
  }

  text(x: number, y: number, value: string, color: number) {
    const text = this.nextText()
    text.setPosition(Math.floor(x), Math.floor(y))
    text.setText(value)
    text.setColor(toCssColor(color))
    text.setVisible(true)
  }

  private nextText() {
    const pooled = this.texts[this.usedTexts]
    this.usedTexts += 1
    if (pooled) {
      return pooled
    }
    const created = this.scene.add
      .text(0, 0, '', {
        fontFamily: 'monospace',
        fontSize: '8px',
        color: '#ffffff',
      })
      .setDepth(5)
    this.texts.push(created)
    return created
  }
}
