import Phaser from 'phaser'

import type { Button, GameInput } from '../capabilities'

const KeyCodes = Phaser.Input.Keyboard.KeyCodes

export const KEY_BINDINGS: Record<Button, number[]> = {
  up: [KeyCodes.UP, KeyCodes.W],
  down: [KeyCodes.DOWN, KeyCodes.S],
  left: [KeyCodes.LEFT, KeyCodes.A],
  right: [KeyCodes.RIGHT, KeyCodes.D],
  confirm: [KeyCodes.SPACE, KeyCodes.ENTER],
  cancel: [KeyCodes.ESC],
}

const BUTTONS: Button[] = ['up', 'down', 'left', 'right', 'confirm', 'cancel']

/**
 * Keyboard-backed input. `beginTick` samples the "just pressed" state once per
 * simulation tick so every query within a tick agrees.
 */
export default class PhaserInput implements GameInput {
  private readonly keys = new Map<Button, Phaser.Input.Keyboard.Key[]>()

  private pressed = new Set<Button>()

  constructor(keyboard: Phaser.Input.Keyboard.KeyboardPlugin) {
    for (const button of BUTTONS) {
      this.keys.set(
        button,
        KEY_BINDINGS[button].map((code) => keyboard.addKey(code)),
      )
    }
  }

  beginTick() {
    const pressed = new Set<Button>()
    for (const [button, keys] of this.keys) {
      // JustDown has side effects, so every key is polled
      const justDown = keys.map((key) => Phaser.Input.Keyboard.JustDown(key))
      if (justDown.some(Boolean)) {
        pressed.add(button)
      }
    }
    this.pressed = pressed
  }

  isHeld(button: Button) {
    return this.keys.get(button)?.some((key) => key.isDown) ?? false
  }

  wasPressed(button: Button) {
    return this.pressed.has(button)
  }
}
