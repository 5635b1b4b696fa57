import Phaser from 'phaser'

import { SCREEN_HEIGHT, SCREEN_WIDTH } from './constants/dimensions'
import BootScene from './scenes/BootScene'
import PlayScene from './scenes/PlayScene'

const config: Phaser.Types.Core.GameConfig = {
  type: Phaser.AUTO,
  parent: 'app',
  width: SCREEN_WIDTH,
  height: SCREEN_HEIGHT,
  backgroundColor: '#000000',
  pixelArt: true,
  scene: [BootScene, PlayScene],
  scale: {
    mode: Phaser.Scale.FIT,
    autoCenter: Phaser.Scale.CENTER_BOTH,
  },
}

export default config
