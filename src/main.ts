import Phaser from 'phaser'

import config from './game/config'

function bootstrap() {
  try {
    new Phaser.Game(config)
  } catch (error) {
    console.error('Failed to start the game', error)
    const mountNode = document.getElementById('app')
    if (mountNode) {
      mountNode.innerHTML = '<p style="padding:16px;color:#fff;">The game could not start. Please reload the page.</p>'
    }
  }
}

bootstrap()
