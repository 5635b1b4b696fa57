import type { Renderer } from '../capabilities'
import { Colors } from '../constants/palette'
import { LevelUpOptionDefinitions } from '../data/levelUpOptions'
import type { default as Simulation, LevelUpChoice } from '../Simulation'

const CHAR_WIDTH = 4
const LINE_HEIGHT = 8

function centeredX(renderer: Renderer, text: string) {
  return Math.floor(renderer.width / 2) - (text.length * CHAR_WIDTH) / 2
}

export function buildHudLines(simulation: Simulation) {
  const { player } = simulation
  return [
    `HP: ${Math.floor(player.hp)}`,
    `Level: ${player.level}`,
    `Exp: ${player.exp}/${player.nextExp}`,
    `Score: ${simulation.score}`,
    `Best: ${simulation.highScore}`,
    `Enemies: ${simulation.enemies.length}`,
  ]
}

export function drawLevelUpChoice(renderer: Renderer, choice: LevelUpChoice) {
  renderer.rect(0, 0, renderer.width, renderer.height, Colors.navy)
  const top = Math.floor(renderer.height / 2) - choice.options.length * (LINE_HEIGHT / 2)
  choice.options.forEach((option, index) => {
    const label = LevelUpOptionDefinitions[option].name
    const color = index === choice.selectedIndex ? Colors.white : Colors.gray
    renderer.text(centeredX(renderer, label), top + index * LINE_HEIGHT, label, color)
  })
}

function drawGameOver(renderer: Renderer, simulation: Simulation) {
  renderer.rect(0, 0, renderer.width, renderer.height, Colors.black)
  const lines = ['GAME OVER', `Score: ${simulation.score}`, `Best: ${simulation.highScore}`, 'Press SPACE']
  const top = Math.floor(renderer.height / 2) - lines.length * (LINE_HEIGHT / 2)
  lines.forEach((line, index) => {
    renderer.text(centeredX(renderer, line), top + index * LINE_HEIGHT, line, index === 0 ? Colors.red : Colors.white)
  })
}

export function drawScene(renderer: Renderer, simulation: Simulation) {
  renderer.clear(Colors.black)

  if (simulation.mode === 'gameOver') {
    drawGameOver(renderer, simulation)
    return
  }

  simulation.player.draw(renderer)
  for (const enemy of simulation.enemies) {
    enemy.draw(renderer)
  }

  if (simulation.choice) {
    drawLevelUpChoice(renderer, simulation.choice)
  }

  buildHudLines(simulation).forEach((line, index) => {
    renderer.text(4, 4 + index * LINE_HEIGHT, line, Colors.white)
  })
}
