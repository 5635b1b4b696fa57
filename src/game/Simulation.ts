import Music, { type MusicEvent } from './audio/Music'
import type { GameInput, Synth } from './capabilities'
import { ENTITY_SIZE, FRAMES_PER_MINUTE, SCREEN_HEIGHT, SCREEN_WIDTH } from './constants/dimensions'
import type { EnemyKind, LevelUpOptionId } from './data/types'
import type { Vector } from './entities/Attack'
import Enemy from './entities/Enemy'
import Player from './entities/Player'
import { rectsOverlap } from './logic/collision'
import { applyLevelUpOption, getLevelUpOptions } from './logic/levelUpOptions'
import { mathRandom, type RandomSource } from './logic/random'
import { getSpawnInterval, pickEnemyKind, pickSpawnPosition } from './logic/spawnRules'
import type { HighScoreStore } from '../services/highScoreStorage'

export type GameMode = 'running' | 'choosingLevelUp' | 'gameOver'

export type TickOutcome = 'continue' | 'quit'

export interface LevelUpChoice {
  options: LevelUpOptionId[]
  selectedIndex: number
}

export interface SimulationOptions {
  width?: number
  height?: number
  random?: RandomSource
  highScoreStore?: HighScoreStore
  synth?: Synth
}

const CONTACT_DAMAGE = 1

export default class Simulation {
  readonly width: number

  readonly height: number

  player: Player

  enemies: Enemy[] = []

  readonly music = new Music()

  mode: GameMode = 'running'

  choice: LevelUpChoice | null = null

  score = 0

  highScore: number

  elapsedFrames = 0

  elapsedMinutes = 0

  spawnTimer = 0

  private pendingLevelUps = 0

  private readonly random: RandomSource

  private readonly highScoreStore?: HighScoreStore

  private readonly synth?: Synth

  constructor(options: SimulationOptions = {}) {
    this.width = options.width ?? SCREEN_WIDTH
    this.height = options.height ?? SCREEN_HEIGHT
    this.random = options.random ?? mathRandom
    this.highScoreStore = options.highScoreStore
    this.synth = options.synth
    this.highScore = this.highScoreStore?.load() ?? 0
    this.player = this.createPlayer()
  }

  get spawnInterval() {
    return getSpawnInterval(this.elapsedMinutes)
  }

  update(input: GameInput): TickOutcome {
    if (input.wasPressed('cancel')) {
      return 'quit'
    }

    switch (this.mode) {
      case 'running':
        this.updateRunning(input)
        break
      case 'choosingLevelUp':
        this.updateChoosing(input)
        break
      case 'gameOver':
        if (input.wasPressed('confirm')) {
          this.reset()
        }
        break
    }
    return 'continue'
  }

  spawnEnemy(kind: EnemyKind = pickEnemyKind(this.random.float), position?: Vector) {
    const spawnAt = position ?? pickSpawnPosition(this.width, this.height, this.random.int)
    const enemy = Enemy.spawn(spawnAt, kind, this.random, this.elapsedMinutes)
    this.enemies.push(enemy)
    return enemy
  }

  /** Starts a new run; the high score survives. */
  reset() {
    this.player = this.createPlayer()
    this.enemies = []
    this.mode = 'running'
    this.choice = null
    this.pendingLevelUps = 0
    this.score = 0
    this.elapsedFrames = 0
    this.elapsedMinutes = 0
    this.spawnTimer = 0
    this.music.reset()
  }

  private createPlayer() {
    const x = (this.width - ENTITY_SIZE) / 2
    const y = (this.height - ENTITY_SIZE) / 2
    return new Player(x, y, { width: this.width, height: this.height })
  }

  private updateRunning(input: GameInput) {
    this.elapsedFrames += 1
    if (this.elapsedFrames % FRAMES_PER_MINUTE === 0) {
      this.elapsedMinutes += 1
    }

    this.player.update(input)

    this.spawnTimer += 1
    if (this.spawnTimer >= this.spawnInterval) {
      this.spawnEnemy()
      this.spawnTimer = 0
    }

    const target = { x: this.player.x, y: this.player.y }
    for (const enemy of this.enemies) {
      enemy.update(target)
    }

    this.resolvePlayerCollisions()
    this.resolveAttackCollisions()
    this.removeDefeatedEnemies()
    this.player.pruneAttacks()

    if (!this.player.isAlive()) {
      this.enterGameOver()
    } else if (this.pendingLevelUps > 0) {
      this.openLevelUpChoice()
    }

    this.playMusic()
  }

  private resolvePlayerCollisions() {
    const playerBounds = this.player.bounds
    for (const enemy of this.enemies) {
      if (rectsOverlap(playerBounds, enemy.bounds)) {
        this.player.takeDamage(CONTACT_DAMAGE)
      }
    }
  }

  private resolveAttackCollisions() {
    for (const attack of this.player.attacks) {
      const damage = attack.damageThisTick()
      if (damage <= 0) {
        continue
      }
      const attackBounds = attack.bounds
      for (const enemy of this.enemies) {
        if (rectsOverlap(attackBounds, enemy.bounds)) {
          enemy.takeDamage(damage)
        }
      }
    }
  }

  private removeDefeatedEnemies() {
    const survivors: Enemy[] = []
    for (const enemy of this.enemies) {
      if (enemy.isAlive()) {
        survivors.push(enemy)
        continue
      }
      this.score += enemy.exp
      this.highScore = Math.max(this.highScore, this.score)
      if (this.player.gainExp(enemy.exp)) {
        this.pendingLevelUps += 1
      }
    }
    this.enemies = survivors
  }

  private openLevelUpChoice() {
    this.mode = 'choosingLevelUp'
    this.choice = { options: getLevelUpOptions(this.player), selectedIndex: 0 }
  }

  private updateChoosing(input: GameInput) {
    const choice = this.choice
    if (!choice || choice.options.length === 0) {
      this.closeLevelUpChoice()
      return
    }

    const count = choice.options.length
    if (input.wasPressed('up')) {
      choice.selectedIndex = (choice.selectedIndex - 1 + count) % count
    } else if (input.wasPressed('down')) {
      choice.selectedIndex = (choice.selectedIndex + 1) % count
    } else if (input.wasPressed('confirm')) {
      applyLevelUpOption(this.player, choice.options[choice.selectedIndex])
      this.closeLevelUpChoice()
    }
  }

  private closeLevelUpChoice() {
    this.pendingLevelUps = Math.max(0, this.pendingLevelUps - 1)
    if (this.pendingLevelUps > 0) {
      this.openLevelUpChoice()
      return
    }
    this.choice = null
    this.mode = 'running'
  }

  private enterGameOver() {
    this.mode = 'gameOver'
    this.choice = null
    this.pendingLevelUps = 0
    this.highScoreStore?.save(this.highScore)
  }

  private playMusic() {
    const events: MusicEvent[] = this.music.update({
      playerSpeed: this.player.speed,
      enemyCount: this.enemies.length,
      enemyKinds: this.enemies.map((enemy) => enemy.kind),
      elapsedMinutes: this.elapsedMinutes,
    })
    for (const event of events) {
      this.synth?.play(event.channel, event.sample)
    }
  }
}
