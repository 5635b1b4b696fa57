import Simulation, { type SimulationOptions } from '../../src/game/Simulation'
import { MemoryHighScoreStore } from '../../src/services/highScoreStorage'
import { fixedRandom, RecordingSynth, scriptedInput } from '../helpers/fakes'

const IDLE = scriptedInput()
const CONFIRM = scriptedInput([], ['confirm'])
const UP = scriptedInput([], ['up'])
const DOWN = scriptedInput([], ['down'])
const CANCEL = scriptedInput([], ['cancel'])

function createSimulation(options: SimulationOptions = {}) {
  return new Simulation({ random: fixedRandom(), ...options })
}

/** Queues a defeated enemy so the next running tick awards its experience. */
function defeatEnemy(simulation: Simulation, kind: 'zombie' | 'ghost' = 'zombie') {
  const enemy = simulation.spawnEnemy(kind, { x: 0, y: 0 })
  enemy.hp = 0
  return enemy
}

describe('Simulation', () => {
  it('starts a run with the player centred', () => {
    const simulation = createSimulation()
    expect(simulation.mode).toBe('running')
    expect(simulation.player.x).toBe(76)
    expect(simulation.player.y).toBe(56)
    expect(simulation.score).toBe(0)
    expect(simulation.enemies).toEqual([])
  })

  it('moves enemies closer to the player every tick', () => {
    const simulation = createSimulation()
    const zombie = simulation.spawnEnemy('zombie', { x: 0, y: -8 })
    let previous = Math.hypot(76 - zombie.x, 56 - zombie.y)
    for (let tick = 0; tick < 20; tick += 1) {
      simulation.update(IDLE)
      const distance = Math.hypot(simulation.player.x - zombie.x, simulation.player.y - zombie.y)
      expect(distance).toBeLessThan(previous)
      previous = distance
    }
  })

  describe('spawning', () => {
    it('spawns an enemy when the spawn interval elapses', () => {
      const simulation = createSimulation()
      for (let tick = 0; tick < 29; tick += 1) {
        simulation.update(IDLE)
      }
      expect(simulation.enemies).toHaveLength(0)

      simulation.update(IDLE)
      expect(simulation.enemies).toHaveLength(1)
      expect(simulation.enemies[0].kind).toBe('zombie')
      expect(simulation.spawnTimer).toBe(0)
    })

    it('counts minutes and shortens the interval', () => {
      const simulation = createSimulation()
      simulation.elapsedFrames = 3599
      simulation.update(IDLE)
      expect(simulation.elapsedMinutes).toBe(1)
      expect(simulation.spawnInterval).toBe(28)
    })
  })

  describe('collisions', () => {
    it('hurts both the player and the enemy on contact', () => {
      const simulation = createSimulation()
      const zombie = simulation.spawnEnemy('zombie', { x: 84, y: 56 })
      simulation.update(IDLE)

      expect(zombie.x).toBe(83.5)
      expect(simulation.player.hp).toBe(99)
      expect(zombie.hp).toBe(5)
    })

    function armWith(simulation: Simulation, kind: 'holyWater' | 'sacredFlame') {
      simulation.player.weapons.length = 0
      simulation.player.addWeapon(kind)
    }

    function sturdyZombie(simulation: Simulation, position: { x: number; y: number }, hp: number) {
      const zombie = simulation.spawnEnemy('zombie', position)
      zombie.hp = hp
      return zombie
    }

    it('lets holy water hit an enemy on every tick it overlaps', () => {
      const simulation = createSimulation()
      armWith(simulation, 'holyWater')
      const zombie = sturdyZombie(simulation, { x: 88, y: 64 }, 100)

      const hp: number[] = []
      for (let tick = 0; tick < 3; tick += 1) {
        simulation.update(IDLE)
        hp.push(zombie.hp)
      }
      expect(hp).toEqual([90, 80, 70])
      expect(simulation.player.attacks).toHaveLength(1)
    })

    it('lets one attack hit every enemy it overlaps in the same tick', () => {
      const simulation = createSimulation()
      armWith(simulation, 'holyWater')
      const near = sturdyZombie(simulation, { x: 80, y: 60 }, 100)
      const corner = sturdyZombie(simulation, { x: 90, y: 70 }, 100)
      const far = sturdyZombie(simulation, { x: 0, y: 0 }, 100)

      simulation.update(IDLE)
      expect(near.hp).toBe(90)
      expect(corner.hp).toBe(90)
      expect(far.hp).toBe(100)
    })

    it('lets sacred flame hit on the cast tick and then only on pulse ticks', () => {
      const simulation = createSimulation()
      armWith(simulation, 'sacredFlame')
      const zombie = sturdyZombie(simulation, { x: 80, y: 60 }, 1000)

      const hp: number[] = []
      for (let tick = 0; tick < 30; tick += 1) {
        simulation.update(IDLE)
        hp.push(zombie.hp)
      }
      expect(hp[0]).toBe(980)
      expect(hp[13]).toBe(980)
      expect(hp[14]).toBe(975)
      expect(hp[28]).toBe(975)
      expect(hp[29]).toBe(970)
      expect(simulation.player.attacks).toHaveLength(1)
    })

    it('removes defeated enemies and scores their experience', () => {
      const simulation = createSimulation()
      defeatEnemy(simulation, 'ghost')
      simulation.update(IDLE)

      expect(simulation.enemies).toEqual([])
      expect(simulation.score).toBe(3)
      expect(simulation.highScore).toBe(3)
      expect(simulation.player.exp).toBe(3)
      expect(simulation.mode).toBe('running')
    })
  })

  describe('level up', () => {
    function levelUpSimulation() {
      const simulation = createSimulation()
      simulation.player.state.exp = 9
      defeatEnemy(simulation)
      simulation.update(IDLE)
      return simulation
    }

    it('opens the level-up choice once the threshold is reached', () => {
      const simulation = levelUpSimulation()
      expect(simulation.mode).toBe('choosingLevelUp')
      expect(simulation.player.level).toBe(2)
      expect(simulation.choice).toEqual({
        options: ['knifeLevelUp', 'holyWaterAdd', 'hpUp'],
        selectedIndex: 0,
      })
    })

    it('suspends the world while choosing', () => {
      const simulation = levelUpSimulation()
      const zombie = simulation.spawnEnemy('zombie', { x: 0, y: 0 })
      const attackX = simulation.player.attacks[0].x

      for (let tick = 0; tick < 10; tick += 1) {
        simulation.update(IDLE)
      }
      expect(simulation.elapsedFrames).toBe(1)
      expect(simulation.spawnTimer).toBe(1)
      expect(zombie.x).toBe(0)
      expect(simulation.player.attacks[0].x).toBe(attackX)
    })

    it('moves the selection with wrap-around and applies the confirmed option', () => {
      const simulation = levelUpSimulation()
      simulation.update(UP)
      expect(simulation.choice?.selectedIndex).toBe(2)
      simulation.update(DOWN)
      simulation.update(DOWN)
      expect(simulation.choice?.selectedIndex).toBe(1)

      simulation.update(CONFIRM)
      expect(simulation.mode).toBe('running')
      expect(simulation.choice).toBeNull()
      expect(simulation.player.weapons.map((weapon) => weapon.kind)).toEqual(['knife', 'holyWater'])
    })

    it('queues several level ups gained on the same tick', () => {
      const simulation = createSimulation()
      simulation.player.state.nextExp = 1
      defeatEnemy(simulation)
      defeatEnemy(simulation)
      simulation.update(IDLE)
      expect(simulation.player.level).toBe(3)

      simulation.update(CONFIRM)
      expect(simulation.mode).toBe('choosingLevelUp')
      expect(simulation.choice?.selectedIndex).toBe(0)

      simulation.update(CONFIRM)
      expect(simulation.mode).toBe('running')
      expect(simulation.player.weapons[0].level).toBe(3)
    })
  })

  describe('game over', () => {
    function defeatedSimulation(store: MemoryHighScoreStore) {
      const simulation = createSimulation({ highScoreStore: store })
      defeatEnemy(simulation, 'ghost')
      simulation.spawnEnemy('zombie', { x: 76, y: 56 })
      simulation.player.state.hp = 1
      simulation.update(IDLE)
      return simulation
    }

    it('ends the run when hp reaches zero and saves the high score', () => {
      const store = new MemoryHighScoreStore(2)
      const simulation = defeatedSimulation(store)

      expect(simulation.mode).toBe('gameOver')
      expect(simulation.player.hp).toBe(0)
      expect(simulation.highScore).toBe(3)
      expect(store.load()).toBe(3)
    })

    it('waits for confirm and then starts a new run', () => {
      const simulation = defeatedSimulation(new MemoryHighScoreStore(2))
      simulation.update(IDLE)
      expect(simulation.mode).toBe('gameOver')
      expect(simulation.elapsedFrames).toBe(1)

      simulation.update(CONFIRM)
      expect(simulation.mode).toBe('running')
      expect(simulation.score).toBe(0)
      expect(simulation.player.hp).toBe(100)
      expect(simulation.enemies).toEqual([])
      expect(simulation.elapsedFrames).toBe(0)
      expect(simulation.highScore).toBe(3)
    })

    it('loads the stored high score on start', () => {
      expect(createSimulation({ highScoreStore: new MemoryHighScoreStore(42) }).highScore).toBe(42)
    })
  })

  describe('quit', () => {
    it('reports quit on cancel in any mode', () => {
      const simulation = createSimulation()
      expect(simulation.update(CANCEL)).toBe('quit')
      expect(simulation.elapsedFrames).toBe(0)

      simulation.player.state.exp = 9
      defeatEnemy(simulation)
      expect(simulation.update(IDLE)).toBe('continue')
      expect(simulation.mode).toBe('choosingLevelUp')
      expect(simulation.update(CANCEL)).toBe('quit')
    })
  })

  describe('music', () => {
    it('follows the number of enemies', () => {
      const simulation = createSimulation()
      for (let i = 0; i < 31; i += 1) {
        simulation.spawnEnemy('zombie', { x: 0, y: 0 })
      }
      simulation.update(IDLE)
      expect(simulation.music.rhythm).toBe('boss')
      expect(simulation.music.melody).toBe('knife')
    })

    it('forwards sound events to the synth', () => {
      const synth = new RecordingSynth()
      const simulation = createSimulation({ synth })
      simulation.spawnEnemy('zombie', { x: 0, y: 0 })
      for (let tick = 0; tick < 5; tick += 1) {
        simulation.update(IDLE)
      }
      expect(synth.played).toEqual([{ channel: 1, sample: 'bass-0' }])
    })
  })
})
