import { EnemyDefinitions } from '../../src/game/data/enemies'
import Enemy from '../../src/game/entities/Enemy'
import {
  ChaseBehavior,
  CircleBehavior,
  TeleportBehavior,
  ZigzagBehavior,
} from '../../src/game/entities/enemyBehaviors'
import type { Vector } from '../../src/game/entities/Attack'
import { fixedRandom, RecordingRenderer } from '../helpers/fakes'

/**
 * Updates a circling enemy and checks each step against the orbit point it was
 * heading for. Returns the distance to the target after every tick.
 */
function followOrbit(bat: Enemy, target: Vector, ticks: number) {
  const behavior = bat.behavior
  if (!(behavior instanceof CircleBehavior)) {
    throw new Error('expected a circling bat')
  }
  const fraction = Math.min(bat.speed, 1)
  const distances: number[] = []
  for (let tick = 0; tick < ticks; tick += 1) {
    const fromX = bat.x
    const fromY = bat.y
    bat.update(target)
    const orbitX = target.x + Math.cos(behavior.angle) * behavior.radius
    const orbitY = target.y + Math.sin(behavior.angle) * behavior.radius
    const gap = Math.hypot(orbitX - fromX, orbitY - fromY)
    expect(Math.hypot(bat.x - fromX, bat.y - fromY)).toBeLessThanOrEqual(fraction * gap + 1e-9)
    expect(Math.hypot(orbitX - bat.x, orbitY - bat.y)).toBeLessThanOrEqual(gap + 1e-9)
    distances.push(Math.hypot(bat.x - target.x, bat.y - target.y))
  }
  return distances
}

describe('Enemy', () => {
  it('picks the behaviour that belongs to its kind', () => {
    const random = fixedRandom()
    expect(Enemy.spawn({ x: 0, y: 0 }, 'zombie', random).behavior).toBeInstanceOf(ChaseBehavior)
    expect(Enemy.spawn({ x: 0, y: 0 }, 'bat', random).behavior).toBeInstanceOf(CircleBehavior)
    expect(Enemy.spawn({ x: 0, y: 0 }, 'ghost', random).behavior).toBeInstanceOf(TeleportBehavior)
    expect(Enemy.spawn({ x: 0, y: 0 }, 'skeleton', random).behavior).toBeInstanceOf(ZigzagBehavior)
  })

  it('rejects unknown kinds', () => {
    expect(() => Enemy.spawn({ x: 0, y: 0 }, 'dragon')).toThrow('Unknown enemy kind: dragon')
  })

  it('scales stats with the minutes survived', () => {
    const zombie = Enemy.spawn({ x: 0, y: 0 }, 'zombie', fixedRandom(), 2)
    expect(zombie.hp).toBe(12)
    expect(zombie.speed).toBeCloseTo(0.55)
    expect(zombie.exp).toBe(1)
  })

  describe('takeDamage', () => {
    it('subtracts hp and dies at zero', () => {
      const zombie = Enemy.spawn({ x: 0, y: 0 }, 'zombie')
      zombie.takeDamage(3)
      expect(zombie.hp).toBe(7)
      expect(zombie.isAlive()).toBe(true)

      zombie.takeDamage(7)
      expect(zombie.hp).toBe(0)
      expect(zombie.isAlive()).toBe(false)
    })
  })

  describe('chase', () => {
    it('steps straight toward the target at its speed', () => {
      const zombie = Enemy.spawn({ x: 0, y: 0 }, 'zombie')
      zombie.update({ x: 3, y: 4 })
      expect(zombie.x).toBeCloseTo(0.3)
      expect(zombie.y).toBeCloseTo(0.4)
      expect(zombie.movementTimer).toBe(1)
    })

    it('stays put when already on the target', () => {
      const zombie = Enemy.spawn({ x: 10, y: 10 }, 'zombie')
      zombie.update({ x: 10, y: 10 })
      expect(zombie.x).toBe(10)
      expect(zombie.y).toBe(10)
    })

    it('closes the distance every tick', () => {
      const zombie = Enemy.spawn({ x: 0, y: -8 }, 'zombie')
      const target = { x: 76, y: 56 }
      let previous = Math.hypot(target.x - zombie.x, target.y - zombie.y)
      for (let tick = 0; tick < 20; tick += 1) {
        zombie.update(target)
        const distance = Math.hypot(target.x - zombie.x, target.y - zombie.y)
        expect(distance).toBeLessThan(previous)
        previous = distance
      }
    })
  })

  describe('circle', () => {
    it('advances its angle and eases toward the orbit point', () => {
      const slowBat = new Enemy({ x: 100, y: 0 }, { ...EnemyDefinitions.bat, speed: 0.5 }, fixedRandom(0))
      slowBat.update({ x: 0, y: 0 })

      const orbitX = Math.cos(0.1) * 20
      const orbitY = Math.sin(0.1) * 20
      expect(slowBat.behavior).toBeInstanceOf(CircleBehavior)
      expect(slowBat.x).toBeCloseTo(100 + (orbitX - 100) * 0.5)
      expect(slowBat.y).toBeCloseTo(orbitY * 0.5)
    })

    it('lands on the orbit point when its speed is one', () => {
      const bat = Enemy.spawn({ x: 100, y: 0 }, 'bat', fixedRandom(0))
      bat.update({ x: 0, y: 0 })
      expect(bat.x).toBeCloseTo(Math.cos(0.1) * 20)
      expect(bat.y).toBeCloseTo(Math.sin(0.1) * 20)
    })

    it('stays on its orbit over many ticks', () => {
      const bat = Enemy.spawn({ x: 160, y: 0 }, 'bat', fixedRandom(0))
      const distances = followOrbit(bat, { x: 76, y: 56 }, 600)
      for (const distance of distances) {
        expect(distance).toBeCloseTo(20, 6)
      }
    })

    it('converges toward the orbit when it closes only part of the gap', () => {
      const slowBat = new Enemy({ x: 160, y: 0 }, { ...EnemyDefinitions.bat, speed: 0.5 }, fixedRandom(0))
      const distances = followOrbit(slowBat, { x: 76, y: 56 }, 600)
      expect(distances[0]).toBeGreaterThan(40)
      for (const distance of distances.slice(300)) {
        expect(distance).toBeGreaterThan(19.5)
        expect(distance).toBeLessThan(20.5)
      }
    })

    it('does not overshoot once late-game scaling pushes its speed past 1', () => {
      const bat = Enemy.spawn({ x: 160, y: 0 }, 'bat', fixedRandom(0), 25)
      expect(bat.speed).toBeCloseTo(2.25)

      const distances = followOrbit(bat, { x: 76, y: 56 }, 600)
      for (const distance of distances) {
        expect(distance).toBeCloseTo(20, 6)
      }
      expect(Number.isFinite(bat.x)).toBe(true)
      expect(Number.isFinite(bat.y)).toBe(true)
    })

    it('draws a three-segment trail', () => {
      const bat = Enemy.spawn({ x: 50, y: 50 }, 'bat', fixedRandom(0))
      const renderer = new RecordingRenderer()
      bat.draw(renderer)
      expect(renderer.calls.filter((call) => call.op === 'rect')).toHaveLength(4)
    })
  })

  describe('teleport', () => {
    it('drifts at half speed until the cooldown elapses', () => {
      const ghost = Enemy.spawn({ x: 0, y: 0 }, 'ghost', fixedRandom(0.25, 10))
      ghost.update({ x: 10, y: 0 })
      expect(ghost.x).toBeCloseTo(0.15)
      expect(ghost.y).toBeCloseTo(0)
    })

    it('jumps to a point near the target and resets its timer', () => {
      const ghost = Enemy.spawn({ x: 100, y: 100 }, 'ghost', fixedRandom(0.25, 10))
      const target = { x: 0, y: 0 }
      for (let tick = 0; tick < 59; tick += 1) {
        ghost.update(target)
      }
      expect(ghost.x).toBeGreaterThan(50)

      ghost.update(target)
      expect(ghost.x).toBeCloseTo(0)
      expect(ghost.y).toBeCloseTo(30)
      const distance = Math.hypot(ghost.x, ghost.y)
      expect(distance).toBeGreaterThanOrEqual(20)
      expect(distance).toBeLessThanOrEqual(40)

      const behavior = ghost.behavior
      if (!(behavior instanceof TeleportBehavior)) {
        throw new Error('expected a teleporting ghost')
      }
      expect(behavior.timer).toBe(0)
    })
  })

  describe('zigzag', () => {
    it('adds a sideways sway to its step', () => {
      const skeleton = Enemy.spawn({ x: 0, y: 0 }, 'skeleton')
      skeleton.update({ x: 10, y: 0 })
      expect(skeleton.x).toBeCloseTo(0.4)
      expect(skeleton.y).toBeCloseTo(0.4 * Math.sin(0.05) * 30)
    })

    it('does not advance its phase while standing on the target', () => {
      const skeleton = Enemy.spawn({ x: 5, y: 5 }, 'skeleton')
      skeleton.update({ x: 5, y: 5 })
      const behavior = skeleton.behavior
      if (!(behavior instanceof ZigzagBehavior)) {
        throw new Error('expected a zigzagging skeleton')
      }
      expect(behavior.phase).toBe(0)
    })
  })

  it('draws its body in its own colour', () => {
    const zombie = Enemy.spawn({ x: 12, y: 20 }, 'zombie')
    const renderer = new RecordingRenderer()
    zombie.draw(renderer)
    expect(renderer.calls).toEqual([{ op: 'rect', x: 12, y: 20, w: 8, h: 8, color: EnemyDefinitions.zombie.color }])
  })
})
