import { Colors } from '../constants/palette'
import type { EnemyDefinition, EnemyKind } from './types'

export const EnemyDefinitions: Record<EnemyKind, EnemyDefinition> = {
  zombie: {
    kind: 'zombie',
    label: 'Zombie',
    hp: 10,
    speed: 0.5,
    exp: 1,
    color: Colors.green,
    behavior: { type: 'chase' },
  },
  bat: {
    kind: 'bat',
    label: 'Bat',
    hp: 8,
    speed: 1.0,
    exp: 2,
    color: Colors.purple,
    behavior: { type: 'circle', radius: 20, angularSpeed: 0.1 },
  },
  ghost: {
    kind: 'ghost',
    label: 'Ghost',
    hp: 15,
    speed: 0.3,
    exp: 3,
    color: Colors.white,
    behavior: { type: 'teleport', cooldown: 60, minDistance: 20, maxDistance: 40 },
  },
  skeleton: {
    kind: 'skeleton',
    label: 'Skeleton',
    hp: 12,
    speed: 0.4,
    exp: 2,
    color: Colors.lightBlue,
    behavior: { type: 'zigzag', width: 30, phaseSpeed: 0.05 },
  },
}

export function isEnemyKind(value: string): value is EnemyKind {
  return Object.prototype.hasOwnProperty.call(EnemyDefinitions, value)
}

export function getEnemyDefinition(kind: string): EnemyDefinition {
  if (!isEnemyKind(kind)) {
    throw new Error(`Unknown enemy kind: ${kind}`)
  }
  return EnemyDefinitions[kind]
}
