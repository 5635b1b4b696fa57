import type { PlayerState } from '../types/player'

export interface ApplyExperienceResult<T extends PlayerState> {
  state: T
  leveledUp: boolean
}

const BASE_EXP_REQUIREMENT = 10
const EXP_REQUIREMENT_GROWTH = 1.5
const LEVEL_UP_HP_BONUS = 10
const LEVEL_UP_SPEED_BONUS = 0.2
export const PLAYER_MAX_HP = 200
export const PLAYER_MAX_SPEED = 4
const INITIAL_PLAYER_HP = 100
const INITIAL_PLAYER_SPEED = 2

const INITIAL_PLAYER_STATE: PlayerState = {
  maxHp: PLAYER_MAX_HP,
  hp: INITIAL_PLAYER_HP,
  baseSpeed: INITIAL_PLAYER_SPEED,
  level: 1,
  exp: 0,
  nextExp: BASE_EXP_REQUIREMENT,
}

export function createInitialPlayerState(): PlayerState {
  return { ...INITIAL_PLAYER_STATE }
}

export function getNextExpRequirement(current: number) {
  return Math.floor(current * EXP_REQUIREMENT_GROWTH)
}

export function applyLevelUp<T extends PlayerState>(state: T) {
  const nextState = { ...state }
  nextState.level += 1
  nextState.exp -= nextState.nextExp
  nextState.nextExp = getNextExpRequirement(nextState.nextExp)
  nextState.hp = Math.min(PLAYER_MAX_HP, nextState.hp + LEVEL_UP_HP_BONUS)
  nextState.baseSpeed = Math.min(PLAYER_MAX_SPEED, nextState.baseSpeed + LEVEL_UP_SPEED_BONUS)
  return nextState
}

/**
 * Adds experience and levels up at most once, even when the surplus would
 * cover the next threshold as well; the surplus carries over.
 */
export function applyExperience<T extends PlayerState>(state: T, amount: number): ApplyExperienceResult<T> {
  const nextState = { ...state }
  nextState.exp += amount

  if (nextState.exp < nextState.nextExp) {
    return { state: nextState, leveledUp: false }
  }

  return { state: applyLevelUp(nextState), leveledUp: true }
}

export function applyExperienceInPlace<T extends PlayerState>(state: T, amount: number) {
  const { state: updated, leveledUp } = applyExperience(state, amount)
  Object.assign(state, updated)
  return { state, leveledUp }
}

export function applyDamage<T extends PlayerState>(state: T, amount: number) {
  const nextState = { ...state }
  nextState.hp = Math.max(0, nextState.hp - amount)
  return nextState
}

export function applyHealing<T extends PlayerState>(state: T, amount: number) {
  const nextState = { ...state }
  nextState.hp = Math.min(nextState.maxHp, nextState.hp + amount)
  return nextState
}
