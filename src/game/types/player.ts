export interface PlayerState {
  maxHp: number
  hp: number
  baseSpeed: number
  level: number
  exp: number
  nextExp: number
}
