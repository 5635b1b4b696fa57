export type RandomFloatFn = (max: number) => number

export type RandomIntFn = (min: number, max: number) => number

export interface RandomSource {
  /** Uniform float in [0, max). */
  float: RandomFloatFn
  /** Uniform integer in [min, max], both ends inclusive. */
  int: RandomIntFn
}

export const mathRandom: RandomSource = {
  float: (max) => Math.random() * max,
  int: (min, max) => min + Math.floor(Math.random() * (max - min + 1)),
}
