// 16-colour palette; entities and the renderer refer to colours by index.
export const PALETTE = [
  0x000000, 0x2b335f, 0x7e2072, 0x19959c, 0x8b4852, 0x395c98, 0xa9c1ff, 0xeeeeee,
  0xd4186c, 0xd38441, 0xe9c35b, 0x70c6a9, 0x7696de, 0xa3a3a3, 0xff9798, 0xedc7b0,
] as const

export const Colors = {
  black: 0,
  navy: 1,
  purple: 2,
  teal: 3,
  brown: 4,
  darkBlue: 5,
  lightBlue: 6,
  white: 7,
  red: 8,
  orange: 9,
  yellow: 10,
  green: 11,
  blue: 12,
  gray: 13,
  pink: 14,
  peach: 15,
} as const

export type ColorIndex = (typeof Colors)[keyof typeof Colors]

export function toHexColor(color: number) {
  return PALETTE[color] ?? PALETTE[Colors.white]
}
