export const SCREEN_WIDTH = 160
export const SCREEN_HEIGHT = 120

export const TICKS_PER_SECOND = 60
export const FRAMES_PER_MINUTE = TICKS_PER_SECOND * 60

/** Side length of the player and enemy hit boxes. */
export const ENTITY_SIZE = 8
