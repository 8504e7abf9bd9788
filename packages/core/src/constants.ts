import type { BarColor } from './types'

/** Color of a bar with no marks */
export const NEUTRAL: BarColor = 'white'

/** Default number of bars */
export const DEFAULT_ARRAY_SIZE = 100

/** Default panel height; heights are then fractions of the panel */
export const DEFAULT_PANEL_HEIGHT = 1

/** Default tick rate while playing */
export const DEFAULT_FRAME_RATE = 30

/** How long a verified array stays green (seconds) */
export const VERIFY_HOLD_SECONDS = 0.5
