/**
 * Display strings shared by the listing and the Live Activity payload
 */
export const PORTFOLIO_DISPLAY = {
  TITLE: 'My Portfolio',
  EQUITIES_SECTION_HEADER: 'My Equities',
  LABEL_SEPARATOR: ' · ',
} as const;

/**
 * Live Activity content-state emoji by direction of the daily change
 */
export const LIVE_ACTIVITY_EMOJI = {
  UP: '📈',
  DOWN: '📉',
  FLAT: '➖',
} as const;

export type LiveActivityEmoji = (typeof LIVE_ACTIVITY_EMOJI)[keyof typeof LIVE_ACTIVITY_EMOJI];
