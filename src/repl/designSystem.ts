export const BRAND_COLORS = {
  signalRed: "#ff4d6d",
  amber: "#ed840f",
  mint: "#2ee59d",
  skyBlue: "#4da3ff",
  violet: "#a855f7",
} as const

export const NEUTRAL_COLORS = {
  offWhite: "#dcdce1",
  midGray: "#8c8c96",
  dimGray: "#64646e",
} as const

export const SEMANTIC_COLORS = {
  sender: BRAND_COLORS.skyBlue,
  self: BRAND_COLORS.violet,
  body: NEUTRAL_COLORS.offWhite,
  success: BRAND_COLORS.mint,
  error: BRAND_COLORS.signalRed,
  warning: BRAND_COLORS.amber,
  muted: NEUTRAL_COLORS.dimGray,
} as const

export const MODE_COLORS = {
  normal: BRAND_COLORS.skyBlue,
  insert: BRAND_COLORS.mint,
} as const

export const ICONS = {
  chevron: "❯",
  bullet: "●",
  hollowBullet: "○",
} as const

const HEX_COLOR = /^#[0-9a-f]{6}$/i

/** Chat colors come from the server as `#RRGGBB`; anything else falls back to the default. */
export const resolveSenderColor = (color: string | null, self: boolean): string => {
  if (color && HEX_COLOR.test(color)) return color
  return self ? SEMANTIC_COLORS.self : SEMANTIC_COLORS.sender
}
