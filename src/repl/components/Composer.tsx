import React from "react"
import { Box, Text } from "ink"
import chalk from "chalk"
import type { BufferSnapshot, Mode, PendingPrefix, RejectionReason } from "../../editor/types.js"
import { ICONS, MODE_COLORS, SEMANTIC_COLORS } from "../designSystem.js"
import { splitAtCursor } from "../viewUtils.js"

interface ComposerProps {
  readonly composer: BufferSnapshot
  readonly mode: Mode
  readonly pending: PendingPrefix
  readonly hint: string | null
  readonly rejection: RejectionReason | null
}

const modeBadge = (mode: Mode, pending: PendingPrefix): string => {
  const label = mode === "insert" ? "INSERT" : "NORMAL"
  const suffix = pending === "none" ? "" : ` ${pending}`
  return chalk.hex(MODE_COLORS[mode]).bold(`-- ${label}${suffix} --`)
}

const REJECTION_LABELS: Record<RejectionReason, string> = {
  "unsupported-character": "unsupported character",
  "unmapped-key": "no such command",
}

export const Composer: React.FC<ComposerProps> = ({ composer, mode, pending, hint, rejection }) => {
  const { before, at, after } = splitAtCursor(composer)
  return (
    <Box flexDirection="column">
      <Text>
        {chalk.hex(MODE_COLORS[mode])(ICONS.chevron)} {before}
        {chalk.inverse(at)}
        {after}
      </Text>
      <Text>
        {modeBadge(mode, pending)}
        {rejection ? `  ${chalk.hex(SEMANTIC_COLORS.warning)(REJECTION_LABELS[rejection])}` : ""}
        {hint ? `  ${chalk.hex(SEMANTIC_COLORS.muted)(hint)}` : ""}
      </Text>
    </Box>
  )
}
