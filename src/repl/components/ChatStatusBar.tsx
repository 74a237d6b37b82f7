import React from "react"
import { Box, Text } from "ink"
import chalk from "chalk"
import type { ChatViewState } from "../../commands/chat/controller.js"
import { BRAND_COLORS, ICONS, SEMANTIC_COLORS } from "../designSystem.js"

const coloredDot = (active: boolean, color: string) => chalk.hex(color)(active ? ICONS.bullet : ICONS.hollowBullet)

const connectionColor = (connection: ChatViewState["connection"]): string => {
  switch (connection) {
    case "joined":
      return SEMANTIC_COLORS.success
    case "auth_rejected":
    case "closed":
      return SEMANTIC_COLORS.error
    default:
      return SEMANTIC_COLORS.warning
  }
}

interface ChatStatusBarProps {
  readonly state: ChatViewState
}

export const ChatStatusBar: React.FC<ChatStatusBarProps> = ({ state }) => {
  const { stats } = state
  return (
    <Box flexDirection="column">
      <Text>
        {coloredDot(true, connectionColor(state.connection))} {state.status}  {coloredDot(true, BRAND_COLORS.skyBlue)} as{" "}
        {chalk.bold(state.nick)}  {coloredDot(stats.received > 0, BRAND_COLORS.violet)} recv {stats.received}{" "}
        {coloredDot(stats.sent > 0, BRAND_COLORS.mint)} sent {stats.sent}{" "}
        {coloredDot(state.pendingOutbound + state.heldMessages > 0, BRAND_COLORS.amber)} queued{" "}
        {state.pendingOutbound + state.heldMessages}
        {stats.failed > 0 ? `  ${coloredDot(true, SEMANTIC_COLORS.error)} failed ${stats.failed}` : ""}
      </Text>
      <Text>{chalk.hex(SEMANTIC_COLORS.muted)("─".repeat(48))}</Text>
    </Box>
  )
}
