import React from "react"
import { Box, Text } from "ink"
import chalk from "chalk"
import type { ChatMessage } from "../../protocol/types.js"
import { resolveSenderColor, SEMANTIC_COLORS } from "../designSystem.js"
import { visibleMessages } from "../viewUtils.js"

interface MessageListProps {
  readonly messages: readonly ChatMessage[]
  readonly rows: number
  /** `ChatHistory.version` of `messages`; the list redraws only when it or `rows` changes. */
  readonly version: number
}

const MessageListView: React.FC<MessageListProps> = ({ messages, rows }) => {
  const visible = visibleMessages(messages, rows)
  if (visible.length === 0) {
    return (
      <Box flexDirection="column" height={rows}>
        <Text>{chalk.hex(SEMANTIC_COLORS.muted)("No messages yet.")}</Text>
      </Box>
    )
  }
  return (
    <Box flexDirection="column" height={rows}>
      {visible.map((message) => (
        <Text key={message.sequence} wrap="truncate-end">
          {chalk.hex(resolveSenderColor(message.color, message.self)).bold(message.sender)}
          {chalk.hex(SEMANTIC_COLORS.muted)(":")} {message.body}
        </Text>
      ))}
    </Box>
  )
}

export const MessageList = React.memo(
  MessageListView,
  (previous, next) => previous.version === next.version && previous.rows === next.rows,
)
