import React from "react"
import { Box, useInput, useStdout } from "ink"
import type { ChatViewState } from "../../commands/chat/controller.js"
import { decodeInkInput } from "../../editor/keymap.js"
import type { KeyEvent } from "../../editor/types.js"
import { messageRowsFor } from "../viewUtils.js"
import { ChatStatusBar } from "./ChatStatusBar.js"
import { Composer } from "./Composer.js"
import { MessageList } from "./MessageList.js"

const DEFAULT_TERMINAL_ROWS = 24

interface ChatViewProps {
  readonly state: ChatViewState
  readonly onKeys: (events: readonly KeyEvent[]) => void
  readonly rows?: number
}

export const ChatView: React.FC<ChatViewProps> = ({ state, onKeys, rows }) => {
  const { stdout } = useStdout()
  const terminalRows = rows ?? stdout.rows ?? DEFAULT_TERMINAL_ROWS

  useInput(
    (input, key) => {
      const events = decodeInkInput(input, key)
      if (events.length > 0) onKeys(events)
    },
    { isActive: !state.stopped },
  )

  const hint = state.hints.length > 0 ? state.hints[state.hints.length - 1] : null

  return (
    <Box flexDirection="column">
      <ChatStatusBar state={state} />
      <MessageList messages={state.history} version={state.historyVersion} rows={messageRowsFor(terminalRows)} />
      <Composer composer={state.composer} mode={state.mode} pending={state.pending} hint={hint} rejection={state.lastRejection} />
    </Box>
  )
}
