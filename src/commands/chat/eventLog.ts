import { createWriteStream, promises as fs } from "node:fs"
import path from "node:path"
import type { ChatSession } from "../../protocol/session.js"
import type { SessionEvent } from "../../protocol/types.js"
import { debugLog } from "../../util/debugLog.js"

export interface EventLogHandle {
  readonly stop: () => Promise<void>
}

const summarizeEvent = (event: SessionEvent): Record<string, unknown> => {
  if (event.type === "message") {
    const { sequence, sender, channel, self, body } = event.message
    return { type: event.type, sequence, sender, channel, self, length: body.length }
  }
  return { ...event }
}

/** Appends every session event to `logPath` as one JSON line. Message bodies are not written. */
export const startEventLog = async (session: ChatSession, logPath: string | null): Promise<EventLogHandle> => {
  if (!logPath) {
    return { stop: async () => undefined }
  }
  await fs.mkdir(path.dirname(logPath), { recursive: true })
  const stream = createWriteStream(logPath, { flags: "a" })
  stream.on("error", (error) => debugLog("event-log", { writeError: String(error), logPath }))

  const unsubscribe = session.onEvent((event) => {
    stream.write(`${JSON.stringify({ timestamp: Date.now(), ...summarizeEvent(event) })}\n`)
  })

  return {
    stop: async () => {
      unsubscribe()
      await new Promise<void>((resolve) => stream.end(() => resolve()))
    },
  }
}
