import clipboardy from "clipboardy"
import { debugLog } from "./debugLog.js"

const FAKE_ENV = "MODALCHAT_FAKE_CLIPBOARD"

let fakeClipboard: string | null = null

/** Test hook: the last text written while `MODALCHAT_FAKE_CLIPBOARD=1`. */
export const readFakeClipboard = (): string | null => fakeClipboard

export const writeClipboardText = async (text: string): Promise<void> => {
  if (process.env[FAKE_ENV] === "1") {
    fakeClipboard = text
    return
  }
  await clipboardy.write(text)
}

/** Register sink. Fire-and-forget; a missing clipboard tool only shows up in the debug log. */
export const mirrorToClipboard = (text: string): void => {
  writeClipboardText(text).catch((error: unknown) => {
    debugLog("clipboard", { writeError: String(error) })
  })
}
