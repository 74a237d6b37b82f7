import { EventEmitter } from "node:events"
import { ChatHistory } from "../../history/chatHistory.js"
import { ModalInputMachine } from "../../editor/modalMachine.js"
import type {
  BufferSnapshot,
  EditorOutcome,
  KeyEvent,
  Mode,
  PendingPrefix,
  RejectionReason,
} from "../../editor/types.js"
import {
  AlreadyConnectedError,
  AuthRejectedError,
  MalformedMessageError,
  NotJoinedError,
  SessionClosedError,
} from "../../protocol/errors.js"
import type { ChatSession } from "../../protocol/session.js"
import { TERMINAL_STATES, type ChatMessage, type ConnectionState, type SessionEvent } from "../../protocol/types.js"
import { debugLog } from "../../util/debugLog.js"

const MAX_HINTS = 6
export const DEFAULT_MAX_HELD = 50

export interface ChatStats {
  readonly received: number
  readonly sent: number
  readonly failed: number
  readonly reconnects: number
  readonly rejectedInputs: number
}

export interface ChatViewState {
  readonly channel: string
  readonly nick: string
  readonly connection: ConnectionState
  readonly status: string
  readonly history: readonly ChatMessage[]
  readonly historyVersion: number
  readonly composer: BufferSnapshot
  readonly mode: Mode
  readonly pending: PendingPrefix
  readonly register: string | null
  readonly hints: string[]
  readonly heldMessages: number
  readonly pendingOutbound: number
  readonly lastRejection: RejectionReason | null
  readonly stats: ChatStats
  readonly stopped: boolean
}

export interface ChatClientControllerOptions {
  readonly session: ChatSession
  readonly history?: ChatHistory
  readonly machine?: ModalInputMachine
  readonly maxHeld?: number
}

type StateListener = (state: ChatViewState) => void

export const describeConnection = (state: ConnectionState, channel: string): string => {
  switch (state) {
    case "disconnected":
      return "Disconnected"
    case "connecting":
      return "Connecting…"
    case "authenticating":
      return "Authenticating…"
    case "joining":
      return `Joining #${channel}…`
    case "joined":
      return `Joined #${channel}`
    case "auth_rejected":
      return "Authentication rejected"
    case "closed":
      return "Closed"
  }
}

/**
 * Glue between the key path and the network path. `handleKey` stays synchronous: submitted text is
 * handed to the session's outbound queue and never awaited here.
 */
export class ChatClientController extends EventEmitter {
  private readonly session: ChatSession
  private readonly history: ChatHistory
  private readonly machine: ModalInputMachine
  private readonly maxHeld: number
  private readonly hints: string[] = []
  private readonly held: string[] = []
  private stats: ChatStats = { received: 0, sent: 0, failed: 0, reconnects: 0, rejectedInputs: 0 }
  private lastRejection: RejectionReason | null = null
  private status: string
  private emitScheduled = false
  private stopped = false
  private unsubscribe: (() => void) | null = null
  private resolveStopped: () => void = () => undefined
  private readonly stoppedPromise: Promise<void>

  constructor(options: ChatClientControllerOptions) {
    super()
    this.session = options.session
    this.history = options.history ?? new ChatHistory()
    this.machine = options.machine ?? new ModalInputMachine()
    this.maxHeld = Math.max(1, options.maxHeld ?? DEFAULT_MAX_HELD)
    this.status = describeConnection(this.session.state, this.session.channel)
    this.stoppedPromise = new Promise<void>((resolve) => {
      this.resolveStopped = resolve
    })
  }

  getState(): ChatViewState {
    const editor = this.machine.snapshot()
    return {
      channel: this.session.channel,
      nick: this.session.nick,
      connection: this.session.state,
      status: this.status,
      history: this.history.snapshot(),
      historyVersion: this.history.version,
      composer: { text: editor.text, cursor: editor.cursor },
      mode: editor.mode,
      pending: editor.pending,
      register: editor.register,
      hints: [...this.hints],
      heldMessages: this.held.length,
      pendingOutbound: this.session.pendingOutbound,
      lastRejection: this.lastRejection,
      stats: { ...this.stats },
      stopped: this.stopped,
    }
  }

  onChange(listener: StateListener): () => void {
    this.on("change", listener)
    listener(this.getState())
    return () => this.off("change", listener)
  }

  /** Subscribes to the session and starts the handshake. Resolves once joined or given up. */
  async start(): Promise<void> {
    if (!this.unsubscribe) {
      this.unsubscribe = this.session.onEvent((event) => this.applySessionEvent(event))
    }
    try {
      await this.session.connect()
    } catch (error) {
      if (error instanceof AuthRejectedError) {
        this.pushHint(error.message)
        return
      }
      if (error instanceof AlreadyConnectedError) {
        this.pushHint(error.message)
        return
      }
      if (error instanceof SessionClosedError) return
      throw error
    }
  }

  async stop(): Promise<void> {
    if (this.stopped) return
    this.stopped = true
    this.session.close()
    this.failHeld("session closed")
    this.unsubscribe?.()
    this.unsubscribe = null
    this.emitChange()
    this.resolveStopped()
  }

  async untilStopped(): Promise<void> {
    await this.stoppedPromise
  }

  handleKey(event: KeyEvent): EditorOutcome {
    if (this.stopped) return { kind: "noop" }
    const outcome = this.machine.dispatch(event)
    switch (outcome.kind) {
      case "changed":
        this.lastRejection = null
        this.emitChange()
        break
      case "rejected":
        this.lastRejection = outcome.reason
        this.stats = { ...this.stats, rejectedInputs: this.stats.rejectedInputs + 1 }
        debugLog("input", { rejected: outcome.reason, key: event.kind === "char" ? event.char : event.kind })
        this.emitChange()
        break
      case "submit":
        this.lastRejection = null
        this.submit(outcome.text)
        this.emitChange()
        break
      case "quit":
        void this.stop()
        break
      case "noop":
        break
    }
    return outcome
  }

  handleKeys(events: readonly KeyEvent[]): void {
    for (const event of events) {
      this.handleKey(event)
    }
  }

  private submit(text: string): void {
    try {
      const ticket = this.session.sendMessage(text)
      if (ticket.rateLimited) {
        this.pushHint(`Rate limited; message queued (${this.session.pendingOutbound} pending).`)
      }
    } catch (error) {
      if (error instanceof NotJoinedError) {
        if (TERMINAL_STATES.has(error.state)) {
          this.markUndelivered(text, describeConnection(error.state, this.session.channel).toLowerCase())
        } else {
          this.hold(text)
        }
        return
      }
      if (error instanceof MalformedMessageError) {
        this.pushHint(error.message)
        return
      }
      throw error
    }
  }

  private hold(text: string): void {
    if (this.held.length >= this.maxHeld) {
      const dropped = this.held.shift()
      this.stats = { ...this.stats, failed: this.stats.failed + 1 }
      this.pushHint(`Held queue full; discarded "${dropped ?? ""}".`)
    }
    this.held.push(text)
    this.pushHint(`Not joined yet; holding message until #${this.session.channel} is joined.`)
  }

  private markUndelivered(text: string, reason: string): void {
    this.stats = { ...this.stats, failed: this.stats.failed + 1 }
    this.pushHint(`Message not delivered (${reason}): ${text}`)
  }

  /** Nothing will be joined again; what was held can only fail. */
  private failHeld(reason: string): void {
    for (const text of this.held.splice(0)) {
      this.markUndelivered(text, reason)
    }
  }

  private flushHeld(): void {
    while (this.held.length > 0 && this.session.state === "joined") {
      const text = this.held.shift()
      if (text === undefined) break
      this.submit(text)
    }
  }

  private applySessionEvent(event: SessionEvent): void {
    switch (event.type) {
      case "state":
        this.status = describeConnection(event.state, this.session.channel)
        if (event.state === "joined") this.flushHeld()
        break
      case "message":
        this.history.append(event.message)
        if (!event.message.self) {
          this.stats = { ...this.stats, received: this.stats.received + 1 }
        }
        break
      case "notice":
        this.pushHint(`Notice: ${event.text}`)
        break
      case "reconnect_scheduled":
        this.stats = { ...this.stats, reconnects: this.stats.reconnects + 1 }
        this.pushHint(
          event.reason === "server_request"
            ? "Server requested a reconnect; reconnecting now."
            : `Connection lost (${event.reason.replace(/_/g, " ")}). Reconnecting in ${event.delayMs}ms (attempt ${event.attempt}).`,
        )
        break
      case "message_sent":
        this.stats = { ...this.stats, sent: this.stats.sent + 1 }
        break
      case "message_failed":
        this.markUndelivered(event.text, event.reason)
        break
      case "auth_rejected":
        this.status = "Authentication rejected"
        this.failHeld("authentication rejected")
        break
      case "transport_error":
        debugLog("session", { transportError: event.message })
        break
    }
    this.emitChange()
  }

  private pushHint(message: string): void {
    this.hints.push(message)
    if (this.hints.length > MAX_HINTS) this.hints.shift()
    this.emitChange()
  }

  private emitChange(): void {
    if (this.emitScheduled) return
    this.emitScheduled = true
    queueMicrotask(() => {
      this.emitScheduled = false
      this.emit("change", this.getState())
    })
  }
}
