import { EventEmitter } from "node:events"
import { Backoff, type BackoffOptions } from "./backoff.js"
import {
  AlreadyConnectedError,
  AuthRejectedError,
  MalformedMessageError,
  NotJoinedError,
  SessionClosedError,
  TransportError,
  describeError,
} from "./errors.js"
import {
  MAX_MESSAGE_LENGTH,
  classifyFrame,
  formatCapabilityRequest,
  formatJoin,
  formatNick,
  formatPass,
  formatPing,
  formatPong,
  formatPrivmsg,
  isAuthFailureNotice,
  normalizeChannel,
  parseIrcLine,
  sanitizeOutbound,
  type InboundFrame,
} from "./ircMessage.js"
import { OutboundQueue, type OutboundItem } from "./outboundQueue.js"
import type { Transport, TransportFactory } from "./transport.js"
import {
  TERMINAL_STATES,
  type ChatMessage,
  type ConnectionState,
  type OutboundTicket,
  type ReconnectReason,
  type SessionEvent,
  type SessionEventListener,
} from "./types.js"

export const DEFAULT_LIVENESS_TIMEOUT_MS = 300_000
export const DEFAULT_PING_GRACE_MS = 10_000
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 15_000

export interface ChatSessionOptions {
  readonly channel: string
  readonly token: string
  /** Login name; defaults to the channel, i.e. chatting as the broadcaster. */
  readonly nick?: string | null
  readonly transportFactory: TransportFactory
  readonly minSendIntervalMs?: number
  readonly maxSendAttempts?: number
  readonly backoff?: Partial<BackoffOptions>
  readonly livenessTimeoutMs?: number
  readonly pingGraceMs?: number
  readonly handshakeTimeoutMs?: number
  readonly now?: () => number
}

interface Deferred {
  readonly promise: Promise<void>
  readonly resolve: () => void
  readonly reject: (error: Error) => void
}

const createDeferred = (): Deferred => {
  let resolve: () => void = () => undefined
  let reject: (error: Error) => void = () => undefined
  const promise = new Promise<void>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

type TimerName = "reconnect" | "liveness" | "grace" | "handshake" | "send"

/**
 * One authenticated, joined connection to a chat channel. The lifecycle is an explicit state plus
 * named timers; transport callbacks, timer fires and `close()` are the only things that move it.
 * Callbacks from a torn-down transport are ignored via the generation counter.
 */
export class ChatSession extends EventEmitter {
  readonly channel: string
  readonly nick: string
  private readonly token: string
  private readonly transportFactory: TransportFactory
  private readonly queue: OutboundQueue
  private readonly backoff: Backoff
  private readonly livenessTimeoutMs: number
  private readonly pingGraceMs: number
  private readonly handshakeTimeoutMs: number
  private readonly now: () => number

  private stateValue: ConnectionState = "disconnected"
  private transport: Transport | null = null
  private openAbort: AbortController | null = null
  private generation = 0
  private readonly timers = new Map<TimerName, NodeJS.Timeout>()
  private connectDeferred: Deferred | null = null
  /** Queue id whose write has not settled yet; survives a transport swap. */
  private inFlightId: number | null = null
  private sequence = 0
  private lastActivity = 0
  private displayName: string | null = null
  private userColor: string | null = null

  constructor(options: ChatSessionOptions) {
    super()
    const channel = normalizeChannel(options.channel)
    const token = options.token.trim()
    if (!channel) throw new Error("A channel name is required.")
    if (!token) throw new Error("An access token is required.")
    this.channel = channel
    this.token = token
    this.nick = (options.nick?.trim() || channel).toLowerCase()
    this.transportFactory = options.transportFactory
    this.queue = new OutboundQueue({
      minIntervalMs: options.minSendIntervalMs,
      maxAttempts: options.maxSendAttempts,
    })
    this.backoff = new Backoff(options.backoff)
    this.livenessTimeoutMs = options.livenessTimeoutMs ?? DEFAULT_LIVENESS_TIMEOUT_MS
    this.pingGraceMs = options.pingGraceMs ?? DEFAULT_PING_GRACE_MS
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS
    this.now = options.now ?? Date.now
  }

  get state(): ConnectionState {
    return this.stateValue
  }

  get lastActivityAt(): number {
    return this.lastActivity
  }

  get pendingOutbound(): number {
    return this.queue.size
  }

  onEvent(listener: SessionEventListener): () => void {
    this.on("event", listener)
    return () => this.off("event", listener)
  }

  /**
   * Resolves on the first successful join. Repeated calls during a handshake share one promise;
   * transport failures are retried internally and do not reject it.
   */
  connect(): Promise<void> {
    if (this.stateValue === "closed") return Promise.reject(new SessionClosedError())
    if (this.stateValue === "auth_rejected") return Promise.reject(new AuthRejectedError("credential previously rejected"))
    if (this.stateValue === "joined") return Promise.reject(new AlreadyConnectedError(this.channel))
    if (this.connectDeferred) return this.connectDeferred.promise
    this.connectDeferred = createDeferred()
    const promise = this.connectDeferred.promise
    if (this.stateValue === "disconnected") {
      this.clearTimer("reconnect")
      this.beginAttempt()
    }
    return promise
  }

  sendMessage(text: string): OutboundTicket {
    if (this.stateValue !== "joined") {
      throw new NotJoinedError(this.stateValue)
    }
    const body = sanitizeOutbound(text)
    if (!body) throw new MalformedMessageError("Message is empty.")
    if (body.length > MAX_MESSAGE_LENGTH) {
      throw new MalformedMessageError(`Message exceeds ${MAX_MESSAGE_LENGTH} characters.`)
    }
    const { item, rateLimited } = this.queue.push(body, this.now())
    this.pumpOutbound()
    return { id: item.id, text: item.text, rateLimited }
  }

  close(): void {
    if (this.stateValue === "closed") return
    this.clearTimer("reconnect")
    this.teardownTransport()
    this.failQueued("session closed")
    this.setState("closed")
    const deferred = this.connectDeferred
    this.connectDeferred = null
    deferred?.reject(new SessionClosedError())
  }

  private notify(event: SessionEvent): void {
    this.emit("event", event)
  }

  private setState(next: ConnectionState): void {
    const previous = this.stateValue
    if (previous === next) return
    this.stateValue = next
    this.notify({ type: "state", state: next, previous })
  }

  private setTimer(name: TimerName, delayMs: number, fire: () => void): void {
    this.clearTimer(name)
    const handle = setTimeout(() => {
      this.timers.delete(name)
      fire()
    }, delayMs)
    this.timers.set(name, handle)
  }

  private clearTimer(name: TimerName): void {
    const handle = this.timers.get(name)
    if (handle) {
      clearTimeout(handle)
      this.timers.delete(name)
    }
  }

  private beginAttempt(): void {
    this.generation += 1
    const generation = this.generation
    const transport = this.transportFactory()
    const abort = new AbortController()
    this.transport = transport
    this.openAbort = abort
    this.setState("connecting")
    this.setTimer("handshake", this.handshakeTimeoutMs, () =>
      this.handleTransportFailure(new TransportError("Handshake timed out"), "handshake_timeout"),
    )

    void transport
      .open(
        {
          onLine: (line) => {
            if (generation === this.generation) this.handleLine(line)
          },
          onClose: (error) => {
            if (generation !== this.generation) return
            this.handleTransportFailure(error ?? new TransportError("Connection closed by server"), "transport")
          },
        },
        abort.signal,
      )
      .then(
        () => {
          if (generation !== this.generation) return
          this.openAbort = null
          this.setState("authenticating")
          this.touchActivity()
          this.write(formatCapabilityRequest())
        },
        (error: unknown) => {
          if (generation !== this.generation) return
          this.handleTransportFailure(error, "transport")
        },
      )
  }

  private write(line: string): void {
    const transport = this.transport
    if (!transport) return
    const generation = this.generation
    void transport.send(line).catch((error: unknown) => {
      if (generation === this.generation) this.handleTransportFailure(error, "transport")
    })
  }

  private touchActivity(): void {
    this.lastActivity = this.now()
    this.clearTimer("grace")
    this.setTimer("liveness", this.livenessTimeoutMs, () => this.pingForLiveness())
  }

  private pingForLiveness(): void {
    this.write(formatPing())
    this.setTimer("grace", this.pingGraceMs, () =>
      this.handleTransportFailure(new TransportError("Keepalive ping went unanswered"), "keepalive"),
    )
  }

  private handleLine(line: string): void {
    this.touchActivity()
    const message = parseIrcLine(line)
    if (!message) return
    this.handleFrame(classifyFrame(message))
  }

  private handleFrame(frame: InboundFrame): void {
    switch (frame.kind) {
      case "cap_ack":
        if (this.stateValue === "authenticating") {
          this.write(formatPass(this.token))
          this.write(formatNick(this.nick))
        }
        return
      case "welcome":
        this.beginJoin()
        return
      case "user_state":
        if (frame.displayName) this.displayName = frame.displayName
        if (frame.color) this.userColor = frame.color
        if (frame.global) this.beginJoin()
        return
      case "join":
        if (this.stateValue === "joining" && frame.nick === this.nick && frame.channel === this.channel) {
          this.completeJoin()
        }
        return
      case "room_state":
        if (this.stateValue === "joining" && frame.channel === this.channel) {
          this.completeJoin()
        }
        return
      case "chat":
        this.notify({ type: "message", message: this.nextMessage(frame.sender, frame.body, frame.channel, frame.color, false) })
        return
      case "keepalive":
        if (frame.direction === "ping") this.write(formatPong(frame.token))
        return
      case "notice":
        if (this.stateValue !== "joined" && isAuthFailureNotice(frame.text)) {
          this.handleAuthRejected(frame.text)
          return
        }
        this.notify({ type: "notice", text: frame.text, msgId: frame.msgId })
        return
      case "reconnect":
        this.handleReconnectRequest()
        return
      case "other":
        return
    }
  }

  private beginJoin(): void {
    if (this.stateValue !== "authenticating") return
    this.setState("joining")
    this.write(formatJoin(this.channel))
  }

  private completeJoin(): void {
    this.clearTimer("handshake")
    this.backoff.reset()
    this.setState("joined")
    const deferred = this.connectDeferred
    this.connectDeferred = null
    deferred?.resolve()
    this.pumpOutbound()
  }

  private nextMessage(sender: string, body: string, channel: string, color: string | null, self: boolean): ChatMessage {
    this.sequence += 1
    return Object.freeze({
      sequence: this.sequence,
      sender,
      body,
      channel,
      color,
      self,
      receivedAt: this.now(),
    })
  }

  private pumpOutbound(): void {
    if (this.inFlightId !== null || this.stateValue !== "joined" || !this.transport) return
    const head = this.queue.peek()
    if (!head) return
    const wait = this.queue.delayUntilNext(this.now())
    if (wait > 0) {
      if (!this.timers.has("send")) {
        this.setTimer("send", wait, () => this.pumpOutbound())
      }
      return
    }
    this.sendItem(this.transport, head)
  }

  private sendItem(transport: Transport, item: OutboundItem): void {
    const generation = this.generation
    this.inFlightId = item.id
    this.queue.noteAttempt(this.now())
    void transport.send(formatPrivmsg(this.channel, item.text)).then(
      () => {
        this.inFlightId = null
        // Already failed by close() or auth rejection.
        if (this.queue.markSent(item.id)) {
          this.notify({ type: "message_sent", id: item.id, text: item.text })
          this.notify({
            type: "message",
            message: this.nextMessage(this.displayName ?? this.nick, item.text, this.channel, this.userColor, true),
          })
        }
        this.pumpOutbound()
      },
      (error: unknown) => {
        this.inFlightId = null
        const dropped = this.queue.markFailed(item.id)
        if (dropped) {
          this.notify({ type: "message_failed", id: dropped.id, text: dropped.text, reason: describeError(error) })
        }
        if (generation === this.generation) {
          this.handleTransportFailure(error, "transport")
        } else {
          this.pumpOutbound()
        }
      },
    )
  }

  private teardownTransport(): void {
    this.generation += 1
    this.openAbort?.abort()
    this.openAbort = null
    this.transport?.close()
    this.transport = null
    for (const name of ["liveness", "grace", "handshake", "send"] as const) {
      this.clearTimer(name)
    }
  }

  private handleTransportFailure(error: unknown, reason: ReconnectReason): void {
    if (TERMINAL_STATES.has(this.stateValue)) return
    this.teardownTransport()
    this.notify({ type: "transport_error", message: describeError(error) })
    this.setState("disconnected")
    this.scheduleReconnect(reason)
  }

  private scheduleReconnect(reason: ReconnectReason): void {
    const delayMs = this.backoff.next()
    this.notify({ type: "reconnect_scheduled", attempt: this.backoff.attempt, delayMs, reason })
    this.setTimer("reconnect", delayMs, () => this.beginAttempt())
  }

  private handleReconnectRequest(): void {
    this.teardownTransport()
    this.setState("disconnected")
    this.notify({ type: "reconnect_scheduled", attempt: 0, delayMs: 0, reason: "server_request" })
    this.beginAttempt()
  }

  private handleAuthRejected(notice: string): void {
    this.clearTimer("reconnect")
    this.teardownTransport()
    this.failQueued("authentication rejected")
    this.setState("auth_rejected")
    this.notify({ type: "auth_rejected", notice })
    const deferred = this.connectDeferred
    this.connectDeferred = null
    deferred?.reject(new AuthRejectedError(notice))
  }

  private failQueued(reason: string): void {
    for (const item of this.queue.drain()) {
      this.notify({ type: "message_failed", id: item.id, text: item.text, reason })
    }
  }
}
