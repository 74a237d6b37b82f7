export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "authenticating"
  | "joining"
  | "joined"
  | "auth_rejected"
  | "closed"

export const TERMINAL_STATES: ReadonlySet<ConnectionState> = new Set(["auth_rejected", "closed"])

export interface ChatMessage {
  readonly sequence: number
  readonly sender: string
  readonly body: string
  readonly channel: string
  readonly color: string | null
  /** Local echo of a message this client sent. */
  readonly self: boolean
  readonly receivedAt: number
}

export interface OutboundTicket {
  readonly id: number
  readonly text: string
  /** Held back by the send interval rather than written immediately. */
  readonly rateLimited: boolean
}

export type ReconnectReason = "transport" | "keepalive" | "handshake_timeout" | "server_request"

export type SessionEvent =
  | { readonly type: "state"; readonly state: ConnectionState; readonly previous: ConnectionState }
  | { readonly type: "message"; readonly message: ChatMessage }
  | { readonly type: "notice"; readonly text: string; readonly msgId: string | null }
  | {
      readonly type: "reconnect_scheduled"
      readonly attempt: number
      readonly delayMs: number
      readonly reason: ReconnectReason
    }
  | { readonly type: "message_sent"; readonly id: number; readonly text: string }
  | { readonly type: "message_failed"; readonly id: number; readonly text: string; readonly reason: string }
  | { readonly type: "auth_rejected"; readonly notice: string }
  | { readonly type: "transport_error"; readonly message: string }

export type SessionEventListener = (event: SessionEvent) => void
