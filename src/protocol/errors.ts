import type { ConnectionState } from "./types.js"

export type ChatErrorCode =
  | "NOT_JOINED"
  | "ALREADY_CONNECTED"
  | "TRANSPORT_FAILURE"
  | "AUTH_REJECTED"
  | "SESSION_CLOSED"
  | "MALFORMED_MESSAGE"

export class ChatSessionError extends Error {
  readonly code: ChatErrorCode

  constructor(message: string, code: ChatErrorCode, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "ChatSessionError"
    this.code = code
  }
}

export class NotJoinedError extends ChatSessionError {
  readonly state: ConnectionState

  constructor(state: ConnectionState) {
    super(`Cannot send while ${state}; the channel has not been joined yet.`, "NOT_JOINED")
    this.name = "NotJoinedError"
    this.state = state
  }
}

export class AlreadyConnectedError extends ChatSessionError {
  constructor(channel: string) {
    super(`Already joined #${channel}.`, "ALREADY_CONNECTED")
    this.name = "AlreadyConnectedError"
  }
}

export class TransportError extends ChatSessionError {
  constructor(message: string, cause?: unknown) {
    super(message, "TRANSPORT_FAILURE", cause === undefined ? undefined : { cause })
    this.name = "TransportError"
  }
}

export class AuthRejectedError extends ChatSessionError {
  readonly notice: string

  constructor(notice: string) {
    super(`Authentication rejected: ${notice}`, "AUTH_REJECTED")
    this.name = "AuthRejectedError"
    this.notice = notice
  }
}

export class SessionClosedError extends ChatSessionError {
  constructor() {
    super("Session closed.", "SESSION_CLOSED")
    this.name = "SessionClosedError"
  }
}

export class MalformedMessageError extends ChatSessionError {
  constructor(reason: string) {
    super(reason, "MALFORMED_MESSAGE")
    this.name = "MalformedMessageError"
  }
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error))
