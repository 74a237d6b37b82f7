import { createConnection, type Socket } from "node:net"
import { TransportError } from "./errors.js"

export interface TransportHandlers {
  readonly onLine: (line: string) => void
  /** Fires once when the peer or the network ends the connection; not after `close()`. */
  readonly onClose: (error: Error | null) => void
}

export interface Transport {
  open(handlers: TransportHandlers, signal?: AbortSignal): Promise<void>
  send(line: string): Promise<void>
  close(): void
}

export type TransportFactory = () => Transport

/** Splits a byte stream into CRLF (or bare LF) terminated lines, holding partial tails. */
export class LineDecoder {
  private pending = ""

  push(chunk: string): string[] {
    this.pending += chunk
    const lines: string[] = []
    let newline = this.pending.indexOf("\n")
    while (newline !== -1) {
      const line = this.pending.slice(0, newline).replace(/\r$/, "")
      this.pending = this.pending.slice(newline + 1)
      if (line.length > 0) lines.push(line)
      newline = this.pending.indexOf("\n")
    }
    return lines
  }

  reset(): void {
    this.pending = ""
  }
}

export interface TcpTransportOptions {
  readonly host: string
  readonly port: number
}

export class TcpTransport implements Transport {
  private socket: Socket | null = null
  private closedByUs = false
  private readonly decoder = new LineDecoder()

  constructor(private readonly options: TcpTransportOptions) {}

  open(handlers: TransportHandlers, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new TransportError("Connect aborted"))
    }
    return new Promise<void>((resolve, reject) => {
      const socket = createConnection({ host: this.options.host, port: this.options.port })
      this.socket = socket
      socket.setEncoding("utf8")
      socket.setNoDelay(true)
      let connected = false
      let lastError: Error | null = null

      const onAbort = () => {
        socket.destroy()
        if (!connected) reject(new TransportError("Connect aborted"))
      }
      signal?.addEventListener("abort", onAbort, { once: true })

      socket.once("connect", () => {
        connected = true
        signal?.removeEventListener("abort", onAbort)
        resolve()
      })
      socket.on("data", (chunk: string) => {
        for (const line of this.decoder.push(chunk)) {
          handlers.onLine(line)
        }
      })
      socket.on("error", (error) => {
        lastError = error
        if (!connected) {
          signal?.removeEventListener("abort", onAbort)
          reject(new TransportError(`Connect to ${this.options.host}:${this.options.port} failed: ${error.message}`, error))
        }
      })
      socket.once("close", () => {
        this.decoder.reset()
        if (connected && !this.closedByUs) {
          handlers.onClose(lastError)
        }
      })
    })
  }

  send(line: string): Promise<void> {
    const socket = this.socket
    if (!socket || socket.destroyed) {
      return Promise.reject(new TransportError("Socket is not open"))
    }
    return new Promise<void>((resolve, reject) => {
      socket.write(`${line}\r\n`, (error) => {
        if (error) {
          reject(new TransportError(`Write failed: ${error.message}`, error))
          return
        }
        resolve()
      })
    })
  }

  close(): void {
    this.closedByUs = true
    this.socket?.destroy()
    this.socket = null
  }
}

export const createTcpTransportFactory =
  (options: TcpTransportOptions): TransportFactory =>
  () =>
    new TcpTransport(options)
