export type RegisterSink = (content: string) => void

/**
 * Single-slot clipboard for `yy` / `dd`. Each write replaces the previous content; an optional
 * sink mirrors writes elsewhere (the system clipboard) without affecting the slot.
 */
export class Register {
  private content: string | null = null
  private readonly sink?: RegisterSink

  constructor(sink?: RegisterSink) {
    this.sink = sink
  }

  write(content: string): void {
    this.content = content
    this.sink?.(content)
  }

  read(): string | null {
    return this.content
  }

  isEmpty(): boolean {
    return this.content === null
  }
}
