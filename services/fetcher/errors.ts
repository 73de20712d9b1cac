export type ErrorStage = 'argument' | 'transport' | 'response' | 'persistence'

export class MarketDataError extends Error {
  readonly stage: ErrorStage
  constructor(stage: ErrorStage, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.stage = stage
  }
}

// Bad symbol/limit/interval, raised before any request goes out
export class InvalidArgumentError extends MarketDataError {
  constructor(message: string) {
    super('argument', message)
  }
}

export class TransportError extends MarketDataError {
  readonly path: string
  readonly timeout: boolean
  constructor(path: string, message: string, opts: { timeout?: boolean; cause?: unknown } = {}) {
    super('transport', message, { cause: opts.cause })
    this.path = path
    this.timeout = opts.timeout ?? false
  }
}

export class ResponseError extends MarketDataError {
  readonly path: string
  readonly statusCode: number | null
  readonly apiCode: number | null
  constructor(path: string, message: string, opts: { statusCode?: number; apiCode?: number; cause?: unknown } = {}) {
    super('response', message, { cause: opts.cause })
    this.path = path
    this.statusCode = opts.statusCode ?? null
    this.apiCode = opts.apiCode ?? null
  }
}

export class PersistenceError extends MarketDataError {
  readonly target: string
  constructor(target: string, message: string, cause?: unknown) {
    super('persistence', message, { cause })
    this.target = target
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
