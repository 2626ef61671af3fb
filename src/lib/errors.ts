export type ErrorDetails = Record<string, unknown> | undefined

export class AppError extends Error {
  readonly code: string
  readonly details: ErrorDetails
  readonly exitCode: number

  constructor(code: string, message: string, details?: ErrorDetails, exitCode = 1, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.details = details
    this.exitCode = exitCode
  }
}

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error)
}

// Wrapped errors read `<context>: <cause message>` and keep the original as `cause`.
function wrapMessage(context: string, cause: unknown) {
  return cause === undefined ? context : `${context}: ${describeError(cause)}`
}

export class ConfigError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super('CONFIG_ERROR', message, details, 2)
  }
}

export class ConnectionError extends AppError {
  constructor(context: string, cause: unknown, details?: ErrorDetails) {
    super('AGENT_CONNECTION_FAILED', wrapMessage(context, cause), details, 1, { cause })
  }
}

export class AgentListError extends AppError {
  constructor(context: string, cause: unknown) {
    super('AGENT_LIST_FAILED', wrapMessage(context, cause), undefined, 1, { cause })
  }
}

export class SigningError extends AppError {
  constructor(context: string, cause: unknown, details?: ErrorDetails) {
    super('SIGNING_FAILED', wrapMessage(context, cause), details, 1, { cause })
  }
}

export class KeyNotFoundError extends AppError {
  constructor(fingerprint: string) {
    super('KEY_NOT_FOUND', `No key in the SSH agent matches fingerprint: ${fingerprint}`, { fingerprint })
  }
}

export class UnsupportedAlgorithmError extends AppError {
  constructor(format: string) {
    super('UNSUPPORTED_ALGORITHM', `Unsupported algorithm from SSH agent: ${format}`, { format })
  }
}

export class SignatureDecodeError extends AppError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super('SIGNATURE_DECODE_FAILED', wrapMessage(message, cause), details, 1, { cause })
  }
}

export class WireFormatError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super('MALFORMED_WIRE_DATA', message, details)
  }
}

export class AgentRequestError extends AppError {
  constructor(request: string) {
    super('AGENT_REQUEST_FAILED', `SSH agent refused ${request} request`, { request })
  }
}

export class AgentProtocolError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super('AGENT_PROTOCOL_ERROR', message, details)
  }
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error

  if (error instanceof Error) {
    return new AppError('UNEXPECTED_ERROR', error.message, undefined, 1, { cause: error })
  }

  return new AppError('UNEXPECTED_ERROR', String(error))
}
