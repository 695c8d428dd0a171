export type TonErrorKind =
  // builder overflow
  | 'CapacityExceeded'
  | 'TooManyReferences'
  // parser starvation
  | 'BufferUnderflow'
  | 'RefUnderflow'
  | 'UnexpectedData'
  | 'MalformedBoc'
  | 'CorruptDict'
  | 'InvalidExoticCell'
  // addresses
  | 'InvalidChecksum'
  | 'InvalidLength'
  | 'InvalidWorkchain'
  | 'InvalidAddress'
  | 'InvalidMnemonic'
  // unrecognized TL-B tag or prefix
  | 'SchemaMismatch'
  | 'InvalidArgument'

export class TonError extends Error {
  readonly kind: TonErrorKind

  constructor(kind: TonErrorKind, message: string, options?: { cause?: unknown }) {
    super(`${kind}: ${message}`, options)
    this.name = 'TonError'
    this.kind = kind
  }
}

export const isTonError = (error: unknown, kind?: TonErrorKind): error is TonError =>
  error instanceof TonError && (kind === undefined || error.kind === kind)

// Runs `fn` and re-tags any TonError it throws as `kind`, keeping the original as `cause`.
export function rethrowAs<T>(kind: TonErrorKind, context: string, fn: () => T): T {
  try {
    return fn()
  } catch (error) {
    if (error instanceof TonError) {
      if (error.kind === kind) throw error
      throw new TonError(kind, `${context}: ${error.message}`, { cause: error })
    }
    throw error
  }
}
