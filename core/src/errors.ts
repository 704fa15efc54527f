/**
 * Error kinds raised by the color engine.
 *
 * Every error carries a stable `code` so hosts can branch on it without
 * matching message text.
 */

export type ColorErrorCode =
  | 'SCANNING_AMBIGUITY'
  | 'DEFINITION_CONFLICT'
  | 'INVALID_DEFINITION'
  | 'MALFORMED_STATE'
  | 'CONTRACT_VIOLATION'

export class ColorError extends Error {
  readonly code: ColorErrorCode

  constructor(code: ColorErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * The asset carried by a transaction could not be determined before the
 * chain moved past it.
 */
export class ScanningError extends ColorError {
  readonly txid: string

  constructor(txid: string, message = `Could not determine the assets of ${txid}`) {
    super('SCANNING_AMBIGUITY', message)
    this.txid = txid
  }
}

export class ColorDefinitionError extends ColorError {
  constructor(message: string, code: 'DEFINITION_CONFLICT' | 'INVALID_DEFINITION' = 'INVALID_DEFINITION') {
    super(code, message)
  }
}

export class MalformedStateError extends ColorError {
  constructor(message: string) {
    super('MALFORMED_STATE', message)
  }
}

/** A caller broke a precondition. Not recoverable. */
export class ContractViolationError extends ColorError {
  constructor(message: string) {
    super('CONTRACT_VIOLATION', message)
  }
}

export function assertContract(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new ContractViolationError(message)
  }
}

/**
 * Turn anything thrown by the engine into a short, human readable message.
 */
export const formatColorError = (error: unknown, fallback: string = 'Something went wrong!'): string => {
  if (error instanceof ScanningError) {
    return 'Asset could not be identified before the block was finalized'
  }
  if (error instanceof ColorDefinitionError) {
    return error.code === 'DEFINITION_CONFLICT'
      ? `Asset definition conflict: ${error.message}`
      : `Invalid asset definition: ${error.message}`
  }
  if (error instanceof MalformedStateError) {
    return `Stored color state could not be loaded: ${error.message}`
  }

  const rawMessage = error instanceof Error ? error.message : String(error ?? '')
  if (!rawMessage) return fallback
  return rawMessage.length < 120 && !rawMessage.includes('{') ? rawMessage : fallback
}
