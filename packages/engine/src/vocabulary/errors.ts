/**
 * Engine Errors
 *
 * Every failure the engine raises carries a stable `code` so callers can
 * branch without string matching. Recoverable errors (unclassified beats,
 * corrupt override store) are still errors; the caller decides to continue.
 */

export const engineErrorCodes = {
  invalidLocation: 'INVALID_LOCATION',
  unknownMotionType: 'UNKNOWN_MOTION_TYPE',
  turnsValidation: 'TURNS_VALIDATION',
  unclassifiedPictograph: 'UNCLASSIFIED_PICTOGRAPH',
  overrideStoreCorrupt: 'OVERRIDE_STORE_CORRUPT',
  capInvariant: 'CAP_INVARIANT',
  capPrecondition: 'CAP_PRECONDITION',
  datasetValidation: 'DATASET_VALIDATION',
} as const

export type EngineErrorCode = (typeof engineErrorCodes)[keyof typeof engineErrorCodes]

export class BeatEngineError extends Error {
  readonly code: EngineErrorCode

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * A geometry lookup missed: the motion carries a location the table does not know
 */
export class InvalidLocation extends BeatEngineError {
  readonly value: unknown

  constructor(value: unknown, context: string) {
    super(engineErrorCodes.invalidLocation, `Invalid location ${JSON.stringify(value)} for ${context}`)
    this.value = value
  }
}

export class UnknownMotionType extends BeatEngineError {
  constructor(value: unknown) {
    super(engineErrorCodes.unknownMotionType, `Unknown motion type ${JSON.stringify(value)}`)
  }
}

export class TurnsValidationError extends BeatEngineError {
  constructor(message: string) {
    super(engineErrorCodes.turnsValidation, message)
  }
}

/**
 * No letter template matched. Callers leave the letter blank and carry on.
 */
export class UnclassifiedPictograph extends BeatEngineError {
  readonly signature: string

  constructor(signature: string) {
    super(engineErrorCodes.unclassifiedPictograph, `No letter matches signature ${signature}`)
    this.signature = signature
  }
}

export class OverrideStoreCorrupt extends BeatEngineError {
  constructor(path: string, cause: unknown) {
    super(engineErrorCodes.overrideStoreCorrupt, `Override store at ${path} is unreadable`, { cause })
  }
}

/**
 * A CAP index map pointed outside the sequence. Programmer error.
 */
export class CapInvariantError extends BeatEngineError {
  constructor(message: string) {
    super(engineErrorCodes.capInvariant, message)
  }
}

export class CapPreconditionError extends BeatEngineError {
  constructor(message: string) {
    super(engineErrorCodes.capPrecondition, message)
  }
}

export class DatasetValidationError extends BeatEngineError {
  constructor(message: string, cause?: unknown) {
    super(engineErrorCodes.datasetValidation, message, { cause })
  }
}
