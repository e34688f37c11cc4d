export class KindMismatchError extends Error {
  constructor(
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`object is not a ${expected} type (got ${actual})`)
    this.name = 'KindMismatchError'
  }
}

export class NotFoundError extends Error {
  constructor(
    readonly typeName: string,
    readonly objectName: string,
    options?: ErrorOptions,
  ) {
    super(`${typeName} "${objectName}" not found`, options)
    this.name = 'NotFoundError'
  }
}

export class AlreadyExistsError extends Error {
  constructor(
    readonly typeName: string,
    readonly objectName: string,
    options?: ErrorOptions,
  ) {
    super(`${typeName} "${objectName}" already exists`, options)
    this.name = 'AlreadyExistsError'
  }
}

/** The write was based on a stale resourceVersion or failed a uid/resourceVersion precondition. */
export class ConflictError extends Error {
  constructor(
    readonly typeName: string,
    readonly objectName: string,
    options?: ErrorOptions,
  ) {
    super(`${typeName} "${objectName}" was modified concurrently`, options)
    this.name = 'ConflictError'
  }
}

export class StoreUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'StoreUnavailableError'
  }
}

/** Raised by ensure and remove passes; `cause` holds the unrecovered store or wiring error. */
export class ReconcileError extends Error {
  constructor(
    message: string,
    readonly typeName: string,
    readonly objectName: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'ReconcileError'
  }
}

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error))
