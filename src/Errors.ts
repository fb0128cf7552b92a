/**
 * Thrown by `unsafeUnpack` when a box is unpacked as a type its payload does not have. This is a
 * programmer error: both ends of a channel must agree on the types they exchange.
 */
export class BoxTypeMismatch extends Error {
  name = `BoxTypeMismatch`

  constructor(readonly expected: string, readonly actual: string) {
    super(`Tried to unpack a box holding ${actual} as ${expected}.`)
  }
}

/**
 * Thrown when a lane sees a second consumer: a receive found no message after the inbox reported
 * one, or a process waited on a lane another process is already waiting on.
 */
export class ConcurrencyViolation extends Error {
  name = `ConcurrencyViolation`

  constructor(readonly operation: string, detail = `inbox reported a message but the receive came back empty`) {
    super(`${operation}: ${detail}.`)
  }
}

/**
 * Thrown when a suspension point that needs a process is run outside a spawned process.
 */
export class NotInProcess extends Error {
  name = `NotInProcess`
  message = `Tried to suspend outside a process. Run this coroutine with spawn().`
}
