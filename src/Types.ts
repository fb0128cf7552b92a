import type { Failure } from "./Failure.js"
import type { YieldProcess } from "./internal/YieldProcess.js"

/**
 * Instance of a coroutine.
 */
export type Coroutine<T> = Generator<Yield, T>

/**
 * Data object contains value or error of resolved asynchronous operation.
 */
export type Result<T> = Failure | T

/**
 * Callback function called with result of an asynchronous operation.
 */
export type ResultCallback<T> = (result: Result<T>) => void

/**
 * Function that cancels an asynchronous operation.
 */
export type CancelFunction = () => void

/**
 * Identifier of a spawned process.
 */
export type ProcessID = number

/**
 * Use yield* on a suspension point in a process to suspend it until an async task resolves.
 */
export type Yield = YieldAsync | YieldAsyncNonCancellable | typeof YieldProcess

type YieldAsync = (s: ResultCallback<unknown>) => CancelFunction
type YieldAsyncNonCancellable = (s: ResultCallback<unknown>) => void
