import type { CancelFunction, Coroutine, ResultCallback } from "./Types.js"
import { Failure } from "./Failure.js"

/**
 * Converts a callback API to a coroutine.
 * @param {<T>(resultCallback: ResultCallback<T>) => void} continuation
 * @return {<T>T}
 */
export function* suspendCoroutine<T>(continuation: (resultCallback: ResultCallback<T>) => void): Coroutine<T> {
    return (yield continuation) as T
}

/**
 * Converts a callback that can be canceled API to a coroutine.
 * @param {<T>(resultCallback: ResultCallback<T>) => CancelFunction} continuation
 * @return {<T>T}
 */
export function* suspendCancellableCoroutine<T>(
    continuation: (resultCallback: ResultCallback<T>) => CancelFunction
): Coroutine<T> {
    return (yield continuation) as T
}

/**
 * Suspends the process for a given number of milliseconds.
 * @param {number} [millis]
 * @return {void}
 */
export function* delay(millis?: number): Coroutine<void> {
    yield (resultCallback: ResultCallback<void>) => {
        const timeout = setTimeout(() => resultCallback(undefined), millis)
        return () => clearTimeout(timeout)
    }
}

/**
 * Waits until the process is killed. Used to keep finally blocks from running until then.
 * @return {never}
 */
export function* awaitCancellation(): Coroutine<never> {
    return yield* suspendCoroutine<never>(() => {
    })
}

/**
 * Converts a Promise<T> to a Coroutine<T>. Promise result that is an error is thrown.
 * @param {<T>Promise<T>} promise
 * @return {<T>T} promiseResult
 */
export function* awaitPromise<T>(promise: Promise<T>): Coroutine<T> {
    return yield* suspendCoroutine((resultCallback) => {
        promise.then(
            (value) => resultCallback(value),
            (error) => resultCallback(new Failure(error)),
        )
    })
}
