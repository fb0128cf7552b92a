import type { Coroutine, ProcessID } from "./Types.js"

/**
 * A Process is a coroutine running on its own. It is active until its coroutine returns, throws
 * or is killed.
 */
export interface Process {
    readonly pid: ProcessID

    isActive(): boolean

    kill(): boolean
}

/**
 * Called with the process and the error when a process throws an uncaught error.
 */
export type ProcessErrorHandler = (process: Process, error: unknown) => void

export type Task = () => Coroutine<void>
