import { NotInProcess } from "../Errors.js"
import { Failure } from "../Failure.js"
import type { Process, ProcessErrorHandler, Task } from "../Process.js"
import type { CancelFunction, Coroutine, ProcessID, Result, Yield } from "../Types.js"
import { config } from "./Config.js"
import { YieldProcess } from "./YieldProcess.js"

enum PROCESS_STATE {
    RUNNING, // Initial state. Process runs until its coroutine returns, throws or is killed.
    COMPLETED, // Final state. The coroutine will not be resumed again.
}

const running = new Map<ProcessID, ProcessImpl>()
let lastPid = 0

export class ProcessImpl implements Process {
    readonly pid: ProcessID
    #state: PROCESS_STATE = PROCESS_STATE.RUNNING
    readonly #coroutine: Coroutine<void>
    readonly #errorHandler: ProcessErrorHandler | null
    #cancelCallback: CancelFunction | null = null
    #stackDepth = 0

    constructor(task: Task, errorHandler: ProcessErrorHandler | null = null) {
        this.pid = ++lastPid
        this.#errorHandler = errorHandler
        running.set(this.pid, this)
        this.#coroutine = task()
    }

    isActive(): boolean {
        return this.#state === PROCESS_STATE.RUNNING
    }

    start() {
        this.resumeWith(undefined)
    }

    kill(): boolean {
        if (config.debug) console.log(`${this} ${this.constructor.name}.kill()`)
        if (!this.isActive()) return false
        this.complete()
        this.runFinallyBlocks()
        return true
    }

    protected resumeWith(result: Result<unknown>) {
        try {
            this.#stackDepth++
            if (config.debug) {
                console.log(`${this} ${this.constructor.name}.resumeWith(${result instanceof Failure ? "failure" : "value"})`)
            }
            if (!this.isActive()) return

            // Reached limit on resuming this coroutine on this stack. Resume with a clear stack.
            if (this.#stackDepth >= 1000) {
                setTimeout(() => this.resumeWith(result))
                return
            }

            let iteratorResult: IteratorResult<Yield, void>

            try {
                if (result instanceof Failure) {
                    iteratorResult = this.#coroutine.throw(result.value)
                } else {
                    iteratorResult = this.#coroutine.next(result)
                }
            } catch (error) {
                // The process could have killed itself before throwing.
                if (this.isActive()) {
                    this.throwError(error)
                }
                return
            }

            if (!this.isActive()) return

            if (iteratorResult.done) {
                this.complete()
                return
            }

            // suspension point
            if (iteratorResult.value === YieldProcess) {
                this.resumeWith(this)
            } else {
                let isCalledOnce = false
                const cancel = iteratorResult.value((result) => {
                    // guard against suspension point calling back more than once
                    if (isCalledOnce) return
                    isCalledOnce = true
                    this.#cancelCallback = null
                    // don't trust that a canceled operation doesn't call back
                    if (this.isActive()) this.resumeWith(result)
                })

                // a suspension point that called back synchronously is already resolved
                if (!isCalledOnce) {
                    this.#cancelCallback = typeof cancel === "function" ? cancel : null
                }
            }
        } finally {
            this.#stackDepth--
        }
    }

    protected complete() {
        if (config.debug) console.log(`${this} ${this.constructor.name}.complete()`)
        this.#state = PROCESS_STATE.COMPLETED
        running.delete(this.pid)

        // cancel pending async operation
        if (this.#cancelCallback !== null) {
            this.#cancelCallback()
            this.#cancelCallback = null
        }
    }

    protected throwError(error: unknown) {
        if (config.debug) console.log(`${this} ${this.constructor.name}.throwError(${String(error)})`)
        this.complete()

        if (this.#errorHandler !== null) {
            this.#errorHandler(this, error)
        } else {
            console.error(`${this} terminated by an uncaught error`, error)
        }
    }

    protected runFinallyBlocks() {
        let iteratorResult: IteratorResult<Yield, void>
        try {
            iteratorResult = this.#coroutine.return(undefined)
        } catch (error) {
            // A process that kills itself is still on the stack. Its finally blocks run once it has unwound.
            if (error instanceof TypeError && error.message === "Generator is already running") {
                setTimeout(() => this.runFinallyBlocks())
                return
            }
            console.error(`${this} threw while running finally blocks`, error)
            return
        }

        // A finally block that suspends is finished in a process of its own.
        if (!iteratorResult.done) {
            const coroutine = this.#coroutine
            const suspension = iteratorResult.value

            spawn(function* (): Coroutine<void> {
                let pending: IteratorResult<Yield, void> = coroutine.next(yield suspension)
                while (!pending.done) {
                    pending = coroutine.next(yield pending.value)
                }
            })
        }
    }

    toString(): string {
        return `Process@${this.pid}{${PROCESS_STATE[this.#state]}}`
    }
}

/**
 * Resumes with the process running the calling coroutine.
 */
export function* currentProcess(): Coroutine<ProcessImpl> {
    const process = yield YieldProcess
    if (!(process instanceof ProcessImpl)) throw new NotInProcess()
    return process
}

/**
 * Starts a process running `task`. The task runs synchronously until its first suspension point.
 * An uncaught error ends the process and is passed to `errorHandler`, or logged when none is given.
 * @param {() => Coroutine<void>} task
 * @param {(process: Process, error: unknown) => void} [errorHandler]
 * @return {ProcessID}
 */
export function spawn(task: Task, errorHandler?: ProcessErrorHandler): ProcessID {
    const process = new ProcessImpl(task, errorHandler)
    process.start()
    return process.pid
}

/**
 * Returns the id of the calling process.
 * @return {ProcessID}
 */
export function* myPID(): Coroutine<ProcessID> {
    return (yield* currentProcess()).pid
}

export function isAlive(pid: ProcessID): boolean {
    return running.has(pid)
}

/**
 * Kills a running process. Its pending suspension is canceled and its finally blocks are run.
 * @param {ProcessID} pid
 * @return {boolean} false if the process is unknown or has already finished
 */
export function kill(pid: ProcessID): boolean {
    return running.get(pid)?.kill() ?? false
}

export function processes(): ProcessID[] {
    return Array.from(running.keys())
}
