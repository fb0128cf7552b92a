import { Box } from "../Box.js"
import { suspendCancellableCoroutine } from "../Common.js"
import { ConcurrencyViolation } from "../Errors.js"
import type { Coroutine } from "../Types.js"
import { config } from "./Config.js"
import { currentProcess } from "./ProcessImpl.js"
import { Queue } from "./Queue.js"

// Resumes the waiting process.
type Waiter = () => void

/**
 * One direction of a channel: the queued messages and the single process waiting for the next one.
 */
export class Lane {
    readonly #messages: Queue<Box> = new Queue()
    #waiter: Waiter | null = null

    get pending(): number {
        return this.#messages.length()
    }

    get isAwaited(): boolean {
        return this.#waiter !== null
    }

    push(box: Box) {
        this.#messages.enqueue(box)

        const waiter = this.#waiter
        if (waiter !== null) {
            this.#waiter = null
            waiter()
        }
    }

    take(): Box | null {
        return this.#messages.dequeue()
    }

    peek(): Box | null {
        return this.#messages.peek()
    }

    /**
     * Suspends the calling process until a message is pushed or `millis` have passed. The lane
     * holds no reference to the process once the wait ends, whether by push, timeout or kill.
     * @param {number} [millis] waits without a time limit when omitted
     * @return {boolean} true if woken by a push, false on timeout
     */
    * waitFor(millis?: number): Coroutine<boolean> {
        const process = yield* currentProcess()
        if (config.debug) console.log(`${process} Lane.waitFor(${millis ?? ""})`)
        if (this.#waiter !== null) throw new ConcurrencyViolation("waitFor", "another process is already waiting on this lane")

        return yield* suspendCancellableCoroutine<boolean>((resultCallback) => {
            const waiter = () => {
                clearTimeout(timeout)
                resultCallback(true)
            }

            const release = () => {
                if (this.#waiter === waiter) this.#waiter = null
            }

            const timeout = millis === undefined ? undefined : setTimeout(() => {
                release()
                resultCallback(false)
            }, millis)

            this.#waiter = waiter

            return () => {
                release()
                clearTimeout(timeout)
            }
        })
    }
}
