import type { Box } from "./Box.js"
import type { Lane } from "./internal/Lane.js"
import type { Coroutine } from "./Types.js"

/**
 * A channel: two lanes shared by the sender and receiver views made from it.
 */
export interface ChannelHandle {
    readonly inbox: Lane
    readonly outbox: Lane
}

/**
 * An endpoint of a channel. The sender's outbox is the receiver's inbox and the receiver's
 * outbox is the sender's inbox. Values are packed into a Box on send; the receiving side unpacks
 * them with the type it expects.
 *
 * Each direction supports one consumer. `await` and `awaitTimeout` suspend the calling process
 * and must be run inside one with `yield*`.
 */
export interface ChannelView extends ChannelHandle {
    send(value: unknown): void

    receive(): Box | null

    hasNext(): boolean

    await(): Coroutine<Box>

    /**
     * Waits at most `timeout` time units (see `configure`) for a message, then makes one last
     * non-blocking receive. A timeout of 0 or less, or NaN, only makes that receive.
     */
    awaitTimeout(timeout: number): Coroutine<Box | null>
}
