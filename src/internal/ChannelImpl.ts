import { Box } from "../Box.js"
import type { ChannelHandle, ChannelView } from "../Channel.js"
import { ConcurrencyViolation } from "../Errors.js"
import type { Coroutine } from "../Types.js"
import { config } from "./Config.js"
import { Lane } from "./Lane.js"

export const newChannel: () => ChannelHandle = () => ({ inbox: new Lane(), outbox: new Lane() })

export const makeSender: (channel: ChannelHandle) => ChannelView =
    (channel) => new ChannelViewImpl(channel.inbox, channel.outbox)

export const makeReceiver: (channel: ChannelHandle) => ChannelView =
    (channel) => new ChannelViewImpl(channel.outbox, channel.inbox)

class ChannelViewImpl implements ChannelView {
    constructor(readonly inbox: Lane, readonly outbox: Lane) {
    }

    send(value: unknown): void {
        const box = Box.pack(value)
        if (config.debug) console.log(`${this}.send(${box})`)
        this.outbox.push(box)
    }

    receive(): Box | null {
        return this.inbox.take()
    }

    hasNext(): boolean {
        return this.inbox.peek() !== null
    }

    * await(): Coroutine<Box> {
        for (; ;) {
            if (this.hasNext()) return this.#take("await")
            yield* this.inbox.waitFor()
        }
    }

    * awaitTimeout(timeout: number): Coroutine<Box | null> {
        let remaining = timeout

        for (; ;) {
            // NaN counts as expired
            if (!(remaining > 0)) return this.receive()
            if (this.hasNext()) return this.#take("awaitTimeout")

            const isWoken = yield* this.inbox.waitFor(config.timeUnitMillis)
            if (!isWoken) remaining--
        }
    }

    // hasNext() and this receive run without suspending in between.
    #take(operation: string): Box {
        const box = this.receive()
        if (box === null) throw new ConcurrencyViolation(operation)
        return box
    }

    toString(): string {
        return `ChannelView{in: ${this.inbox.pending}, out: ${this.outbox.pending}}`
    }
}
