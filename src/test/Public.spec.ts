import { assert } from "chai"
import {
    Box,
    ConcurrencyViolation,
    Types,
    delay,
    isAlive,
    makeReceiver,
    makeSender,
    myPID,
    newChannel,
    pack,
    spawn,
    unsafeUnpack,
    type ChannelView,
    type Coroutine,
    type ProcessID,
} from "../main.js"

type Request = { from: ProcessID, n: number }
const request = Types.object

function* echo(view: ChannelView): Coroutine<void> {
    for (; ;) {
        const box = yield* view.await()
        const message = box.unsafeUnpack(request)
        view.send({ from: yield* myPID(), n: message.n })
    }
}

describe("Public API tests", () => {
    it("a spawned server answers requests over a channel", (done) => {
        const channel = newChannel()
        const client = makeSender(channel)
        const serverPid = spawn(() => echo(makeReceiver(channel)), (_, error) => done(error))

        spawn(function* () {
            yield* delay(1)
            const sent: Request = { from: yield* myPID(), n: 5 }
            client.send(sent)

            const reply = (yield* client.await()).unsafeUnpack(request)
            assert.deepEqual(reply, { from: serverPid, n: 5 })
            assert.isTrue(isAlive(serverPid))
            done()
        }, (_, error) => done(error))
    })

    it("boxes round trip through the package entry point", () => {
        const box = pack(1)
        assert.instanceOf(box, Box)
        assert.strictEqual(unsafeUnpack(box, Types.number), 1)
    })

    it("exports the error thrown when a consumer races another", () => {
        const error = new ConcurrencyViolation("await")
        assert.strictEqual(error.name, "ConcurrencyViolation")
        assert.strictEqual(error.message, "await: inbox reported a message but the receive came back empty.")
    })
})
