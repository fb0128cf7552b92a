export type {
    CancelFunction,
    Coroutine,
    ProcessID,
    Result,
    ResultCallback,
    Yield,
} from "./Types.js"
export type { ChannelHandle, ChannelView } from "./Channel.js"
export type { Process, ProcessErrorHandler, Task } from "./Process.js"
export type { Config } from "./internal/Config.js"

export { Failure } from "./Failure.js"
export { BoxTypeMismatch, ConcurrencyViolation, NotInProcess } from "./Errors.js"
export { Box, Types, pack, typeTag, unpack, unsafeUnpack, type TypeTag } from "./Box.js"
export { Lane } from "./internal/Lane.js"
export { Queue } from "./internal/Queue.js"
export { Stack } from "./internal/Stack.js"
export { makeReceiver, makeSender, newChannel } from "./internal/ChannelImpl.js"
export { isAlive, kill, myPID, processes, spawn } from "./internal/ProcessImpl.js"
export { configure } from "./internal/Config.js"
export {
    awaitCancellation,
    awaitPromise,
    delay,
    suspendCancellableCoroutine,
    suspendCoroutine,
} from "./Common.js"
