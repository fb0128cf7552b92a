// Yielded by a coroutine to be resumed with the process running it.
export const YieldProcess: unique symbol = Symbol("YieldProcess")
