import { assert } from "chai"
import { Queue } from "../internal/Queue.js"

function drain<T extends NonNullable<unknown>>(queue: Queue<T>): T[] {
    const values: T[] = []
    for (; ;) {
        const value = queue.dequeue()
        if (value === null) return values
        values.push(value)
    }
}

describe("Queue tests", () => {
    it("dequeue() and peek() on a new queue return null", () => {
        const queue = new Queue<number>()
        assert.isNull(queue.peek())
        assert.isNull(queue.dequeue())
        assert.isTrue(queue.isEmpty())
    })

    it("dequeues values in the order they were enqueued", () => {
        const queue = new Queue<number>()
        for (let i = 1; i <= 10; i++) {
            queue.enqueue(i)
        }
        assert.deepEqual(drain(queue), [1, 2, 3, 4, 5, 6, 7, 8, 9, 10])
        assert.isTrue(queue.isEmpty())
    })

    it("keeps FIFO order when enqueues and dequeues interleave", () => {
        const queue = new Queue<number>()
        queue.enqueue(1)
        queue.enqueue(2)
        assert.strictEqual(queue.dequeue(), 1)
        queue.enqueue(3)
        assert.strictEqual(queue.dequeue(), 2)
        assert.strictEqual(queue.dequeue(), 3)
        assert.isNull(queue.dequeue())
    })

    it("keeps FIFO order across every rotation case", () => {
        const queue = new Queue<number>()
        const dequeued: number[] = []
        let next = 0

        // batches sized so front drains with an empty, single and longer rear
        for (const batch of [1, 2, 3, 1, 4, 2, 5]) {
            for (let i = 0; i < batch; i++) {
                queue.enqueue(next++)
            }
            const value = queue.dequeue()
            if (value !== null) dequeued.push(value)
        }
        dequeued.push(...drain(queue))

        assert.deepEqual(dequeued, Array.from({ length: next }, (_, i) => i))
    })

    it("peek() returns the same value until the next dequeue()", () => {
        const queue = new Queue<string>()
        queue.enqueue("a")
        queue.enqueue("b")
        assert.strictEqual(queue.peek(), "a")
        assert.strictEqual(queue.peek(), "a")
        assert.strictEqual(queue.peek(), "a")
        assert.strictEqual(queue.dequeue(), "a")
        assert.strictEqual(queue.peek(), "b")
        assert.strictEqual(queue.dequeue(), "b")
        assert.isNull(queue.peek())
    })

    it("peek() on a single front value with a waiting rear keeps the head", () => {
        const queue = new Queue<number>()
        queue.enqueue(1)
        queue.enqueue(2)
        assert.strictEqual(queue.dequeue(), 1) // front is now [2]
        queue.enqueue(3)
        queue.enqueue(4)
        assert.strictEqual(queue.peek(), 2)
        assert.deepEqual([...queue], [2, 3, 4])
        assert.deepEqual(drain(queue), [2, 3, 4])
    })

    it("iterates in dequeue order without removing values", () => {
        const queue = new Queue<number>()
        queue.enqueue(1)
        queue.enqueue(2)
        queue.enqueue(3)
        assert.strictEqual(queue.dequeue(), 1)
        queue.enqueue(4)
        assert.deepEqual([...queue], [2, 3, 4])
        assert.strictEqual(queue.length(), 3)
    })

    it("length() counts values on both stacks", () => {
        const queue = new Queue<number>()
        queue.enqueue(1)
        queue.enqueue(2)
        queue.peek()
        queue.enqueue(3)
        assert.strictEqual(queue.length(), 3)
        queue.dequeue()
        assert.strictEqual(queue.length(), 2)
    })
})
