import { Stack } from "./Stack.js"

/**
 * FIFO queue made of two stacks. `front` holds values ready to dequeue in dequeue order and `rear`
 * holds newer values in reverse order, so the queue's content is always `front ++ reverse(rear)`.
 * `rear` is only reversed into `front` once `front` runs out, which makes every operation O(1)
 * amortized.
 */
export class Queue<T extends NonNullable<unknown>> {
    #front: Stack<T> = new Stack()
    #rear: Stack<T> = new Stack()

    enqueue(value: T) {
        this.#rear.push(value)
    }

    dequeue(): T | null {
        switch (this.#front.length()) {
            case 0: {
                if (this.#rear.isEmpty()) return null
                this.#rotate()
                return this.#front.pop()
            }
            case 1: {
                const head = this.#front.pop()
                this.#refill()
                return head
            }
            default:
                return this.#front.pop()
        }
    }

    peek(): T | null {
        switch (this.#front.length()) {
            case 0: {
                if (this.#rear.isEmpty()) return null
                this.#rotate()
                return this.#front.peek()
            }
            case 1: {
                const head = this.#front.peek()
                if (head === null || this.#rear.isEmpty()) return head
                // keep the head on top of the rotated rear
                this.#front.clear()
                this.#rotate()
                this.#front.push(head)
                return head
            }
            default:
                return this.#front.peek()
        }
    }

    length(): number {
        return this.#front.length() + this.#rear.length()
    }

    isEmpty(): boolean {
        return this.#front.isEmpty() && this.#rear.isEmpty()
    }

    // Moves rear into an emptied front. A single rear value is moved without reversing.
    #refill() {
        switch (this.#rear.length()) {
            case 0:
                break
            case 1: {
                const last = this.#rear.pop()
                if (last !== null) this.#front.push(last)
                break
            }
            default:
                this.#rotate()
        }
    }

    #rotate() {
        this.#front = this.#rear.reversed()
        this.#rear.clear()
    }

    * [Symbol.iterator]() {
        yield* this.#front
        yield* this.#rear.reversed()
    }
}
