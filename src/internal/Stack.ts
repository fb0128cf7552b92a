type Link<T> = { value: T, next: LinkOrNull<T> }
type LinkOrNull<T> = Link<T> | null

export class Stack<T extends NonNullable<unknown>> {
    #length: number = 0
    #top: LinkOrNull<T> = null

    push(value: T) {
        this.#top = { value, next: this.#top }
        this.#length++
    }

    pop(): T | null {
        if (this.#top === null) return null
        const value = this.#top.value
        this.#top = this.#top.next
        this.#length--
        return value
    }

    peek(): T | null {
        return this.#top?.value ?? null
    }

    clear() {
        this.#top = null
        this.#length = 0
    }

    length(): number {
        return this.#length
    }

    isEmpty(): boolean {
        return this.#top === null
    }

    /**
     * Returns a new stack holding the same values in the opposite order. This stack is unchanged.
     */
    reversed(): Stack<T> {
        const reversed = new Stack<T>()
        for (const value of this) {
            reversed.push(value)
        }
        return reversed
    }

    * [Symbol.iterator]() {
        let top = this.#top
        while (top) {
            yield top.value
            top = top.next
        }
    }
}
