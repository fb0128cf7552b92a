import { BoxTypeMismatch } from "./Errors.js"

/**
 * Runtime witness of a type. Boxes are unpacked by naming the expected type with a tag.
 */
export interface TypeTag<T> {
    readonly name: string

    is(value: unknown): value is T
}

export function typeTag<T>(name: string, is: (value: unknown) => value is T): TypeTag<T> {
    return { name, is }
}

/**
 * Tags for the built-in types plus combinators for class instances and arrays.
 */
export const Types = {
    string: typeTag("string", (value): value is string => typeof value === "string"),
    number: typeTag("number", (value): value is number => typeof value === "number"),
    boolean: typeTag("boolean", (value): value is boolean => typeof value === "boolean"),
    bigint: typeTag("bigint", (value): value is bigint => typeof value === "bigint"),
    symbol: typeTag("symbol", (value): value is symbol => typeof value === "symbol"),
    null: typeTag("null", (value): value is null => value === null),
    undefined: typeTag("undefined", (value): value is undefined => value === undefined),
    object: typeTag(
        "object",
        (value): value is Record<PropertyKey, unknown> =>
            typeof value === "object" && value !== null && !Array.isArray(value),
    ),
    array: typeTag("array", (value): value is unknown[] => Array.isArray(value)),
    function: typeTag("function", (value): value is Function => typeof value === "function"),

    instanceOf<T>(ctor: abstract new (...args: never[]) => T): TypeTag<T> {
        return typeTag(ctor.name, (value): value is T => value instanceof ctor)
    },

    arrayOf<T>(tag: TypeTag<T>): TypeTag<T[]> {
        return typeTag(`${tag.name}[]`, (value): value is T[] => Array.isArray(value) && value.every((item) => tag.is(item)))
    },
} as const

function runtimeType(value: unknown): string {
    if (value === null) return "null"
    if (Array.isArray(value)) return "array"
    if (typeof value === "object") return value.constructor?.name ?? "object"
    return typeof value
}

/**
 * Carries one value of any type through a channel. The payload's static type is erased; the
 * receiver names the type it expects when unpacking.
 */
export class Box {
    readonly #value: unknown

    private constructor(value: unknown) {
        this.#value = value
    }

    static pack(value: unknown): Box {
        return new Box(value)
    }

    holds<T>(tag: TypeTag<T>): boolean {
        return tag.is(this.#value)
    }

    /**
     * Returns the payload, or null if it is not a `T`. Check with `holds` first when `T` itself
     * admits null.
     */
    unpack<T>(tag: TypeTag<T>): T | null {
        const value = this.#value
        return tag.is(value) ? value : null
    }

    /**
     * Returns the payload as a `T`. Unpacking as the wrong type is a programmer error and throws
     * BoxTypeMismatch.
     */
    unsafeUnpack<T>(tag: TypeTag<T>): T {
        const value = this.#value
        if (!tag.is(value)) throw new BoxTypeMismatch(tag.name, runtimeType(value))
        return value
    }

    toString(): string {
        return `Box(${runtimeType(this.#value)})`
    }
}

export function pack(value: unknown): Box {
    return Box.pack(value)
}

export function unpack<T>(box: Box, tag: TypeTag<T>): T | null {
    return box.unpack(tag)
}

export function unsafeUnpack<T>(box: Box, tag: TypeTag<T>): T {
    return box.unsafeUnpack(tag)
}
