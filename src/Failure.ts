/**
 * Wraps an error passed to a ResultCallback. The suspended coroutine is resumed by throwing `value`.
 */
export class Failure {
    constructor(readonly value: unknown) {
    }
}
