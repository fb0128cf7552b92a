export interface Config {
    /** Trace process and channel transitions to the console. */
    debug: boolean
    /** Length of one `awaitTimeout` unit. */
    timeUnitMillis: number
}

export const config: Config = {
    debug: false,
    timeUnitMillis: 1000,
}

export function configure(options: Partial<Config>): void {
    if (options.timeUnitMillis !== undefined) {
        const millis = options.timeUnitMillis
        if (!Number.isFinite(millis) || millis <= 0) {
            throw new RangeError(`timeUnitMillis must be a positive number, got ${millis}`)
        }
        config.timeUnitMillis = millis
    }

    if (options.debug !== undefined) {
        config.debug = options.debug
    }
}
