import { deferred } from '../util/deferred'
import { TimeoutError } from './TestError'
import type { UnitOfWork } from './UnitOfWork'

/** Longest delay timers can wait, larger delays fire immediately. */
export const MAX_TIMEOUT = 2 ** 31 - 1

export interface Timers {
    setTimeout(callback: () => void, ms: number): unknown
    clearTimeout(handle: unknown): void
}

export class TimeoutGuard {
    constructor(
        readonly timers: Timers = globalThis,
        /** Time granted to the teardown of an aborted unit. Defaults to the unit's own timeout. */
        readonly teardownTimeout?: number,
    ) {}

    /**
     * Run the unit and abort it with a `TimeoutError` if it does not settle within `timeout` milliseconds.
     *
     * If the teardown of the aborted unit does not finish within `teardownTimeout`,
     * the `TimeoutError` is thrown without waiting for it.
     * Without a timeout the unit runs unguarded.
     */
    async run(
        unit: UnitOfWork,
        timeout: number|null|undefined,
    ) {
        if (timeout === null || timeout === undefined) {
            return unit.run()
        }

        const abandoned = deferred<never>()
        let teardownTimer: unknown
        const timer = this.timers.setTimeout(() => {
            const error = new TimeoutError(`Test "${unit.testId}" timed out after ${timeout}ms.`)
            unit.abort(error)
            teardownTimer = this.timers.setTimeout(() => abandoned.reject(error), this.teardownTimeout ?? timeout)
        }, timeout)
        try {
            await Promise.race([unit.run(), abandoned.promise])
        } finally {
            this.timers.clearTimeout(timer)
            if (teardownTimer !== undefined) {
                this.timers.clearTimeout(teardownTimer)
            }
        }
    }
}
