import type { TeardownCallback, TestAction, UnitContext } from './TestDescriptor'

/**
 * One cancellable execution of a test action.
 *
 * Aborting rejects the unit with the abort reason right away.
 * The action itself keeps running until it observes `signal`,
 * its later result is ignored.
 */
export class UnitOfWork implements UnitContext {
    constructor(
        readonly testId: string,
        protected action: TestAction,
        /** Called for every error added to `teardownErrors`. */
        protected onTeardownError?: (error: unknown) => void,
        protected abortController: AbortController = new AbortController(),
    ) {}

    protected promise?: Promise<void>
    protected settled = false
    protected teardownCallbacks: TeardownCallback[] = []

    /**
     * Errors thrown by teardown callbacks that could not be reported as the unit's result,
     * because the unit had already failed.
     */
    readonly teardownErrors: unknown[] = []

    get signal() {
        return this.abortController.signal
    }

    onTeardown(cb: TeardownCallback) {
        if (!this.settled) {
            this.teardownCallbacks.push(cb)
            return
        }
        // registered by an action that outlived its unit
        void Promise.resolve()
            .then(() => cb(this.signal.reason))
            .catch((e: unknown) => this.addTeardownError(e))
    }

    abort(reason?: unknown) {
        this.abortController.abort(reason)
    }

    /**
     * Start the action.
     *
     * Settles after the action settled or the unit was aborted and all teardown callbacks ran.
     * Repeated calls return the same promise.
     */
    run(): Promise<void> {
        this.promise ??= this.execute()
        return this.promise
    }

    protected async execute() {
        let failed = false
        let reason: unknown
        try {
            await this.race()
        } catch (r) {
            failed = true
            reason = r
        }
        this.settled = true

        for (const cb of this.teardownCallbacks.reverse()) {
            try {
                await (failed ? cb(reason) : cb())
            } catch (e) {
                if (failed) {
                    this.addTeardownError(e)
                } else {
                    failed = true
                    reason = e
                }
            }
        }
        this.teardownCallbacks = []

        if (failed) {
            throw reason
        }
    }

    protected addTeardownError(error: unknown) {
        this.teardownErrors.push(error)
        this.onTeardownError?.(error)
    }

    protected race() {
        return new Promise<void>((resolve, reject) => {
            const signal = this.signal
            if (signal.aborted) {
                return reject(signal.reason)
            }
            const onAbort = () => reject(signal.reason)
            signal.addEventListener('abort', onAbort, {once: true})

            new Promise<void>(res => res(this.action(this)))
                .finally(() => signal.removeEventListener('abort', onAbort))
                .then(resolve, reject)
        })
    }
}
