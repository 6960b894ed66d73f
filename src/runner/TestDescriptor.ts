export type TeardownCallback = (reason?: unknown) => void | PromiseLike<void>

/**
 * Handle on the unit of work a test body runs in.
 *
 * Everything registered here belongs to this one test.
 * State shared between tests (module scope, suite-wide fixtures, external services)
 * is not protected when tests of the same group run concurrently.
 */
export interface UnitContext {
    readonly testId: string
    /** Aborted when the test is cancelled, e.g. after exceeding its timeout. */
    readonly signal: AbortSignal
    /**
     * Release a resource after the test body settled or was cancelled.
     * Callbacks run in reverse order of registration.
     */
    onTeardown(cb: TeardownCallback): void
}

export type TestAction = (unit: UnitContext) => void | PromiseLike<void>

export interface TestDescriptor {
    readonly id: string
    readonly action: TestAction
    /** Tests sharing a key run concurrently. Without a key the test runs on its own. */
    readonly groupKey?: string | null
    /** Milliseconds. `null` disables the deadline, `undefined` applies the configured default. */
    readonly timeout?: number | null
    /** Scope the test was declared in. Members of a group must share it. */
    readonly parent?: string
    readonly skip?: boolean | string
}
