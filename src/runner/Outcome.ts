import { TestError } from './TestError'

export enum OutcomeStatus {
    passed = 'passed',
    failed = 'failed',
    errored = 'errored',
    timedOut = 'timedOut',
    skipped = 'skipped',
}

export type OutcomeData = {
    testId: string
    status: OutcomeStatus
    error?: ReturnType<TestError['toJSON']>|string
    teardownErrors: Array<ReturnType<TestError['toJSON']>|string>
    startTime: number
    endTime: number
    duration: number
}

/**
 * Terminal result of one test execution.
 */
export class Outcome {
    constructor(
        readonly testId: string,
        readonly status: OutcomeStatus,
        readonly startTime: number,
        readonly endTime: number,
        readonly error?: TestError|string,
        /** Errors thrown while tearing down a test that had already failed. */
        readonly teardownErrors: ReadonlyArray<TestError|string> = [],
    ) {}

    get duration(): number {
        return this.endTime - this.startTime
    }

    /**
     * Whether the execution windows of both outcomes intersect.
     */
    overlaps(other: Outcome) {
        return this.startTime < other.endTime && other.startTime < this.endTime
    }

    toJSON(): OutcomeData {
        return {
            testId: this.testId,
            status: this.status,
            error: this.error instanceof TestError ? this.error.toJSON() : this.error,
            teardownErrors: this.teardownErrors.map(e => e instanceof TestError ? e.toJSON() : e),
            startTime: this.startTime,
            endTime: this.endTime,
            duration: this.duration,
        }
    }
}
