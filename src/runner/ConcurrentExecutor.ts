import { settleAll } from '../util/settleAll'
import { Outcome, OutcomeStatus } from './Outcome'
import type { ResultCollector } from './ResultCollector'
import type { TestDescriptor } from './TestDescriptor'
import { AssertionFailure, isAssertionError, normalizeError, TimeoutError } from './TestError'
import type { TestGroup } from './TestGroup'
import { TimeoutGuard } from './TimeoutGuard'
import { UnitOfWork } from './UnitOfWork'

export type ExecutorOptions = {
    /** Applies to descriptors without `timeout`. */
    defaultTimeout?: number|null
    filter?: RegExp
    /** Recognizes failed assertions in addition to `AssertionFailure`. */
    isAssertionError?: (error: unknown) => boolean
}

export interface ExecutionObserver {
    testStart?(descriptor: TestDescriptor, group: TestGroup, time: number): void
    groupStart?(group: TestGroup): void
    groupDone?(group: TestGroup, outcomes: Outcome[]): void
    /** A teardown failed after the outcome of its test was recorded. */
    lateTeardownError?(outcome: Outcome, error: unknown): void
}

export class ConcurrentExecutor {
    constructor(
        readonly collector: ResultCollector,
        readonly guard: TimeoutGuard = new TimeoutGuard(),
        readonly clock: () => number = () => performance.now(),
        readonly options: ExecutorOptions = {},
        readonly observer: ExecutionObserver = {},
    ) {}

    /**
     * Run all members of the group concurrently.
     *
     * Every member is started before any is awaited.
     * Resolves with one outcome per member in member order once all of them settled.
     * Each outcome is handed to the collector as soon as its test finished.
     */
    execute(group: TestGroup): Promise<Outcome[]> {
        return settleAll(group.members.map(m => this.executeMember(group, m)))
    }

    protected async executeMember(
        group: TestGroup,
        descriptor: TestDescriptor,
    ) {
        const skipReason = this.getSkipReason(group, descriptor)
        if (skipReason !== undefined) {
            const t = this.clock()
            return this.record(new Outcome(descriptor.id, OutcomeStatus.skipped, t, t, skipReason))
        }

        let outcome: Outcome|undefined
        const unit = new UnitOfWork(descriptor.id, descriptor.action, error => {
            if (outcome) {
                this.observer.lateTeardownError?.(outcome, error)
            }
        })
        const timeout = descriptor.timeout === undefined ? this.options.defaultTimeout : descriptor.timeout
        const startTime = this.clock()
        this.observer.testStart?.(descriptor, group, startTime)
        try {
            await this.guard.run(unit, timeout)
            outcome = new Outcome(descriptor.id, OutcomeStatus.passed, startTime, this.clock())
        } catch (e) {
            outcome = new Outcome(
                descriptor.id,
                this.classify(e),
                startTime,
                this.clock(),
                normalizeError(e),
                unit.teardownErrors.map(normalizeError),
            )
        }
        return this.record(outcome)
    }

    protected getSkipReason(
        group: TestGroup,
        descriptor: TestDescriptor,
    ) {
        if (group.skipReason !== undefined) {
            return group.skipReason
        } else if (descriptor.skip) {
            return typeof descriptor.skip === 'string' ? descriptor.skip : 'Marked as skipped'
        } else if (this.options.filter && descriptor.id.search(this.options.filter) < 0) {
            return `Filtered out by ${String(this.options.filter)}`
        }
    }

    protected classify(e: unknown) {
        if (e instanceof TimeoutError) {
            return OutcomeStatus.timedOut
        }
        return e instanceof AssertionFailure || (this.options.isAssertionError ?? isAssertionError)(e)
            ? OutcomeStatus.failed
            : OutcomeStatus.errored
    }

    protected record(outcome: Outcome) {
        this.collector.add(outcome)
        return outcome
    }
}
