import { resolveConfig, RunnerConfig, RunnerConfigInput } from '../config/RunnerConfig'
import { createEventEmitter, EventEmitter } from '../event'
import { ConcurrentExecutor, ExecutionObserver } from './ConcurrentExecutor'
import { aggregate } from './GroupAggregator'
import { GroupSequencer } from './GroupSequencer'
import type { Outcome } from './Outcome'
import { ResultCollector, RunReport } from './ResultCollector'
import type { TestDescriptor } from './TestDescriptor'
import type { CollectionIssue } from './TestError'
import type { TestGroup } from './TestGroup'
import { Timers, TimeoutGuard } from './TimeoutGuard'

export interface Logger {
    debug(...data: unknown[]): void
    warn(...data: unknown[]): void
    error(...data: unknown[]): void
}

export type RunEventMap = {
    schedule: {groups: readonly TestGroup[], warnings: CollectionIssue[]}
    groupStart: {group: TestGroup}
    start: {testId: string, group: TestGroup, time: number}
    outcome: {outcome: Outcome}
    groupDone: {group: TestGroup, outcomes: Outcome[]}
    complete: {report: RunReport}
}

export type TestRun = {
    readonly groups: readonly TestGroup[]
    readonly collector: ResultCollector
    readonly report: Promise<RunReport>
}

export class TestRunner {
    constructor(
        config: RunnerConfigInput = {},
        readonly timers: Timers = globalThis,
        readonly clock = () => performance.now(),
        readonly logger: Logger = console,
    ) {
        this.config = resolveConfig(config)
        const [events, dispatch] = createEventEmitter<RunEventMap>(
            (error, type) => this.logger.error(`Listener for "${type}" event threw:`, error),
        )
        this.events = events
        this.dispatch = dispatch
    }

    readonly config: RunnerConfig
    readonly events: EventEmitter<RunEventMap>
    protected readonly dispatch: ReturnType<typeof createEventEmitter<RunEventMap>>[1]

    /**
     * Execute the tests and resolve with the report after the last one finished.
     *
     * Rejects with a `CollectionError` before any test starts if the descriptors can not be run.
     */
    async run(descriptors: Iterable<TestDescriptor>): Promise<RunReport> {
        return this.start(descriptors).report
    }

    /**
     * Start executing the tests.
     *
     * Throws a `CollectionError` before any test starts if the descriptors can not be run.
     * The returned collector can be iterated to observe outcomes as they arrive.
     */
    start(descriptors: Iterable<TestDescriptor>): TestRun {
        const {groups, warnings} = aggregate(descriptors, {strict: this.config.strict})
        for (const w of warnings) {
            this.logger.warn(w.testId === undefined ? w.message : `Test "${w.testId}": ${w.message}`)
        }
        this.logger.debug(`Scheduled ${groups.length} groups`)
        this.dispatch('schedule', {groups, warnings})

        const collector = new ResultCollector(outcome => this.dispatch('outcome', {outcome}))

        return {
            groups,
            collector,
            report: this.execute(groups, warnings, collector),
        }
    }

    protected async execute(
        groups: readonly TestGroup[],
        warnings: CollectionIssue[],
        collector: ResultCollector,
    ) {
        const observer: ExecutionObserver = {
            testStart: (descriptor, group, time) => this.dispatch('start', {testId: descriptor.id, group, time}),
            groupStart: group => this.dispatch('groupStart', {group}),
            groupDone: (group, outcomes) => this.dispatch('groupDone', {group, outcomes}),
            lateTeardownError: (outcome, error) => this.logger.error(`Teardown of "${outcome.testId}" threw after its outcome was recorded:`, error),
        }
        const executor = new ConcurrentExecutor(
            collector,
            new TimeoutGuard(this.timers, this.config.teardownTimeout),
            this.clock,
            {
                defaultTimeout: this.config.defaultTimeout,
                filter: this.config.filter,
                isAssertionError: this.config.isAssertionError,
            },
            observer,
        )
        const sequencer = new GroupSequencer(executor, this.config.groupMode, observer)

        try {
            await sequencer.run(groups)
        } finally {
            collector.close()
        }

        const report = collector.report(warnings)
        this.dispatch('complete', {report})
        return report
    }
}
