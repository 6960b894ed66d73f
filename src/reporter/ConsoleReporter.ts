import { makeEventTypeCheck } from '../event'
import type { Event, EventEmitter } from '../event/EventEmitter'
import { Outcome, OutcomeStatus } from '../runner/Outcome'
import type { RunReport } from '../runner/ResultCollector'
import type { TestError } from '../runner/TestError'
import type { RunEventMap } from '../runner/TestRunner'

const icon = {
    [OutcomeStatus.passed]: '✓',
    [OutcomeStatus.failed]: '⨯',
    [OutcomeStatus.errored]: '🚨',
    [OutcomeStatus.timedOut]: '⌛',
    [OutcomeStatus.skipped]: '-',
}

const isEventType = makeEventTypeCheck<RunEventMap>()
const events: Array<keyof RunEventMap> = ['schedule', 'outcome', 'complete']

export interface Writable {
    write(chunk: string): unknown
}

/**
 * Print outcomes as they arrive and a summary after the run.
 */
export class ConsoleReporter {
    constructor(
        readonly out: Writable = process.stdout,
    ) {}

    protected unsubscribe = new Map<EventEmitter<RunEventMap>, Set<() => void>>()

    public connect(
        emitter: EventEmitter<RunEventMap>,
    ) {
        if (!this.unsubscribe.has(emitter)) {
            const set = new Set<() => void>()
            this.unsubscribe.set(emitter, set)
            for (const k of events) {
                set.add(emitter.addListener(k, e => this.log(e)))
            }
        }
    }

    public disconnect(
        emitter: EventEmitter<RunEventMap>,
    ) {
        this.unsubscribe.get(emitter)?.forEach(f => f())
        this.unsubscribe.delete(emitter)
    }

    protected log(event: Event<RunEventMap, keyof RunEventMap>) {
        if (isEventType(event, 'schedule')) {
            const tests = event.groups.reduce((n, g) => n + g.size, 0)
            this.out.write(`Running ${tests} tests in ${event.groups.length} groups\n`)
        } else if (isEventType(event, 'outcome')) {
            this.out.write(this.printOutcome(event.outcome))
        } else if (isEventType(event, 'complete')) {
            this.out.write(this.printSummary(event.report))
        }
    }

    protected printOutcome(outcome: Outcome) {
        const line = `${icon[outcome.status]} ${outcome.testId}`
        if (outcome.status === OutcomeStatus.skipped) {
            return `${line}\n`
        }
        const duration = `${line} (${Math.round(outcome.duration)}ms)\n`
        if (outcome.error === undefined || outcome.status === OutcomeStatus.passed) {
            return duration
        }
        return duration
            + this.printError(outcome.error)
            + outcome.teardownErrors.map(e => `    Teardown failed:\n${this.printError(e, '        ')}`).join('')
    }

    protected printError(error: TestError|string, indent = '    ') {
        const text = typeof error === 'string'
            ? error
            : error.toJSON().stack ?? `${error.name}: ${error.message}`
        return text.trim().split('\n').map(l => `${indent}${l}\n`).join('')
    }

    protected printSummary(report: RunReport) {
        const {counts} = report
        return [
            '',
            `${report.total} tests were run: ${counts.passed} passed, ${counts.failed} failed, ${counts.errored} errored, ${counts.timedOut} timed out, ${counts.skipped} were skipped`,
            ...(report.warnings.length ? [`There were ${report.warnings.length} collection warnings.`] : []),
            '',
        ].join('\n')
    }
}
