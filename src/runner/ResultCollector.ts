import { deferred, Deferred } from '../util/deferred'
import { Outcome, OutcomeStatus } from './Outcome'
import type { CollectionIssue } from './TestError'

export type OutcomeCounts = Record<OutcomeStatus, number>

export type RunReport = {
    outcomes: ReadonlyMap<string, Outcome>
    counts: OutcomeCounts
    total: number
    /** No test failed, errored or timed out. */
    success: boolean
    warnings: CollectionIssue[]
}

/**
 * Records exactly one outcome per test.
 *
 * Outcomes can be observed as they arrive by iterating the collector,
 * the iteration ends after `close()`.
 */
export class ResultCollector implements AsyncIterable<Outcome> {
    constructor(
        protected onOutcome?: (outcome: Outcome) => void,
    ) {}

    #outcomes = new Map<string, Outcome>()
    #arrival: Outcome[] = []
    #closed = false
    #nextArrival?: Deferred<void>

    get outcomes(): ReadonlyMap<string, Outcome> {
        return this.#outcomes
    }

    get size() {
        return this.#arrival.length
    }

    get closed() {
        return this.#closed
    }

    add(outcome: Outcome) {
        if (this.#closed) {
            throw new Error(`Can not record outcome of "${outcome.testId}" after the run completed.`)
        } else if (this.#outcomes.has(outcome.testId)) {
            throw new Error(`Outcome of "${outcome.testId}" has already been recorded.`)
        }
        this.#outcomes.set(outcome.testId, outcome)
        this.#arrival.push(outcome)

        this.onOutcome?.(outcome)
        this.#notify()
    }

    close() {
        this.#closed = true
        this.#notify()
    }

    get counts(): OutcomeCounts {
        const counts: OutcomeCounts = {
            [OutcomeStatus.passed]: 0,
            [OutcomeStatus.failed]: 0,
            [OutcomeStatus.errored]: 0,
            [OutcomeStatus.timedOut]: 0,
            [OutcomeStatus.skipped]: 0,
        }
        for (const o of this.#arrival) {
            counts[o.status]++
        }
        return counts
    }

    report(warnings: CollectionIssue[] = []): RunReport {
        const counts = this.counts
        return {
            outcomes: new Map(this.#outcomes),
            counts,
            total: this.size,
            success: counts.failed + counts.errored + counts.timedOut === 0,
            warnings,
        }
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<Outcome, void, undefined> {
        for (let i = 0; ; i++) {
            while (i >= this.#arrival.length) {
                if (this.#closed) {
                    return
                }
                this.#nextArrival ??= deferred<void>()
                await this.#nextArrival.promise
            }
            yield this.#arrival[i]
        }
    }

    #notify() {
        const next = this.#nextArrival
        this.#nextArrival = undefined
        next?.resolve()
    }
}
