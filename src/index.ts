import { RunnerConfigInput } from './config/RunnerConfig'
import { ConsoleReporter } from './reporter/ConsoleReporter'
import { Logger, TestRunner } from './runner/TestRunner'
import type { TestDescriptor } from './runner/TestDescriptor'
import type { Timers } from './runner/TimeoutGuard'

export * from './runner'
export { ConfigError, GroupMode, RunnerConfigSchema, resolveConfig } from './config/RunnerConfig'
export type { RunnerConfig, RunnerConfigInput } from './config/RunnerConfig'
export { ConsoleReporter } from './reporter/ConsoleReporter'
export { EventEmitter, makeEventTypeCheck } from './event'

/**
 * Aggregate, sequence and execute the tests and collect their outcomes.
 *
 * Tests sharing a `groupKey` run concurrently, everything else runs one test at a time.
 */
export async function run(
    descriptors: Iterable<TestDescriptor>,
    {
        timers,
        clock,
        logger,
        reporter,
        ...config
    }: RunnerConfigInput & {
        timers?: Timers
        clock?: () => number
        logger?: Logger
        /** Print progress to `process.stdout` or hand the events to the given reporter. */
        reporter?: boolean | ConsoleReporter
    } = {},
) {
    const runner = new TestRunner(config, timers, clock, logger)

    const consoleReporter = reporter === true ? new ConsoleReporter() : reporter || undefined
    consoleReporter?.connect(runner.events)
    try {
        return await runner.run(descriptors)
    } finally {
        consoleReporter?.disconnect(runner.events)
    }
}
