import { ConfigError, GroupMode, RunnerConfigInput } from '#src/config/RunnerConfig'
import { Outcome, OutcomeStatus } from '#src/runner/Outcome'
import type { TestDescriptor, UnitContext } from '#src/runner/TestDescriptor'
import { AssertionFailure, CollectionError } from '#src/runner/TestError'
import { Logger, RunEventMap, TestRunner } from '#src/runner/TestRunner'
import { descriptor, mock, observePromise, setupClock } from '#test/_util'

function setupTestRunner(
    config: RunnerConfigInput = {},
) {
    const {clock, sleep, now} = setupClock()
    const logger = {
        debug: mock.fn<Logger['debug']>(),
        warn: mock.fn<Logger['warn']>(),
        error: mock.fn<Logger['error']>(),
    }
    const runner = new TestRunner(config, clock, now, logger)

    const run = async (descriptors: TestDescriptor[]) => {
        const report = observePromise(runner.run(descriptors))
        await clock.runAllAsync()
        return report.promise
    }

    return {clock, sleep, logger, runner, run}
}

function statuses(outcomes: Iterable<Outcome>) {
    return [...outcomes].map(o => [o.testId, o.status])
}

test('run ungrouped tests one at a time', async () => {
    const {sleep, run} = setupTestRunner()

    const report = await run([
        descriptor('passes', () => sleep(10)),
        descriptor('fails', async () => {
            await sleep(5)
            throw new AssertionFailure('expected 1 to be 2')
        }),
    ])

    const passes = report.outcomes.get('passes')
    const fails = report.outcomes.get('fails')
    expect(statuses(report.outcomes.values())).toEqual([
        ['passes', OutcomeStatus.passed],
        ['fails', OutcomeStatus.failed],
    ])
    expect(passes?.endTime).toBe(10)
    expect(fails?.startTime).toBe(10)
    expect(fails?.endTime).toBe(15)
    expect(passes && fails && passes.overlaps(fails)).toBe(false)
    expect(report.counts).toEqual({passed: 1, failed: 1, errored: 0, timedOut: 0, skipped: 0})
    expect(report.success).toBe(false)
})

test('run grouped tests concurrently and isolate errors', async () => {
    const {sleep, run} = setupTestRunner()

    const report = await run([
        descriptor('a', () => sleep(20), {groupKey: 'g1'}),
        descriptor('b', async () => {
            await sleep(10)
            throw new TypeError('x is undefined')
        }, {groupKey: 'g1'}),
        descriptor('c', async () => {
            await sleep(30)
            throw new AssertionFailure('expected a to equal b')
        }, {groupKey: 'g1'}),
    ])

    expect(statuses(report.outcomes.values())).toEqual([
        ['b', OutcomeStatus.errored],
        ['a', OutcomeStatus.passed],
        ['c', OutcomeStatus.failed],
    ])
    const [a, b, c] = ['a', 'b', 'c'].map(id => report.outcomes.get(id))
    expect(a && b && a.overlaps(b)).toBe(true)
    expect(a && c && a.overlaps(c)).toBe(true)
    expect(b && c && b.overlaps(c)).toBe(true)
    expect(report.total).toBe(3)
})

test('time out a test while its sibling completes', async () => {
    const {sleep, run} = setupTestRunner()

    const report = await run([
        descriptor('slow', () => sleep(50), {groupKey: 'g', timeout: 10}),
        descriptor('sibling', () => sleep(30), {groupKey: 'g'}),
    ])

    expect(report.outcomes.get('slow')?.status).toBe(OutcomeStatus.timedOut)
    expect(report.outcomes.get('slow')?.endTime).toBe(10)
    expect(report.outcomes.get('sibling')?.status).toBe(OutcomeStatus.passed)
    expect(report.outcomes.get('sibling')?.endTime).toBe(30)
})

test('abort on duplicate id before running any test', async () => {
    const {run} = setupTestRunner()
    const action = mock.fn(() => void 0)

    await expect(run([
        descriptor('a', action),
        descriptor('b', action, {groupKey: 'g'}),
        descriptor('a', action),
    ])).rejects.toBeInstanceOf(CollectionError)

    expect(action).not.toBeCalled()
})

test('move on when a timed out test does not finish its teardown', async () => {
    const {sleep, run} = setupTestRunner({teardownTimeout: 5})

    const report = await run([
        descriptor('hangs', u => {
            u.onTeardown(() => new Promise<void>(() => void 0))
            return sleep(50)
        }, {timeout: 10}),
        descriptor('next', () => sleep(5)),
    ])

    expect([...report.outcomes.values()].map(o => [o.testId, o.status, o.startTime, o.endTime])).toEqual([
        ['hangs', OutcomeStatus.timedOut, 0, 15],
        ['next', OutcomeStatus.passed, 15, 20],
    ])
})

test('run tests with an unsupported timeout without deadline in lenient mode', async () => {
    const logger = {
        debug: mock.fn<Logger['debug']>(),
        warn: mock.fn<Logger['warn']>(),
        error: mock.fn<Logger['error']>(),
    }
    const runner = new TestRunner({strict: false}, undefined, undefined, logger)

    const report = await runner.run([
        descriptor('a', () => new Promise<void>(r => setTimeout(r, 20)), {timeout: 3_000_000_000}),
    ])

    expect(report.outcomes.get('a')?.status).toBe(OutcomeStatus.passed)
    expect(logger.warn).toBeCalledWith('Test "a": Invalid timeout 3000000000 - the default timeout applies')
})

test('log teardown errors that occur after the outcome was recorded', async () => {
    const {logger, run} = setupTestRunner()
    const contexts: UnitContext[] = []
    const error = new Error('late teardown error')

    await run([descriptor('a', u => void contexts.push(u))])
    contexts[0].onTeardown(() => { throw error })
    await new Promise(r => setImmediate(r))

    expect(logger.error).toBeCalledWith('Teardown of "a" threw after its outcome was recorded:', error)
})

test('throw collection errors synchronously when starting', () => {
    const {runner} = setupTestRunner()

    expect(() => runner.start([descriptor('a'), descriptor('a')])).toThrow(CollectionError)
})

test('run a concurrent group in the time of its slowest member', async () => {
    const {sleep, run} = setupTestRunner()

    const report = await run([
        descriptor('a', () => sleep(100), {groupKey: 'g'}),
        descriptor('b', () => sleep(100), {groupKey: 'g'}),
        descriptor('c', () => sleep(100), {groupKey: 'g'}),
        descriptor('after', () => sleep(1)),
    ])

    const outcomes = [...report.outcomes.values()]
    expect(Math.max(...outcomes.slice(0, 3).map(o => o.endTime))).toBe(100)
    expect(report.outcomes.get('after')?.endTime).toBe(101)
})

test('finish ungrouped tests in discovery order', async () => {
    const {sleep, run} = setupTestRunner()
    const durations = [30, 5, 20, 1, 10]

    const report = await run(durations.map((ms, i) => descriptor(`t${i}`, () => sleep(ms))))

    const ends = durations.map((_, i) => report.outcomes.get(`t${i}`)?.endTime)
    expect(ends).toEqual([30, 35, 55, 56, 66])
})

test('yield the same statuses when run again', async () => {
    const {sleep, run} = setupTestRunner()
    const descriptors = [
        descriptor('a', () => sleep(5), {groupKey: 'g'}),
        descriptor('b', () => { throw new AssertionFailure('nope') }, {groupKey: 'g'}),
        descriptor('c', () => sleep(50), {timeout: 10}),
        descriptor('d', undefined, {skip: true}),
        descriptor('e', () => Promise.reject(new Error('some error'))),
    ]

    const first = await run(descriptors)
    const second = await run(descriptors)

    expect(statuses(second.outcomes.values())).toEqual(statuses(first.outcomes.values()))
    expect(first.counts).toEqual({passed: 1, failed: 1, errored: 1, timedOut: 1, skipped: 1})
})

test('apply configuration', async () => {
    const {sleep, run} = setupTestRunner({
        defaultTimeout: 10,
        groupMode: GroupMode.parallel,
        filter: /^keep/,
    })

    const report = await run([
        descriptor('keep slow', () => sleep(20)),
        descriptor('keep fast', () => sleep(5)),
        descriptor('drop', () => sleep(5)),
    ])

    expect([...report.outcomes.values()].map(o => [o.testId, o.status, o.startTime, o.endTime])).toEqual([
        ['drop', OutcomeStatus.skipped, 0, 0],
        ['keep fast', OutcomeStatus.passed, 0, 5],
        ['keep slow', OutcomeStatus.timedOut, 0, 10],
    ])
})

test('reject invalid configuration', () => {
    expect(() => new TestRunner({defaultTimeout: -1})).toThrow(ConfigError)
})

test('log warnings in lenient mode', async () => {
    const {logger, run} = setupTestRunner({strict: false})

    const report = await run([
        descriptor('a'),
        descriptor('a'),
        descriptor('b', undefined, {groupKey: 'g', parent: 'x'}),
        descriptor('c', undefined, {groupKey: 'g', parent: 'y'}),
    ])

    expect(statuses(report.outcomes.values())).toEqual([
        ['a', OutcomeStatus.passed],
        ['b', OutcomeStatus.skipped],
        ['c', OutcomeStatus.skipped],
    ])
    expect(report.warnings).toHaveLength(2)
    expect(logger.warn).toHaveBeenNthCalledWith(1, 'Test "a": Duplicate test id - the test is dropped')
    expect(logger.warn).toHaveBeenNthCalledWith(2, 'Group "g" has members from different parents (x, y) - all members are skipped')
})

test('dispatch progress events', async () => {
    const {sleep, runner, run} = setupTestRunner()
    const log: string[] = []
    const listen = <K extends keyof RunEventMap>(type: K, format: (e: RunEventMap[K]) => string) => {
        runner.events.addListener(type, e => void log.push(`${type} ${format(e)}`))
    }
    listen('schedule', e => e.groups.map(g => g.key).join(','))
    listen('groupStart', e => e.group.key)
    listen('start', e => `${e.testId}@${e.time}`)
    listen('outcome', e => `${e.outcome.testId}:${e.outcome.status}`)
    listen('groupDone', e => `${e.group.key} (${e.outcomes.length})`)
    listen('complete', e => String(e.report.total))

    await run([
        descriptor('a', () => sleep(10), {groupKey: 'g'}),
        descriptor('b', () => sleep(5), {groupKey: 'g'}),
        descriptor('c'),
    ])

    expect(log).toEqual([
        'schedule g,c',
        'groupStart g',
        'start a@0',
        'start b@0',
        'outcome b:passed',
        'outcome a:passed',
        'groupDone g (2)',
        'groupStart c',
        'start c@10',
        'outcome c:passed',
        'groupDone c (1)',
        'complete 3',
    ])
})

test('log errors thrown by listeners', async () => {
    const {runner, logger, run} = setupTestRunner()
    const error = new Error('listener error')
    runner.events.addListener('outcome', () => { throw error })

    const report = await run([descriptor('a')])

    expect(report.outcomes.get('a')?.status).toBe(OutcomeStatus.passed)
    expect(logger.error).toBeCalledWith('Listener for "outcome" event threw:', error)
})

test('stream outcomes of a started run', async () => {
    const {clock, sleep, runner} = setupTestRunner()

    const {groups, collector, report} = runner.start([
        descriptor('a', () => sleep(10)),
        descriptor('b', () => sleep(10)),
    ])
    const received: string[] = []
    const iteration = (async () => {
        for await (const o of collector) {
            received.push(o.testId)
        }
    })()

    await clock.tickAsync(10)
    expect(received).toEqual(['a'])

    await clock.runAllAsync()
    await iteration
    expect(received).toEqual(['a', 'b'])
    expect(groups.map(g => g.key)).toEqual(['a', 'b'])
    expect((await report).total).toBe(2)
})
