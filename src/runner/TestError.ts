export class TestError extends Error {
    static fromError(e: Error) {
        return new TestError(e.message, {cause: e})
    }

    get name() {
        return this.cause instanceof Error ? this.cause.name : this.constructor.name
    }

    toJSON() {
        return {
            name: this.name,
            message: this.message,
            stack: this.cause instanceof Error ? this.cause.stack : this.stack,
        }
    }
}

export class TimeoutError extends TestError { }

/**
 * Thrown by a test body when its own correctness check does not hold.
 */
export class AssertionFailure extends TestError { }

export type CollectionIssue = {
    /** Position of the descriptor in the collected sequence. */
    index?: number
    testId?: string
    message: string
}

/**
 * The descriptors handed to a run can not be executed.
 *
 * Raised before any test starts.
 */
export class CollectionError extends Error {
    constructor(
        readonly issues: CollectionIssue[],
    ) {
        super([
            `Collected tests contain ${issues.length} error${issues.length === 1 ? '' : 's'}:`,
            ...issues.map(i => `  ${formatIssueSubject(i)}${i.message}`),
        ].join('\n'))
    }

    get name() {
        return 'CollectionError'
    }
}

function formatIssueSubject(issue: CollectionIssue) {
    const subject = [
        issue.index === undefined ? '' : `#${issue.index}`,
        issue.testId === undefined ? '' : `"${issue.testId}"`,
    ].filter(Boolean).join(' ')
    return subject ? `${subject}: ` : ''
}

export function normalizeError(e: unknown): TestError|string {
    return e instanceof TestError ? e
        : e instanceof Error ? TestError.fromError(e)
            : String(e)
}

export function isAssertionError(e: unknown): boolean {
    if (e instanceof AssertionFailure) {
        return true
    }
    if (!(e instanceof Error)) {
        return false
    }
    return e.name === 'AssertionError' || 'matcherResult' in e
}
