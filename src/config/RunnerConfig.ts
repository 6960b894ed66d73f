import { z } from 'zod'
import { MAX_TIMEOUT } from '../runner/TimeoutGuard'

export enum GroupMode {
    /** Groups run one after another, members of a group run concurrently. */
    sequential = 'sequential',
    /** All groups are started at once. */
    parallel = 'parallel',
}

export const RunnerConfigSchema = z.object({
    /** Deadline in milliseconds for tests that don't declare one. `null` disables it. */
    defaultTimeout: z.number().nonnegative().max(MAX_TIMEOUT).nullable().default(null),
    /** Time granted to the teardown of a timed out test. Defaults to the test's own timeout. */
    teardownTimeout: z.number().nonnegative().max(MAX_TIMEOUT).optional(),
    /** Abort on every collection issue instead of dropping or repairing the offending tests. */
    strict: z.boolean().default(true),
    groupMode: z.nativeEnum(GroupMode).default(GroupMode.sequential),
    /** Tests whose id does not match are skipped. */
    filter: z.instanceof(RegExp).optional(),
    /** Decides whether an error thrown by a test is a failed assertion rather than an unexpected error. */
    isAssertionError: z.custom<(error: unknown) => boolean>(v => typeof v === 'function', 'Expected a function').optional(),
}).strict()

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>
export type RunnerConfigInput = z.input<typeof RunnerConfigSchema>

export class ConfigError extends Error {
    constructor(
        readonly issues: z.ZodIssue[],
    ) {
        super(`Invalid runner configuration:\n${issues.map(i => `  ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n')}`)
    }

    get name() {
        return 'ConfigError'
    }
}

export function resolveConfig(input: RunnerConfigInput = {}): RunnerConfig {
    const result = RunnerConfigSchema.safeParse(input)
    if (!result.success) {
        throw new ConfigError(result.error.issues)
    }
    return result.data
}
