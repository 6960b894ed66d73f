import { z } from 'zod'
import type { TestAction, TestDescriptor } from './TestDescriptor'
import { TestGroup } from './TestGroup'
import { CollectionError, CollectionIssue } from './TestError'
import { MAX_TIMEOUT } from './TimeoutGuard'

const DescriptorSchema = z.object({
    id: z.string().min(1),
    action: z.custom<TestAction>(v => typeof v === 'function', 'Expected a function'),
})
const GroupKeySchema = z.string().trim().min(1).nullish()
const TimeoutSchema = z.number().nonnegative().max(MAX_TIMEOUT).nullish()

export type AggregateOptions = {
    strict?: boolean
}

export type AggregateResult = {
    groups: TestGroup[]
    warnings: CollectionIssue[]
}

type GroupEntry = {
    key: string
    explicit: boolean
    members: TestDescriptor[]
}

/**
 * Partition descriptors into groups.
 *
 * Groups are ordered by the first occurrence of their key,
 * members keep the order of the descriptors.
 * A descriptor without `groupKey` forms a group of its own.
 *
 * Throws a `CollectionError` when the descriptors can not be run.
 * In lenient mode duplicates are dropped and invalid `groupKey` or `timeout` values are reset,
 * which is reported per descriptor in `warnings`.
 */
export function aggregate(
    descriptors: Iterable<TestDescriptor>,
    {strict = true}: AggregateOptions = {},
): AggregateResult {
    const fatal: CollectionIssue[] = []
    const warnings: CollectionIssue[] = []
    const reject = (issue: CollectionIssue, repair: string) => {
        if (strict) {
            fatal.push(issue)
        } else {
            warnings.push({...issue, message: `${issue.message} - ${repair}`})
        }
    }

    const ids = new Set<string>()
    const entries: GroupEntry[] = []
    const explicitEntries = new Map<string, GroupEntry>()

    let index = 0
    for (const d of descriptors) {
        const i = index++

        const base = DescriptorSchema.safeParse(d)
        if (!base.success) {
            const testId = typeof d === 'object' && d !== null && typeof d.id === 'string' ? d.id : undefined
            for (const issue of base.error.issues) {
                fatal.push({index: i, testId, message: `${issue.path.join('.') || 'descriptor'}: ${issue.message}`})
            }
            continue
        }

        if (ids.has(d.id)) {
            reject({index: i, testId: d.id, message: 'Duplicate test id'}, 'the test is dropped')
            continue
        }
        ids.add(d.id)

        let descriptor = d
        const groupKey = GroupKeySchema.safeParse(d.groupKey)
        if (!groupKey.success) {
            reject({index: i, testId: d.id, message: `Invalid group key ${JSON.stringify(d.groupKey)}`}, 'the test runs ungrouped')
            descriptor = {...descriptor, groupKey: null}
        }
        if (!TimeoutSchema.safeParse(d.timeout).success) {
            reject({index: i, testId: d.id, message: `Invalid timeout ${String(d.timeout)}`}, 'the default timeout applies')
            descriptor = {...descriptor, timeout: undefined}
        }

        const key = groupKey.success ? groupKey.data : undefined
        if (typeof key !== 'string') {
            entries.push({key: descriptor.id, explicit: false, members: [descriptor]})
            continue
        }
        let entry = explicitEntries.get(key)
        if (!entry) {
            entry = {key, explicit: true, members: []}
            explicitEntries.set(key, entry)
            entries.push(entry)
        }
        entry.members.push(descriptor)
    }

    if (fatal.length) {
        throw new CollectionError(fatal)
    }

    const groups = entries.map(entry => {
        const parents = new Set(entry.members.map(m => m.parent))
        if (parents.size <= 1) {
            return new TestGroup(entry)
        }
        const skipReason = `Group "${entry.key}" has members from different parents`
        warnings.push({
            message: `${skipReason} (${[...parents].map(p => p ?? '<none>').join(', ')}) - all members are skipped`,
        })
        return new TestGroup({...entry, skipReason})
    })

    return {groups, warnings}
}
