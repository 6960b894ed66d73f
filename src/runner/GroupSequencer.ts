import { GroupMode } from '../config/RunnerConfig'
import { settleAll } from '../util/settleAll'
import type { ConcurrentExecutor, ExecutionObserver } from './ConcurrentExecutor'
import type { TestGroup } from './TestGroup'

export class GroupSequencer {
    constructor(
        readonly executor: ConcurrentExecutor,
        readonly mode: GroupMode = GroupMode.sequential,
        readonly observer: ExecutionObserver = {},
    ) {}

    /**
     * Run the groups in the given order.
     *
     * In sequential mode a group starts after the previous one settled.
     * Failing tests never stop the sequence.
     */
    async run(groups: readonly TestGroup[]) {
        if (this.mode === GroupMode.parallel) {
            await settleAll(groups.map(g => this.runGroup(g)))
            return
        }

        for (const group of groups) {
            await this.runGroup(group)
        }
    }

    protected async runGroup(group: TestGroup) {
        this.observer.groupStart?.(group)
        const outcomes = await this.executor.execute(group)
        this.observer.groupDone?.(group, outcomes)
    }
}
