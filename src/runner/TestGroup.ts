import type { TestDescriptor } from './TestDescriptor'

export class TestGroup {
    readonly key: string
    /** `false` for the singleton group of a test without `groupKey`. */
    readonly explicit: boolean
    readonly members: readonly TestDescriptor[]
    readonly skipReason?: string

    constructor(
        props: {
            key: string
            explicit: boolean
            members: TestDescriptor[]
            skipReason?: string
        },
    ) {
        this.key = props.key
        this.explicit = props.explicit
        this.members = Object.freeze([...props.members])
        this.skipReason = props.skipReason
        Object.freeze(this)
    }

    get size() {
        return this.members.length
    }

    toJSON() {
        return {
            key: this.key,
            explicit: this.explicit,
            members: this.members.map(m => m.id),
            skipReason: this.skipReason,
        }
    }
}
