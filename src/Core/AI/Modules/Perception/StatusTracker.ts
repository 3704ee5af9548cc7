import type { CoreAI_StatusId } from '../World/IWorld'

export interface CoreAI_StatusState {
    readonly active: boolean
    readonly remaining: number
    readonly stacks: number
}

export interface CoreAI_StackChange {
    readonly id: CoreAI_StatusId
    readonly from: number
    readonly to: number
}

export interface CoreAI_StatusDiff {
    readonly gained: readonly CoreAI_StatusId[]
    readonly lost: readonly CoreAI_StatusId[]
    readonly stackChanged: readonly CoreAI_StackChange[]
}

export const CoreAI_INACTIVE_STATUS: CoreAI_StatusState = Object.freeze({
    active: false,
    remaining: 0,
    stacks: 0,
})

export const CoreAI_EMPTY_DIFF: CoreAI_StatusDiff = Object.freeze({
    gained: [],
    lost: [],
    stackChanged: [],
})

/**
 * CoreAI_StatusTracker:
 * Polls watched statuses every tick and diffs them against the previous poll.
 *
 * The diff is the only notion of "status changed" in the core;
 * CoreAI_StatusEvents re-emits it for listeners.
 */
export class CoreAI_StatusTracker {
    private previous: Map<CoreAI_StatusId, CoreAI_StatusState> = new Map()

    poll(
        ids: readonly CoreAI_StatusId[],
        read: (id: CoreAI_StatusId) => CoreAI_StatusState
    ): { states: ReadonlyMap<CoreAI_StatusId, CoreAI_StatusState>; diff: CoreAI_StatusDiff } {
        const states = new Map<CoreAI_StatusId, CoreAI_StatusState>()
        const gained: CoreAI_StatusId[] = []
        const lost: CoreAI_StatusId[] = []
        const stackChanged: CoreAI_StackChange[] = []

        for (const id of ids) {
            const now = read(id)
            const before = this.previous.get(id) ?? CoreAI_INACTIVE_STATUS

            states.set(id, now)

            if (now.active && !before.active) gained.push(id)
            if (!now.active && before.active) lost.push(id)
            if (now.stacks !== before.stacks) {
                stackChanged.push({ id, from: before.stacks, to: now.stacks })
            }
        }

        this.previous = states

        return {
            states,
            diff: { gained, lost, stackChanged },
        }
    }

    reset(): void {
        this.previous.clear()
    }
}
