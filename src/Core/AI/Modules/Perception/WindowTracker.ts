import type { CoreAI_StatusId } from '../World/IWorld'
import type { CoreAI_StatusDiff } from './StatusTracker'

/**
 * CoreAI_WindowTracker:
 * "Once per status window" bookkeeping.
 *
 * A window opens when the diff reports the status as gained;
 * the action may be used once until the next opening.
 */
export class CoreAI_WindowTracker {
    private used: boolean = false

    constructor(
        public readonly name: string,
        private readonly statusId: CoreAI_StatusId | null
    ) {}

    observe(diff: CoreAI_StatusDiff): void {
        if (this.statusId === null) return
        if (diff.gained.includes(this.statusId)) {
            this.used = false
        }
    }

    canUse(windowActive: boolean): boolean {
        return windowActive && !this.used
    }

    markUsed(): void {
        this.used = true
    }

    reset(): void {
        this.used = false
    }
}
