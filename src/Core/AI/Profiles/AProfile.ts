import type { CoreAI_TickSnapshot } from '../TickContext'
import type { CoreAI_RuleCategory, CoreAI_RuleSet } from '../Modules/Rule/Rule'
import type { CoreAI_ModeProbe } from '../Modules/Mode/ModeRouter'
import type { CoreAI_AbilityBook } from '../Modules/Action/Ability'
import type { CoreAI_WindowTracker } from '../Modules/Perception/WindowTracker'
import type { CoreAI_StatusDiff } from '../Modules/Perception/StatusTracker'
import type { CoreAI_Catalogue } from './Catalogue'

export type CoreAI_FixedCategory = Exclude<CoreAI_RuleCategory, 'combat'>

/**
 * CoreAI_AProfile
 *
 * Static wiring of one agent kind:
 * - catalogue of abilities and statuses
 * - rule sets for the fixed categories
 * - combat rule set per mode
 * - capability probes and once-per-window trackers
 *
 * Rule sets are built in the constructor and never change afterwards.
 */
export abstract class CoreAI_AProfile {
    public readonly ruleSets: Map<CoreAI_FixedCategory, CoreAI_RuleSet> = new Map()
    public readonly windows: CoreAI_WindowTracker[] = []

    constructor(public readonly catalogue: CoreAI_Catalogue) {}

    /** Combat rules for the snapshot's mode, null when Combat is skipped. */
    abstract combatFor(snapshot: CoreAI_TickSnapshot): CoreAI_RuleSet | null

    abstract probes(abilities: CoreAI_AbilityBook): CoreAI_ModeProbe[]

    observe(diff: CoreAI_StatusDiff): void {
        for (const window of this.windows) {
            window.observe(diff)
        }
    }

    reset(): void {
        for (const window of this.windows) {
            window.reset()
        }
    }

    protected addRuleSetIf(
        enabled: boolean | undefined,
        category: CoreAI_FixedCategory,
        factory: () => CoreAI_RuleSet
    ): void {
        if (enabled === false) return
        this.ruleSets.set(category, factory())
    }

    protected track(window: CoreAI_WindowTracker): CoreAI_WindowTracker {
        this.windows.push(window)
        return window
    }
}
