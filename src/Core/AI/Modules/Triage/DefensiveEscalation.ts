import type { CoreAI_TickSnapshot } from '../../TickContext'
import { CoreAI_engagedTarget, CoreAI_statusOf } from '../../TickContext'
import type { CoreAI_AbilityBook } from '../Action/Ability'
import type { CoreAI_StatusRole } from '../../Profiles/Catalogue'
import { CoreAI_INTERRUPT_ROLES } from './InterruptTriage'

/** Statuses that count as strong mitigation for anti-stacking. */
export const CoreAI_STRONG_MITIGATION_STATUSES: readonly CoreAI_StatusRole[] = [
    'majorMitigation',
    'strongMitigation',
    'shield',
    'burstWindow',
]

/** Active strong mitigations at which a new one is withheld. */
export const CoreAI_ANTI_STACK_LIMIT = 2

export type CoreAI_ShieldTrigger = 'magic' | 'lastResort'

/**
 * CoreAI_DefensiveEscalation:
 * Predicates the defensive rules are built from.
 */
export class CoreAI_DefensiveEscalation {
    static activeMitigations(snapshot: CoreAI_TickSnapshot): number {
        let count = 0
        for (const role of CoreAI_STRONG_MITIGATION_STATUSES) {
            if (CoreAI_statusOf(snapshot, role).active) count++
        }
        return count
    }

    /** Extreme-severity actions pass `exempt`. */
    static isStackBlocked(snapshot: CoreAI_TickSnapshot, exempt: boolean = false): boolean {
        if (exempt) return false
        return CoreAI_DefensiveEscalation.activeMitigations(snapshot) >= CoreAI_ANTI_STACK_LIMIT
    }

    static healthGate(
        snapshot: CoreAI_TickSnapshot,
        healthPct: number,
        predictedPct: number
    ): boolean {
        return snapshot.healthPct <= healthPct || snapshot.predictedHealthPct <= predictedPct
    }

    /** A hostile activity aimed at the agent is in progress. */
    static incomingAction(snapshot: CoreAI_TickSnapshot): boolean {
        return snapshot.targets.hostiles.some((h) => h.activity?.targetsAgent === true)
    }

    /** At least one blocking ability is learned and every learned one is unavailable. */
    static allBlocksUnavailable(abilities: CoreAI_AbilityBook): boolean {
        let learned = 0
        for (const role of CoreAI_INTERRUPT_ROLES) {
            const ability = abilities.get(role)
            if (!ability || !ability.isLearned()) continue
            learned++
            if (ability.isReady()) return false
        }
        return learned > 0
    }

    /** Engaged target outlives minSec. With no target at all the check passes. */
    static targetOutlives(snapshot: CoreAI_TickSnapshot, minSec: number): boolean {
        const target = CoreAI_engagedTarget(snapshot)
        if (!target) return snapshot.targets.hostiles.length === 0

        return target.timeToDie >= minSec
    }

    static shieldTrigger(
        snapshot: CoreAI_TickSnapshot,
        abilities: CoreAI_AbilityBook
    ): CoreAI_ShieldTrigger | null {
        const s = snapshot.settings
        if (!CoreAI_DefensiveEscalation.targetOutlives(snapshot, s.shieldMinTargetLife)) {
            return null
        }

        const magicThreat = snapshot.magicRelevant || snapshot.magicDamagePct > s.shieldMagicPct
        if (magicThreat && snapshot.healthPct <= s.shieldHealth) return 'magic'

        if (
            CoreAI_DefensiveEscalation.allBlocksUnavailable(abilities) &&
            (CoreAI_DefensiveEscalation.incomingAction(snapshot) ||
                snapshot.healthPct < s.shieldLastResortHealth)
        ) {
            return 'lastResort'
        }

        return null
    }
}
