import type { CoreAI_IRule } from '../../Modules/Rule/Rule'
import { CoreAI_castRule } from '../../Modules/Rule/CastRule'
import { CoreAI_DefensiveEscalation as Escalation } from '../../Modules/Triage/DefensiveEscalation'

/**
 * Defensive category, strongest trigger first.
 *
 * Anti-stacking holds major, strong, shield and defensive burst;
 * weak mitigation and the emergency heal are exempt.
 */
export function CoreAI_defensiveRules(): CoreAI_IRule[] {
    return [
        CoreAI_castRule('defensive.stunBreak', {
            role: 'strongMitigation',
            respectBlock: false,
            when: ({ snapshot }) => snapshot.stunned,
        }),

        CoreAI_castRule('defensive.shield', {
            role: 'shield',
            respectBlock: false,
            when: ({ snapshot, abilities }) =>
                snapshot.settings.useShield &&
                snapshot.inCombat &&
                !Escalation.isStackBlocked(snapshot) &&
                Escalation.shieldTrigger(snapshot, abilities) !== null,
        }),

        CoreAI_castRule('defensive.zoneShield', {
            role: 'zoneShield',
            respectBlock: false,
            when: ({ snapshot }) =>
                snapshot.inCombat &&
                snapshot.magicRelevant &&
                snapshot.alliesTakingMagic >= 1,
        }),

        CoreAI_castRule('defensive.major', {
            role: 'majorMitigation',
            respectBlock: false,
            when: ({ snapshot }) =>
                snapshot.settings.useMajorMitigation &&
                snapshot.inCombat &&
                !Escalation.isStackBlocked(snapshot) &&
                Escalation.healthGate(
                    snapshot,
                    snapshot.settings.majorMitigationHealth,
                    snapshot.settings.majorMitigationPredicted
                ),
        }),

        CoreAI_castRule('defensive.burst', {
            role: 'burst',
            respectBlock: false,
            target: ({ snapshot }) => snapshot.targets.melee,
            when: ({ snapshot }) =>
                snapshot.settings.useBurst &&
                snapshot.inCombat &&
                snapshot.continuous.amount < snapshot.settings.defensiveBurstMaxAmount &&
                snapshot.healthPct <= snapshot.settings.defensiveBurstHealth &&
                !Escalation.isStackBlocked(snapshot) &&
                Escalation.targetOutlives(snapshot, snapshot.settings.burstMinTargetLife),
        }),

        CoreAI_castRule('defensive.strong', {
            role: 'strongMitigation',
            respectBlock: false,
            when: ({ snapshot }) =>
                snapshot.settings.useStrongMitigation &&
                snapshot.inCombat &&
                !Escalation.isStackBlocked(snapshot) &&
                Escalation.healthGate(
                    snapshot,
                    snapshot.settings.strongMitigationHealth,
                    snapshot.settings.strongMitigationPredicted
                ),
        }),

        CoreAI_castRule('defensive.weak', {
            role: 'weakMitigation',
            respectBlock: false,
            when: ({ snapshot }) =>
                snapshot.settings.useWeakMitigation &&
                snapshot.inCombat &&
                snapshot.healthPct <= snapshot.settings.weakMitigationHealth,
        }),

        CoreAI_castRule('defensive.emergencyHeal', {
            role: 'emergencyHeal',
            respectBlock: false,
            when: ({ snapshot }) =>
                snapshot.settings.useEmergencyHeal &&
                snapshot.inCombat &&
                snapshot.healthPct <= snapshot.settings.emergencyHealHealth,
        }),
    ]
}
