import type { CoreAI_EntityId } from '../../Modules/World/IWorld'
import type { CoreAI_TickContext } from '../../TickContext'
import type { CoreAI_IRule } from '../../Modules/Rule/Rule'
import { CoreAI_castRule } from '../../Modules/Rule/CastRule'

/** Nearest attackable non-elite hostile the agent holds no threat on. */
function looseHostile(ctx: CoreAI_TickContext): CoreAI_EntityId | null {
    const { snapshot } = ctx
    if (!snapshot.inCombat || !snapshot.inGroupContent) return null

    const loose = snapshot.targets.hostiles.find(
        (h) =>
            h.attackable &&
            !h.elite &&
            !h.hasThreat &&
            h.distance <= snapshot.settings.rangedRange
    )
    return loose?.id ?? null
}

export function CoreAI_utilityRules(): CoreAI_IRule[] {
    return [
        CoreAI_castRule('utility.summon', {
            role: 'summon',
            when: ({ snapshot }) =>
                snapshot.settings.useSummon && snapshot.inCombat && !snapshot.hasCompanion,
        }),

        CoreAI_castRule('utility.revive', {
            role: 'revive',
            target: ({ snapshot }) => snapshot.reviveCandidate,
            when: ({ snapshot }) => snapshot.settings.useRevive,
        }),

        CoreAI_castRule('utility.taunt', {
            role: 'taunt',
            target: looseHostile,
            when: ({ snapshot }) => snapshot.settings.useTaunt,
        }),

        // displacement pulls the hostile in when the taunt is down or turned off
        CoreAI_castRule('utility.tauntDisplace', {
            role: 'displacement',
            target: looseHostile,
            when: ({ snapshot, abilities }) =>
                snapshot.settings.useTauntDisplace &&
                (!snapshot.settings.useTaunt || abilities.ready('taunt') === null),
        }),

        CoreAI_castRule('utility.consumable', {
            role: 'consumable',
            when: ({ snapshot }) =>
                snapshot.settings.useConsumable &&
                snapshot.healthPct <= snapshot.settings.consumableHealth,
            minIntervalSec: ({ snapshot }) => snapshot.settings.consumableIntervalSec,
        }),
    ]
}
