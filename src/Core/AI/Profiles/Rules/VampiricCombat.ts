import { CoreAI_engagedTarget, CoreAI_statusOf } from '../../TickContext'
import type { CoreAI_IRule } from '../../Modules/Rule/Rule'
import { CoreAI_castRule } from '../../Modules/Rule/CastRule'
import { CoreAI_CriticalBufferGuard as Guard } from '../../Modules/Resource/CriticalBufferGuard'
import { CoreAI_SpendPolicy } from '../../Modules/Resource/SpendPolicy'
import {
    CoreAI_areaPulseRule,
    CoreAI_drainRule,
    CoreAI_fillerRule,
    CoreAI_groundZoneRule,
    CoreAI_meleeTarget,
    CoreAI_rangedTarget,
    CoreAI_spendInputs,
    CoreAI_spendThresholds,
    CoreAI_stormRule,
} from './CombatShared'

/** Essence is refreshed when less than this is left. */
const ESSENCE_REFRESH_SEC = 1.5
/** Continuous amount above which the survival strike is used as filler. */
const SURVIVAL_FILLER_AMOUNT = 80

const essenceRule: CoreAI_IRule = CoreAI_castRule('vampiric.essence', {
    role: 'essenceStrike',
    target: CoreAI_meleeTarget,
    when: ({ snapshot }) => {
        const essence = CoreAI_statusOf(snapshot, 'essence')
        return !essence.active || essence.remaining < ESSENCE_REFRESH_SEC
    },
})

/** Rules only the vampiric mode runs outside its burst window. */
export function CoreAI_vampiricRules(): CoreAI_IRule[] {
    return [
        CoreAI_castRule('vampiric.rangedMaintain', {
            role: 'rangedBufferRefresh',
            target: CoreAI_rangedTarget,
            respectBlock: false,
            when: ({ snapshot }) => Guard.isLow(snapshot.buffer),
        }),

        CoreAI_castRule('vampiric.areaMaintain', {
            role: 'bufferRefresh',
            target: CoreAI_meleeTarget,
            respectBlock: false,
            when: ({ snapshot }) => Guard.isLow(snapshot.buffer),
        }),

        essenceRule,
    ]
}

/** Full rotation while the burst status is active; follows the openers. */
export function CoreAI_vampiricBurstRules(): CoreAI_IRule[] {
    return [
        essenceRule,
        CoreAI_stormRule,

        CoreAI_castRule('vampiric.burstDump', {
            role: 'survivalStrike',
            target: CoreAI_meleeTarget,
            when: (ctx, ability) => {
                const inputs = CoreAI_spendInputs(ctx)
                const thresholds = CoreAI_spendThresholds(ctx)
                const threshold = CoreAI_SpendPolicy.cappingThreshold(
                    inputs.burstActive,
                    CoreAI_SpendPolicy.shouldPoolForBurst(inputs),
                    thresholds
                )

                if (CoreAI_SpendPolicy.isCapping(inputs.deficit, threshold)) return true

                return (
                    CoreAI_SpendPolicy.shouldSpend(ability.cost.continuous, inputs, thresholds) &&
                    !ctx.snapshot.forecast.shouldWaitForGeneration(ctx.snapshot.gcd)
                )
            },
        }),

        CoreAI_castRule('vampiric.burstPulse', {
            role: 'areaPulse',
            when: ({ snapshot }) => {
                const target = CoreAI_engagedTarget(snapshot)
                return target !== null && target.dotRemaining <= 0
            },
        }),

        CoreAI_groundZoneRule,
        CoreAI_fillerRule,

        CoreAI_castRule('vampiric.survivalFiller', {
            role: 'survivalStrike',
            target: CoreAI_meleeTarget,
            when: ({ snapshot }) =>
                snapshot.continuous.amount > SURVIVAL_FILLER_AMOUNT &&
                snapshot.forecast.timeUntil(1) > snapshot.gcd + snapshot.settings.forecastWindow,
        }),

        CoreAI_drainRule,
        CoreAI_areaPulseRule,
    ]
}
