import type { CoreAI_TickContext } from '../../TickContext'
import { CoreAI_engagedTarget, CoreAI_statusOf } from '../../TickContext'
import { type CoreAI_IRule, CoreAI_rule } from '../../Modules/Rule/Rule'
import { CoreAI_castRule, CoreAI_tryCast, type CoreAI_TargetPick } from '../../Modules/Rule/CastRule'
import { CoreAI_CriticalBufferGuard as Guard } from '../../Modules/Resource/CriticalBufferGuard'
import type { CoreAI_SpendInputs, CoreAI_SpendThresholds } from '../../Modules/Resource/SpendPolicy'
import type { CoreAI_WindowTracker } from '../../Modules/Perception/WindowTracker'
import { CoreAI_countHostiles, CoreAI_countNeedingDot } from '../../Modules/Perception/Targeting'

/* ------------------------------------------------------------
 * Shared helpers
 * ------------------------------------------------------------ */

export const CoreAI_meleeTarget: CoreAI_TargetPick = ({ snapshot }) => snapshot.targets.melee
export const CoreAI_rangedTarget: CoreAI_TargetPick = ({ snapshot }) => snapshot.targets.ranged

export function CoreAI_spendInputs(ctx: CoreAI_TickContext): CoreAI_SpendInputs {
    const { snapshot, abilities } = ctx
    const burst = abilities.get('burst')

    return {
        amount: snapshot.continuous.amount,
        deficit: snapshot.continuous.deficit,
        healthPct: snapshot.healthPct,
        predictedHealthPct: snapshot.predictedHealthPct,
        burstActive: CoreAI_statusOf(snapshot, 'burstWindow').active,
        burstLearned: burst?.isLearned() ?? false,
        burstCooldownSec: burst?.cooldownRemaining() ?? 0,
    }
}

export function CoreAI_spendThresholds(ctx: CoreAI_TickContext): CoreAI_SpendThresholds {
    const s = ctx.snapshot.settings
    return {
        cappingThreshold: s.cappingThreshold,
        poolingThreshold: s.poolingThreshold,
        aggressiveSpending: s.aggressiveSpending,
    }
}

/** Storm and buffer consumer share one gate. */
function stormWindow(ctx: CoreAI_TickContext): boolean {
    const { snapshot, abilities } = ctx
    const s = snapshot.settings

    if (snapshot.buffer.stacks < s.stormMinStacks) return false
    if (!CoreAI_statusOf(snapshot, 'zone').active) return false
    if (CoreAI_statusOf(snapshot, 'burstWindow').active) return false
    if (CoreAI_countHostiles(snapshot, s.areaRange) < 1) return false

    const burst = abilities.get('burst')
    return !burst || !burst.isLearned() || burst.cooldownRemaining() >= s.stormBurstCooldown
}

/* ------------------------------------------------------------
 * Openers: every combat mode starts with these
 * ------------------------------------------------------------ */

export const CoreAI_bufferEmergencyRule: CoreAI_IRule = CoreAI_rule(
    'combat.bufferEmergency',
    ({ snapshot }) =>
        snapshot.emergency.kind === 'refresh' || snapshot.emergency.kind === 'survive',
    (ctx) => {
        const { emergency, targets } = ctx.snapshot

        if (emergency.kind === 'survive') {
            return CoreAI_tryCast(ctx, 'survivalStrike', 'combat.bufferEmergency', targets.melee)
        }

        return (
            CoreAI_tryCast(ctx, 'bufferRefresh', 'combat.bufferEmergency', targets.melee) ||
            CoreAI_tryCast(ctx, 'rangedBufferRefresh', 'combat.bufferEmergency', targets.ranged)
        )
    }
)

export const CoreAI_healthHealRule: CoreAI_IRule = CoreAI_castRule('combat.healthHeal', {
    role: 'survivalStrike',
    target: CoreAI_meleeTarget,
    when: ({ snapshot }) => snapshot.healthPct < snapshot.settings.healThreshold,
    minIntervalSec: ({ snapshot }) => snapshot.settings.healIntervalSec,
})

/* ------------------------------------------------------------
 * Rotation fragments
 * ------------------------------------------------------------ */

export const CoreAI_bufferMaintainRule: CoreAI_IRule = CoreAI_castRule('combat.bufferMaintain', {
    role: 'bufferRefresh',
    target: CoreAI_meleeTarget,
    respectBlock: false,
    forecast: true,
    when: ({ snapshot }) => Guard.isLow(snapshot.buffer),
})

export const CoreAI_dotSpreadRule: CoreAI_IRule = CoreAI_castRule('combat.dotSpread', {
    role: 'areaPulse',
    forecast: true,
    when: ({ snapshot }) => CoreAI_countNeedingDot(snapshot, snapshot.settings.areaRange) >= 1,
})

export const CoreAI_capDumpRule: CoreAI_IRule = CoreAI_castRule('combat.capDump', {
    role: 'survivalStrike',
    target: CoreAI_meleeTarget,
    when: ({ snapshot }) => {
        const s = snapshot.settings
        const limit = CoreAI_statusOf(snapshot, 'burstWindow').active
            ? s.capDumpAmountBurst
            : s.capDumpAmount

        return snapshot.continuous.amount > limit
    },
})

export const CoreAI_stormRule: CoreAI_IRule = CoreAI_castRule('combat.storm', {
    role: 'storm',
    when: (ctx) => ctx.snapshot.settings.useStorm && stormWindow(ctx),
})

export const CoreAI_stackUpRule: CoreAI_IRule = CoreAI_castRule('combat.stackUp', {
    role: 'bufferRefresh',
    target: CoreAI_meleeTarget,
    forecast: true,
    when: ({ snapshot }) =>
        Guard.shouldStack(
            snapshot.buffer.stacks,
            snapshot.settings.bufferOptimalStacks,
            CoreAI_statusOf(snapshot, 'storm').active
        ),
})

export const CoreAI_bufferConsumerRule: CoreAI_IRule = CoreAI_castRule('combat.bufferConsumer', {
    role: 'bufferConsumer',
    when: (ctx) =>
        ctx.snapshot.settings.useBufferConsumer &&
        !CoreAI_statusOf(ctx.snapshot, 'storm').active &&
        stormWindow(ctx),
})

export const CoreAI_groundZoneRule: CoreAI_IRule = CoreAI_castRule('combat.groundZone', {
    role: 'groundZone',
    forecast: true,
    discreteCost: ({ snapshot }, ability) =>
        CoreAI_statusOf(snapshot, 'freeZoneProc').active ? 0 : ability.cost.discrete,
    when: ({ snapshot }) =>
        !CoreAI_statusOf(snapshot, 'zone').active &&
        (CoreAI_statusOf(snapshot, 'freeZoneProc').active ||
            CoreAI_countHostiles(snapshot, snapshot.settings.areaRange) >=
                snapshot.settings.groundZoneMinHits),
})

export function CoreAI_burstWindowPulseRule(window: CoreAI_WindowTracker): CoreAI_IRule {
    return CoreAI_castRule('combat.burstWindowPulse', {
        role: 'areaPulse',
        forecast: true,
        when: ({ snapshot }) =>
            window.canUse(CoreAI_statusOf(snapshot, 'burstWindow').active) &&
            CoreAI_countHostiles(snapshot, snapshot.settings.areaRange) >= 1,
        onSuccess: () => window.markUsed(),
    })
}

export const CoreAI_richFillerRule: CoreAI_IRule = CoreAI_castRule('combat.richFiller', {
    role: 'fillerStrike',
    target: CoreAI_meleeTarget,
    forecast: true,
    when: ({ snapshot }) => snapshot.forecast.current >= 2,
})

export const CoreAI_drainRule: CoreAI_IRule = CoreAI_castRule('combat.drain', {
    role: 'drain',
    target: CoreAI_meleeTarget,
    forecast: true,
    when: ({ snapshot }) => snapshot.settings.useDrain,
})

/** Keeps one charge back unless several hostiles are in reach. */
export const CoreAI_areaPulseRule: CoreAI_IRule = CoreAI_castRule('combat.areaPulse', {
    role: 'areaPulse',
    forecast: true,
    when: ({ snapshot }, ability) => {
        const count = CoreAI_countHostiles(snapshot, snapshot.settings.areaRange)
        return count >= 2 || (count >= 1 && ability.charges() >= 2)
    },
})

export const CoreAI_fillerRule: CoreAI_IRule = CoreAI_castRule('combat.filler', {
    role: 'fillerStrike',
    target: CoreAI_meleeTarget,
    forecast: true,
})

export const CoreAI_rangedFillerRule: CoreAI_IRule = CoreAI_castRule('combat.rangedFiller', {
    role: 'rangedBufferRefresh',
    target: CoreAI_rangedTarget,
    when: ({ snapshot }) => snapshot.targets.melee === null,
})

/** Engaged target lives at least `minSec`. */
export function CoreAI_engagedOutlives(ctx: CoreAI_TickContext, minSec: number): boolean {
    const target = CoreAI_engagedTarget(ctx.snapshot)
    return target !== null && target.timeToDie >= minSec
}

export const CoreAI_COMBAT_OPENERS: readonly CoreAI_IRule[] = [
    CoreAI_bufferEmergencyRule,
    CoreAI_healthHealRule,
]

export function CoreAI_sharedRotation(burstWindow: CoreAI_WindowTracker): CoreAI_IRule[] {
    return [
        CoreAI_bufferMaintainRule,
        CoreAI_dotSpreadRule,
        CoreAI_stormRule,
        CoreAI_capDumpRule,
        CoreAI_stackUpRule,
        CoreAI_bufferConsumerRule,
        CoreAI_groundZoneRule,
        CoreAI_burstWindowPulseRule(burstWindow),
        CoreAI_richFillerRule,
        CoreAI_drainRule,
        CoreAI_areaPulseRule,
        CoreAI_fillerRule,
        CoreAI_rangedFillerRule,
    ]
}
