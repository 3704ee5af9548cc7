import type { CoreAI_EntityId } from '../../Modules/World/IWorld'
import type { CoreAI_TickContext } from '../../TickContext'
import { CoreAI_statusOf } from '../../TickContext'
import type { CoreAI_IRule } from '../../Modules/Rule/Rule'
import { CoreAI_castRule } from '../../Modules/Rule/CastRule'
import { CoreAI_countHostiles } from '../../Modules/Perception/Targeting'
import type { CoreAI_WindowTracker } from '../../Modules/Perception/WindowTracker'
import {
    CoreAI_areaPulseRule,
    CoreAI_bufferConsumerRule,
    CoreAI_bufferMaintainRule,
    CoreAI_burstWindowPulseRule,
    CoreAI_capDumpRule,
    CoreAI_dotSpreadRule,
    CoreAI_drainRule,
    CoreAI_engagedOutlives,
    CoreAI_fillerRule,
    CoreAI_groundZoneRule,
    CoreAI_meleeTarget,
    CoreAI_rangedFillerRule,
    CoreAI_rangedTarget,
    CoreAI_richFillerRule,
    CoreAI_stackUpRule,
    CoreAI_stormRule,
} from './CombatShared'

/** Target must outlive the execute debuff by this much. */
const EXECUTE_MARGIN_SEC = 5
const EXECUTE_MAX_HOSTILES = 2

/** Lowest-health melee hostile eligible for the execute. */
export function CoreAI_executeTarget(ctx: CoreAI_TickContext): CoreAI_EntityId | null {
    const { snapshot } = ctx
    const s = snapshot.settings

    if (CoreAI_countHostiles(snapshot, s.areaRange) > EXECUTE_MAX_HOSTILES) return null

    const empowered = CoreAI_statusOf(snapshot, 'empowered').active
    let best: { id: CoreAI_EntityId; healthPct: number } | null = null

    for (const h of snapshot.targets.hostiles) {
        if (!h.attackable || h.distance > s.meleeRange) continue
        if (!empowered && h.healthPct >= s.executeHealth) continue
        if (h.timeToDie <= s.executeDelaySec + EXECUTE_MARGIN_SEC) continue

        if (!best || h.healthPct < best.healthPct) best = h
    }

    return best?.id ?? null
}

const burstRule: CoreAI_IRule = CoreAI_castRule('reaper.burst', {
    role: 'burst',
    target: CoreAI_meleeTarget,
    when: (ctx) =>
        ctx.snapshot.settings.useBurst &&
        !CoreAI_statusOf(ctx.snapshot, 'burstWindow').active &&
        CoreAI_engagedOutlives(ctx, ctx.snapshot.settings.burstMinTargetLife),
})

const markRule: CoreAI_IRule = CoreAI_castRule('reaper.mark', {
    role: 'mark',
    target: CoreAI_rangedTarget,
    when: ({ snapshot }) => snapshot.settings.useMark,
})

const executeRule: CoreAI_IRule = CoreAI_castRule('reaper.execute', {
    role: 'execute',
    target: CoreAI_executeTarget,
    when: ({ snapshot }) => snapshot.settings.useExecute,
})

/** Spends the mark window on a refresh, outside the burst window. */
const markWindowRefreshRule: CoreAI_IRule = CoreAI_castRule('reaper.markWindowRefresh', {
    role: 'bufferRefresh',
    target: CoreAI_meleeTarget,
    forecast: true,
    when: ({ snapshot }) =>
        CoreAI_statusOf(snapshot, 'markWindow').active &&
        !CoreAI_statusOf(snapshot, 'burstWindow').active,
})

/** Reaper rotation after the openers, with the mode's own rules in place. */
export function CoreAI_reaperRotation(burstWindow: CoreAI_WindowTracker): CoreAI_IRule[] {
    return [
        CoreAI_bufferMaintainRule,
        CoreAI_dotSpreadRule,
        burstRule,
        CoreAI_stormRule,
        CoreAI_capDumpRule,
        markRule,
        executeRule,
        CoreAI_stackUpRule,
        CoreAI_bufferConsumerRule,
        CoreAI_groundZoneRule,
        CoreAI_burstWindowPulseRule(burstWindow),
        markWindowRefreshRule,
        CoreAI_richFillerRule,
        CoreAI_drainRule,
        CoreAI_areaPulseRule,
        CoreAI_fillerRule,
        CoreAI_rangedFillerRule,
    ]
}
