import type { CoreAI_EntityId } from '../World/IWorld'
import type { CoreAI_TickContext } from '../../TickContext'
import type { CoreAI_AbilityRole } from '../../Profiles/Catalogue'
import type { CoreAI_Ability } from '../Action/Ability'
import { type CoreAI_IRule, CoreAI_rule } from './Rule'

export type CoreAI_TargetPick = (ctx: CoreAI_TickContext) => CoreAI_EntityId | null

export interface CoreAI_CastRuleOptions {
    role: CoreAI_AbilityRole
    /** Extra condition on top of readiness and cost. */
    when?: (ctx: CoreAI_TickContext, ability: CoreAI_Ability) => boolean
    /** Omitted: cast without a target. Returning null fails the guard. */
    target?: CoreAI_TargetPick
    /** Hold while discrete spending is blocked. Default true for discrete spenders. */
    respectBlock?: boolean
    /**
     * Accept a discrete cost that the forecast delivers within the forecast
     * window plus one tick. The host rejects the cast if it still cannot pay.
     */
    forecast?: boolean
    /** Discrete cost override, e.g. when a proc makes the ability free. */
    discreteCost?: (ctx: CoreAI_TickContext, ability: CoreAI_Ability) => number
    minIntervalSec?: (ctx: CoreAI_TickContext) => number
    onSuccess?: (ctx: CoreAI_TickContext) => void
}

export function CoreAI_canPay(
    ctx: CoreAI_TickContext,
    ability: CoreAI_Ability,
    discreteCost: number = ability.cost.discrete
): boolean {
    const { forecast, continuous } = ctx.snapshot
    return forecast.current >= discreteCost && continuous.amount >= ability.cost.continuous
}

/** Like CoreAI_canPay, with the discrete cost judged by the forecast. */
export function CoreAI_canPaySoon(
    ctx: CoreAI_TickContext,
    ability: CoreAI_Ability,
    discreteCost: number = ability.cost.discrete
): boolean {
    const { forecast, continuous, settings, gcd } = ctx.snapshot
    return (
        forecast.canAffordSoon(discreteCost, settings.forecastWindow, gcd) &&
        continuous.amount >= ability.cost.continuous
    )
}

/**
 * Casts `role` if it is ready and affordable. For rule actions that choose
 * between several abilities at dispatch time.
 */
export function CoreAI_tryCast(
    ctx: CoreAI_TickContext,
    role: CoreAI_AbilityRole,
    label: string,
    target?: CoreAI_EntityId | null
): boolean {
    const ability = ctx.abilities.ready(role)
    if (!ability || !CoreAI_canPay(ctx, ability)) return false
    if (target === null) return false

    return ctx.dispatcher.cast(ability, { label, target })
}

/**
 * Rule that casts the ability bound to `role`.
 *
 * Guard: ability ready, affordable (now, or soon with `forecast`), not held by the discrete block,
 * gate open, target resolved, then `when`.
 */
export function CoreAI_castRule(name: string, options: CoreAI_CastRuleOptions): CoreAI_IRule {
    const resolveTarget = (ctx: CoreAI_TickContext): CoreAI_EntityId | null | undefined =>
        options.target ? options.target(ctx) : undefined

    return CoreAI_rule(
        name,
        (ctx) => {
            const ability = ctx.abilities.ready(options.role)
            if (!ability) return false

            const discrete = options.discreteCost
                ? options.discreteCost(ctx, ability)
                : ability.cost.discrete

            const affordable = options.forecast
                ? CoreAI_canPaySoon(ctx, ability, discrete)
                : CoreAI_canPay(ctx, ability, discrete)
            if (!affordable) return false

            const respectBlock = options.respectBlock ?? true
            if (respectBlock && discrete > 0 && ctx.snapshot.discreteBlocked) return false

            if (
                options.minIntervalSec &&
                !ctx.dispatcher.isGateOpen(ability, options.minIntervalSec(ctx))
            ) {
                return false
            }

            if (resolveTarget(ctx) === null) return false

            return options.when ? options.when(ctx, ability) : true
        },
        (ctx) => {
            const ability = ctx.abilities.get(options.role)
            if (!ability) return false

            const ok = ctx.dispatcher.cast(ability, {
                label: name,
                target: resolveTarget(ctx),
                minIntervalSec: options.minIntervalSec?.(ctx),
            })

            if (ok) options.onSuccess?.(ctx)
            return ok
        }
    )
}
