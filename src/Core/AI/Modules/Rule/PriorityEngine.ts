import type { CoreAI_TickContext } from '../../TickContext'
import type { CoreAI_RuleSet } from './Rule'
import { CoreAI_componentLogger } from '../Debug/Logger'

export interface CoreAI_FiredRule {
    ruleSet: string
    rule: string
    time: number
}

/**
 * CoreAI_PriorityEngine
 *
 * - rules run strictly in array order
 * - first action that reports success ends the evaluation
 * - a failed action falls through to the next rule
 * - a throwing guard or action counts as failed and is logged, unless
 *   the action dispatched before throwing
 */
export class CoreAI_PriorityEngine {
    private log = CoreAI_componentLogger('engine')
    private fired: CoreAI_FiredRule | null = null

    get lastFired(): CoreAI_FiredRule | null {
        return this.fired
    }

    evaluate(ruleSet: CoreAI_RuleSet, ctx: CoreAI_TickContext): boolean {
        for (const rule of ruleSet.rules) {
            if (ctx.dispatcher.hasDispatched) return true

            try {
                if (!rule.guard(ctx)) continue
                if (!rule.action(ctx)) continue
            } catch (err) {
                this.log.warn('rule threw, treated as failed', {
                    ruleSet: ruleSet.name,
                    rule: rule.name,
                    error: err instanceof Error ? err.message : String(err),
                })
                // a dispatched cast still consumes the tick
                if (!ctx.dispatcher.hasDispatched) continue
            }

            this.record(ruleSet, rule.name, ctx)
            return true
        }

        return false
    }

    private record(ruleSet: CoreAI_RuleSet, rule: string, ctx: CoreAI_TickContext): void {
        this.fired = {
            ruleSet: ruleSet.name,
            rule,
            time: ctx.snapshot.time,
        }
    }

    reset(): void {
        this.fired = null
    }
}
