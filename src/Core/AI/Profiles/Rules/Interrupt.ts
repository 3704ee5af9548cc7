import type { CoreAI_TickContext } from '../../TickContext'
import { type CoreAI_IRule, CoreAI_rule } from '../../Modules/Rule/Rule'
import { CoreAI_tryCast } from '../../Modules/Rule/CastRule'
import { CoreAI_InterruptTriage } from '../../Modules/Triage/InterruptTriage'

function attemptsFor(ctx: CoreAI_TickContext) {
    const { snapshot, abilities } = ctx
    const s = snapshot.settings

    return CoreAI_InterruptTriage.attempts(snapshot.targets.hostiles, {
        minRemaining: s.interruptMinRemaining,
        maxRemaining: s.interruptMaxRemaining,
        meleeRange: s.meleeRange,
        rangedRange: s.rangedRange,
        stunEnabled: s.stunInterrupt,
        displaceEnabled: s.displaceInterrupt,
        displacementCharges: abilities.get('displacement')?.charges() ?? 0,
    })
}

export function CoreAI_interruptRules(): CoreAI_IRule[] {
    return [
        CoreAI_rule(
            'interrupt.triage',
            (ctx) => ctx.snapshot.settings.autoInterrupt && attemptsFor(ctx).length > 0,
            (ctx) => {
                for (const attempt of attemptsFor(ctx)) {
                    const label = `interrupt.${attempt.kind}`
                    const target = attempt.target ?? undefined

                    if (CoreAI_tryCast(ctx, attempt.role, label, target)) return true
                }
                return false
            }
        ),
    ]
}
