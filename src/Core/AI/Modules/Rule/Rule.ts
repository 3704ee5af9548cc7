import type { CoreAI_TickContext } from '../../TickContext'

export type CoreAI_RuleCategory = 'utility' | 'defensive' | 'interrupt' | 'combat'

/** Fixed evaluation order of the categories within a tick. */
export const CoreAI_RULE_CATEGORIES: readonly CoreAI_RuleCategory[] = [
    'utility',
    'defensive',
    'interrupt',
    'combat',
]

/**
 * CoreAI_IRule:
 * Guarded action. guard() reads the snapshot only; action() may dispatch
 * once and reports whether the host accepted it.
 */
export interface CoreAI_IRule {
    readonly name: string
    guard(ctx: CoreAI_TickContext): boolean
    action(ctx: CoreAI_TickContext): boolean
}

export function CoreAI_rule(
    name: string,
    guard: (ctx: CoreAI_TickContext) => boolean,
    action: (ctx: CoreAI_TickContext) => boolean
): CoreAI_IRule {
    return Object.freeze({ name, guard, action })
}

/** Ordered, immutable collection of rules for one category. */
export class CoreAI_RuleSet {
    public readonly rules: readonly CoreAI_IRule[]

    constructor(
        public readonly name: string,
        public readonly category: CoreAI_RuleCategory,
        rules: readonly CoreAI_IRule[]
    ) {
        this.rules = Object.freeze([...rules])
    }

    /** New set with `fragments` concatenated in order. */
    static compose(
        name: string,
        category: CoreAI_RuleCategory,
        ...fragments: readonly (readonly CoreAI_IRule[])[]
    ): CoreAI_RuleSet {
        return new CoreAI_RuleSet(name, category, fragments.flat())
    }

    get size(): number {
        return this.rules.length
    }

    names(): string[] {
        return this.rules.map((r) => r.name)
    }
}
