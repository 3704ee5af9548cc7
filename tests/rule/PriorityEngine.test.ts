import { beforeEach, describe, expect, it } from 'vitest'

import { CoreAI_PriorityEngine } from '../../src/Core/AI/Modules/Rule/PriorityEngine'
import { CoreAI_RuleSet, CoreAI_rule, type CoreAI_IRule } from '../../src/Core/AI/Modules/Rule/Rule'
import { CoreAI_castRule } from '../../src/Core/AI/Modules/Rule/CastRule'
import type { CoreAI_TickContext } from '../../src/Core/AI/TickContext'
import { ID, makeHarness, makeRig, type FakeRig, type RuleHarness } from '../fixtures/FakeWorld'

describe('PriorityEngine', () => {
    let rig: FakeRig
    let harness: RuleHarness
    let ctx: CoreAI_TickContext
    let calls: string[]

    const traced = (name: string, guard: boolean, success: boolean): CoreAI_IRule =>
        CoreAI_rule(
            name,
            () => {
                calls.push(`${name}.guard`)
                return guard
            },
            () => {
                calls.push(`${name}.action`)
                return success
            }
        )

    beforeEach(() => {
        rig = makeRig()
        harness = makeHarness(rig)
        ctx = harness.tick()
        calls = []
    })

    it('stops at the first successful action', () => {
        const engine = new CoreAI_PriorityEngine()
        const set = new CoreAI_RuleSet('test', 'combat', [
            traced('a', false, true),
            traced('b', true, false),
            traced('c', true, true),
            traced('d', true, true),
        ])

        expect(engine.evaluate(set, ctx)).toBe(true)
        expect(calls).toEqual(['a.guard', 'b.guard', 'b.action', 'c.guard', 'c.action'])
        expect(engine.lastFired).toEqual({ ruleSet: 'test', rule: 'c', time: 0 })
    })

    it('reports false when every rule fails', () => {
        const engine = new CoreAI_PriorityEngine()
        const set = new CoreAI_RuleSet('test', 'utility', [traced('a', false, true), traced('b', true, false)])

        expect(engine.evaluate(set, ctx)).toBe(false)
        expect(engine.lastFired).toBeNull()
    })

    it('treats a throwing rule as failed and moves on', () => {
        const engine = new CoreAI_PriorityEngine()
        const set = new CoreAI_RuleSet('test', 'defensive', [
            CoreAI_rule(
                'broken',
                () => {
                    throw new Error('query failed')
                },
                () => true
            ),
            traced('next', true, true),
        ])

        expect(engine.evaluate(set, ctx)).toBe(true)
        expect(engine.lastFired?.rule).toBe('next')
    })

    it('credits a rule whose action throws after dispatching', () => {
        rig.world.learn(ID.summon)
        const summon = CoreAI_castRule('summon', { role: 'summon' })
        const engine = new CoreAI_PriorityEngine()
        const set = new CoreAI_RuleSet('test', 'utility', [
            CoreAI_rule('flaky', summon.guard, (c) => {
                summon.action(c)
                throw new Error('bookkeeping failed')
            }),
            traced('next', true, true),
        ])

        expect(engine.evaluate(set, ctx)).toBe(true)
        expect(engine.lastFired).toEqual({ ruleSet: 'test', rule: 'flaky', time: 0 })
        expect(calls).toEqual([])
        expect(rig.world.castIds()).toEqual([ID.summon])
    })

    it('dispatches at most one action per tick', () => {
        rig.world.learn(ID.summon, ID.revive, ID.consumable)
        const engine = new CoreAI_PriorityEngine()
        const set = new CoreAI_RuleSet('test', 'utility', [
            CoreAI_castRule('first', { role: 'summon' }),
            CoreAI_castRule('second', { role: 'consumable' }),
        ])

        expect(engine.evaluate(set, ctx)).toBe(true)
        expect(engine.evaluate(set, ctx)).toBe(true)
        expect(rig.world.castIds()).toEqual([ID.summon])
    })

    it('falls through when the host rejects a cast', () => {
        rig.world.learn(ID.summon, ID.consumable)
        rig.world.rejected.add(ID.summon)
        const engine = new CoreAI_PriorityEngine()
        const set = new CoreAI_RuleSet('test', 'utility', [
            CoreAI_castRule('first', { role: 'summon' }),
            CoreAI_castRule('second', { role: 'consumable' }),
        ])

        expect(engine.evaluate(set, ctx)).toBe(true)
        expect(engine.lastFired?.rule).toBe('second')
        expect(rig.world.castIds()).toEqual([ID.consumable])
    })

    it('composes fragments in order', () => {
        const set = CoreAI_RuleSet.compose(
            'combined',
            'combat',
            [traced('a', true, true)],
            [traced('b', true, true), traced('c', true, true)]
        )

        expect(set.names()).toEqual(['a', 'b', 'c'])
        expect(set.size).toBe(3)
    })
})
