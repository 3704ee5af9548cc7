import { z } from 'zod'

import type { CoreAI_IConfigSource } from '../Modules/World/IWorld'
import { CoreAI_componentLogger } from '../Modules/Debug/Logger'

/* ------------------------------------------------------------
 * Schema
 * ------------------------------------------------------------ */

const pct = (fallback: number) => z.number().min(0).max(100).default(fallback)
const seconds = (fallback: number) => z.number().min(0).max(600).default(fallback)

export const CoreAI_SettingsSchema = z
    .object({
        // critical buffer
        bufferMinStacks: z.number().int().min(0).max(10).default(5),
        bufferRefreshThreshold: seconds(5),
        bufferOptimalStacks: z.number().int().min(0).max(10).default(7),
        forecastWindow: z.number().min(0).max(10).default(3),

        // interrupts
        autoInterrupt: z.boolean().default(true),
        stunInterrupt: z.boolean().default(true),
        displaceInterrupt: z.boolean().default(true),
        interruptMinRemaining: seconds(0.5),
        interruptMaxRemaining: seconds(3),

        // ranges
        meleeRange: z.number().min(0).max(100).default(5),
        rangedRange: z.number().min(0).max(100).default(30),
        areaRange: z.number().min(0).max(100).default(10),
        scanRadius: z.number().min(0).max(100).default(40),

        // healing
        healThreshold: pct(70),
        healIntervalSec: seconds(1),
        survivalMinAmount: z.number().min(0).max(1000).default(45),

        // continuous pool
        capDumpAmount: z.number().min(0).max(1000).default(105),
        capDumpAmountBurst: z.number().min(0).max(1000).default(99),
        cappingThreshold: z.number().min(0).max(1000).default(30),
        poolingThreshold: z.number().min(0).max(1000).default(20),
        aggressiveSpending: z.boolean().default(false),

        // per-ability toggles
        useShield: z.boolean().default(true),
        useMajorMitigation: z.boolean().default(true),
        useStrongMitigation: z.boolean().default(true),
        useWeakMitigation: z.boolean().default(true),
        useEmergencyHeal: z.boolean().default(true),
        useBurst: z.boolean().default(true),
        useStorm: z.boolean().default(true),
        useBufferConsumer: z.boolean().default(true),
        useDrain: z.boolean().default(true),
        useExecute: z.boolean().default(true),
        useMark: z.boolean().default(true),
        useSummon: z.boolean().default(true),
        useRevive: z.boolean().default(true),
        useTaunt: z.boolean().default(true),
        useTauntDisplace: z.boolean().default(true),
        groundZoneMinHits: z.number().int().min(1).max(5).default(1),

        // defensives
        majorMitigationHealth: pct(65),
        majorMitigationPredicted: pct(55),
        strongMitigationHealth: pct(45),
        strongMitigationPredicted: pct(35),
        shieldHealth: pct(75),
        shieldMagicPct: pct(3.5),
        shieldLastResortHealth: pct(80),
        weakMitigationHealth: pct(70),
        emergencyHealHealth: pct(50),
        defensiveBurstHealth: pct(50),
        defensiveBurstMaxAmount: z.number().min(0).max(1000).default(40),
        predictionHorizon: seconds(2),

        // target lifetimes
        burstMinTargetLife: seconds(20),
        shieldMinTargetLife: seconds(10),
        executeHealth: pct(35),
        executeDelaySec: seconds(5),

        // storm / consumer
        stormMinStacks: z.number().int().min(0).max(10).default(7),
        stormBurstCooldown: seconds(25),

        // consumable
        useConsumable: z.boolean().default(false),
        consumableHealth: pct(40),
        consumableIntervalSec: seconds(60),

        // 0 = auto, 1 = reaper, 2 = vampiric
        modeOverride: z.number().int().min(0).max(2).default(0),
    })
    .strict()

export type CoreAI_Settings = z.infer<typeof CoreAI_SettingsSchema>
export type CoreAI_SettingKey = keyof CoreAI_Settings
export type CoreAI_SettingKind = 'bool' | 'int' | 'float'

/** How each key is read from a configuration source. */
export const CoreAI_SETTING_KINDS = {
    bufferMinStacks: 'int',
    bufferRefreshThreshold: 'float',
    bufferOptimalStacks: 'int',
    forecastWindow: 'float',
    autoInterrupt: 'bool',
    stunInterrupt: 'bool',
    displaceInterrupt: 'bool',
    interruptMinRemaining: 'float',
    interruptMaxRemaining: 'float',
    meleeRange: 'float',
    rangedRange: 'float',
    areaRange: 'float',
    scanRadius: 'float',
    healThreshold: 'float',
    healIntervalSec: 'float',
    survivalMinAmount: 'float',
    capDumpAmount: 'float',
    capDumpAmountBurst: 'float',
    cappingThreshold: 'float',
    poolingThreshold: 'float',
    aggressiveSpending: 'bool',
    useShield: 'bool',
    useMajorMitigation: 'bool',
    useStrongMitigation: 'bool',
    useWeakMitigation: 'bool',
    useEmergencyHeal: 'bool',
    useBurst: 'bool',
    useStorm: 'bool',
    useBufferConsumer: 'bool',
    useDrain: 'bool',
    useExecute: 'bool',
    useMark: 'bool',
    useSummon: 'bool',
    useRevive: 'bool',
    useTaunt: 'bool',
    useTauntDisplace: 'bool',
    groundZoneMinHits: 'int',
    majorMitigationHealth: 'float',
    majorMitigationPredicted: 'float',
    strongMitigationHealth: 'float',
    strongMitigationPredicted: 'float',
    shieldHealth: 'float',
    shieldMagicPct: 'float',
    shieldLastResortHealth: 'float',
    weakMitigationHealth: 'float',
    emergencyHealHealth: 'float',
    defensiveBurstHealth: 'float',
    defensiveBurstMaxAmount: 'float',
    predictionHorizon: 'float',
    burstMinTargetLife: 'float',
    shieldMinTargetLife: 'float',
    executeHealth: 'float',
    executeDelaySec: 'float',
    stormMinStacks: 'int',
    stormBurstCooldown: 'float',
    useConsumable: 'bool',
    consumableHealth: 'float',
    consumableIntervalSec: 'float',
    modeOverride: 'int',
} as const satisfies Record<CoreAI_SettingKey, CoreAI_SettingKind>

export const CoreAI_DEFAULT_SETTINGS: Readonly<CoreAI_Settings> = Object.freeze(
    CoreAI_SettingsSchema.parse({})
)

/* ------------------------------------------------------------
 * Errors
 * ------------------------------------------------------------ */

export class CoreAI_ConfigError extends Error {
    constructor(
        message: string,
        public readonly issues: z.ZodIssue[]
    ) {
        super(message)
        this.name = 'CoreAI_ConfigError'
    }
}

export function CoreAI_formatIssues(issues: z.ZodIssue[]): string {
    return issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')
}

/** Validates a complete settings object, filling defaults. Throws CoreAI_ConfigError. */
export function CoreAI_parseSettings(input: unknown): CoreAI_Settings {
    const result = CoreAI_SettingsSchema.safeParse(input)
    if (!result.success) {
        throw new CoreAI_ConfigError(
            `Invalid settings: ${CoreAI_formatIssues(result.error.issues)}`,
            result.error.issues
        )
    }
    return result.data
}

/* ------------------------------------------------------------
 * Per-tick reader
 * ------------------------------------------------------------ */

/**
 * CoreAI_SettingsReader:
 * Reads every key from the host's configuration once per tick.
 *
 * - missing keys take their default
 * - values outside their range are logged once and take their default
 * - never throws
 */
export class CoreAI_SettingsReader {
    private log = CoreAI_componentLogger('settings')
    private rejected: Set<string> = new Set()

    read(source: CoreAI_IConfigSource): Readonly<CoreAI_Settings> {
        const raw: Record<string, unknown> = {}

        for (const [key, kind] of Object.entries(CoreAI_SETTING_KINDS)) {
            const value = this.readKey(source, key, kind)
            if (value !== undefined) raw[key] = value
        }

        let result = CoreAI_SettingsSchema.safeParse(raw)
        if (!result.success) {
            for (const issue of result.error.issues) {
                const key = String(issue.path[0] ?? '')
                this.reject(key, raw[key], issue.message)
                delete raw[key]
            }
            result = CoreAI_SettingsSchema.safeParse(raw)
        }

        if (!result.success) {
            return CoreAI_DEFAULT_SETTINGS
        }

        this.forgetAccepted(raw)
        return Object.freeze(result.data)
    }

    reset(): void {
        this.rejected.clear()
    }

    private readKey(
        source: CoreAI_IConfigSource,
        key: string,
        kind: CoreAI_SettingKind
    ): boolean | number | undefined {
        try {
            switch (kind) {
                case 'bool':
                    return source.getBool(key)
                case 'int':
                    return source.getInt(key)
                case 'float':
                    return source.getFloat(key)
            }
        } catch (err) {
            this.reject(key, undefined, err instanceof Error ? err.message : String(err))
            return undefined
        }
    }

    private reject(key: string, value: unknown, reason: string): void {
        if (this.rejected.has(key)) return

        this.rejected.add(key)
        this.log.warn('rejected configuration value, using default', {
            key,
            value,
            reason,
        })
    }

    private forgetAccepted(raw: Record<string, unknown>): void {
        for (const key of [...this.rejected]) {
            if (key in raw) this.rejected.delete(key)
        }
    }
}

/* ------------------------------------------------------------
 * Static source
 * ------------------------------------------------------------ */

/**
 * Configuration source backed by a plain object.
 * For hosts without a settings UI, and for tests.
 */
export class CoreAI_StaticConfigSource implements CoreAI_IConfigSource {
    private values: Map<string, boolean | number> = new Map()

    constructor(values: Partial<CoreAI_Settings> = {}) {
        const settings = CoreAI_parseSettings(values)

        for (const [key, value] of Object.entries(settings)) {
            this.values.set(key, value)
        }
    }

    /** Unchecked write; the per-tick reader validates. */
    set(key: CoreAI_SettingKey, value: boolean | number): void {
        this.values.set(key, value)
    }

    getBool(key: string): boolean | undefined {
        const value = this.values.get(key)
        return typeof value === 'boolean' ? value : undefined
    }

    getInt(key: string): number | undefined {
        const value = this.values.get(key)
        return typeof value === 'number' && Number.isInteger(value) ? value : undefined
    }

    getFloat(key: string): number | undefined {
        const value = this.values.get(key)
        return typeof value === 'number' ? value : undefined
    }
}
