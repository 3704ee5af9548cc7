import { CoreAI_componentLogger } from '../Debug/Logger'

export type CoreAI_ModeKind = 'reaper' | 'vampiric'

/**
 * Mode governing the Combat category for a tick.
 * 'default' means no capability was detected: Combat is skipped.
 */
export type CoreAI_ModeProfile =
    | { kind: 'reaper'; source: 'override' | 'probe' }
    | { kind: 'vampiric'; source: 'override' | 'probe' }
    | { kind: 'default'; source: 'none' }

export interface CoreAI_ModeProbe {
    mode: CoreAI_ModeKind
    detect: () => boolean
}

/** Configuration value → forced mode. 0 means auto-detect. */
const OVERRIDES: Record<number, CoreAI_ModeKind> = {
    1: 'reaper',
    2: 'vampiric',
}

export const CoreAI_DEFAULT_MODE: CoreAI_ModeProfile = Object.freeze({
    kind: 'default',
    source: 'none',
})

/**
 * CoreAI_ModeRouter
 *
 * - a concrete override always wins and is never cached
 * - otherwise the first matching probe picks the mode
 * - a detected mode is cached until invalidate(); an undetermined
 *   result is re-probed every call
 */
export class CoreAI_ModeRouter {
    private log = CoreAI_componentLogger('mode')
    private cached: CoreAI_ModeProfile | null = null
    private lastKind: CoreAI_ModeProfile['kind'] | null = null

    constructor(private readonly probes: readonly CoreAI_ModeProbe[]) {}

    select(override: number): CoreAI_ModeProfile {
        const profile = this.resolve(override)

        if (profile.kind !== this.lastKind) {
            this.log.info('mode selected', { mode: profile.kind, source: profile.source })
            this.lastKind = profile.kind
        }

        return profile
    }

    invalidate(): void {
        this.cached = null
        this.lastKind = null
    }

    private resolve(override: number): CoreAI_ModeProfile {
        const forced = OVERRIDES[override]
        if (forced) {
            return { kind: forced, source: 'override' }
        }

        if (this.cached) return this.cached

        for (const probe of this.probes) {
            if (probe.detect()) {
                const detected: CoreAI_ModeProfile = { kind: probe.mode, source: 'probe' }
                this.cached = detected
                return detected
            }
        }

        return CoreAI_DEFAULT_MODE
    }
}
