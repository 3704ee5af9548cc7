export * from './Brain'
export * from './TickContext'

export * from './Modules/World/IWorld'
export * from './Modules/Debug/Logger'

export * from './Modules/Resource/ResourceForecaster'
export * from './Modules/Resource/CriticalBufferGuard'
export * from './Modules/Resource/SpendPolicy'
export * from './Modules/Resource/SlotPool'
export * from './Modules/Resource/CappedPool'

export * from './Modules/Rule/Rule'
export * from './Modules/Rule/CastRule'
export * from './Modules/Rule/PriorityEngine'

export * from './Modules/Action/Ability'
export * from './Modules/Action/UseGate'
export * from './Modules/Action/ActionDispatcher'

export * from './Modules/Mode/ModeRouter'

export * from './Modules/Triage/InterruptTriage'
export * from './Modules/Triage/DefensiveEscalation'

export * from './Modules/Perception/Perception'
export * from './Modules/Perception/Targeting'
export * from './Modules/Perception/StatusTracker'
export * from './Modules/Perception/StatusEvents'
export * from './Modules/Perception/WindowTracker'

export * from './Profiles/Settings'
export * from './Profiles/Catalogue'
export * from './Profiles/AProfile'
export * from './Profiles/GuardianProfile'
