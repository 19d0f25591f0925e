// Canonical game telemetry event names (Domain.[Subject].Action) with 2-3 PascalCase segments.
//
// NO INLINE LITERALS: All event names must be referenced from this registry.
// To verify no inline usage outside registry:
// grep -r "Prompt\." --include="*.ts" --exclude-dir=node_modules --exclude-dir=dist | \
//   grep -v "shared/src/telemetryEvents.ts" | grep -v "\.test\.ts"

export const GAME_EVENT_NAMES = [
    // Core service / utility
    'Utils.Welcome.Invoked',
    'Utils.Get.Invoked',
    'Utils.Get.Rejected',
    // Player lifecycle
    'Player.Registered',
    'Player.Register.Rejected',
    'Player.Login.Succeeded',
    'Player.Login.Failed',
    'Player.Updated',
    'Player.Update.Rejected',
    // Prompt lifecycle
    'Prompt.Created',
    'Prompt.Create.Rejected',
    'Prompt.Moderated',
    'Prompt.Moderate.Rejected',
    'Prompt.Deleted',
    'Prompt.Delete.Rejected',
    // External cognitive services (pass-through calls)
    'Translation.Request.Failed',
    'Translation.Language.Missing',
    'ContentSafety.Request.Failed',
    'ContentSafety.Analysis.Completed',
    // Secrets / infrastructure
    'Secret.Fetch.Retry',
    'Secret.Cache.Hit',
    'Secret.Cache.Miss',
    'Secret.Fetch.Success',
    'Secret.Fetch.Failure',
    'Secret.Fetch.Fallback',
    'Secret.Cache.Clear',
    // Persistence / configuration
    'Persistence.Mode.Fallback',
    'Config.Value.Ignored',
    // SQL API operations (Cosmos SQL API RU & latency tracking)
    'SQL.Query.Executed',
    'SQL.Query.Failed',
    // Handler failures not attributable to client input
    'Http.Handler.Failed',
    // Internal / fallback diagnostics
    'Telemetry.EventName.Invalid',
    'Telemetry.Sampling.ConfigAdjusted'
] as const

export type GameEventName = (typeof GAME_EVENT_NAMES)[number]

export function isGameEventName(name: string): name is GameEventName {
    return (GAME_EVENT_NAMES as readonly string[]).includes(name)
}

// Regex shared with tests
export const TELEMETRY_NAME_REGEX = /^[A-Z][A-Za-z]+(\.[A-Z][A-Za-z]+){1,2}$/
