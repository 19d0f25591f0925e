/**
 * Inversify container configuration (runtime selector).
 *
 * PERSISTENCE_MODE picks the repository bindings (memory | cosmos); everything else
 * (telemetry, external clients, services, handlers) is shared by both modes.
 *
 * Tests build their own container in test/helpers/testContainer.ts from the exported binders.
 */
import { Container } from 'inversify'
import 'reflect-metadata'
import { loadServicesConfigAsync, type ServicesConfig } from './config/servicesConfig.js'
import { TOKENS } from './di/tokens.js'
import { PlayerLoginHandler } from './handlers/playerLogin.js'
import { PlayerRegisterHandler } from './handlers/playerRegister.js'
import { PlayerUpdateHandler } from './handlers/playerUpdate.js'
import { PromptCreateHandler } from './handlers/promptCreate.js'
import { PromptDeleteHandler } from './handlers/promptDelete.js'
import { PromptModerateHandler } from './handlers/promptModerate.js'
import { UtilsGetHandler } from './handlers/utilsGet.js'
import { UtilsWelcomeHandler } from './handlers/utilsWelcome.js'
import { bindCosmosPersistence } from './inversify.cosmos.config.js'
import { bindMemoryPersistence } from './inversify.memory.config.js'
import { loadPersistenceConfigAsync, resolvePersistenceMode, type IPersistenceConfig } from './persistenceConfig.js'
import { AzureContentSafetyClient, NullContentSafetyClient, type IContentSafetyClient } from './services/contentSafetyClient.js'
import { ScryptPasswordHasher, type IPasswordHasher } from './services/passwordHasher.js'
import { PromptModerationService } from './services/PromptModerationService.js'
import { PromptTranslationService } from './services/PromptTranslationService.js'
import { AzureTranslatorClient, NullTranslatorClient, type ITranslatorClient } from './services/translatorClient.js'
import type { ITelemetryClient } from './telemetry/ITelemetryClient.js'
import { NullTelemetryClient } from './telemetry/NullTelemetryClient.js'
import { TelemetryService } from './telemetry/TelemetryService.js'

/** Register handlers as transient (no shared mutable state across requests) */
export function bindHandlers(container: Container): void {
    container.bind(UtilsWelcomeHandler).toSelf()
    container.bind(UtilsGetHandler).toSelf()
    container.bind(PlayerRegisterHandler).toSelf()
    container.bind(PlayerLoginHandler).toSelf()
    container.bind(PlayerUpdateHandler).toSelf()
    container.bind(PromptCreateHandler).toSelf()
    container.bind(PromptModerateHandler).toSelf()
    container.bind(PromptDeleteHandler).toSelf()
}

/** Password hashing and the prompt translation / moderation services */
export function bindDomainServices(container: Container): void {
    container.bind<IPasswordHasher>(TOKENS.PasswordHasher).to(ScryptPasswordHasher).inSingletonScope()
    container.bind(PromptTranslationService).toSelf().inSingletonScope()
    container.bind(PromptModerationService).toSelf().inSingletonScope()
}

/** Bind real cognitive-service clients where configured, null clients otherwise */
export function bindExternalClients(container: Container, config: ServicesConfig, telemetryService: TelemetryService): void {
    const translator = config.translator
    if (translator) {
        container
            .bind<ITranslatorClient>(TOKENS.TranslatorClient)
            .toDynamicValue(() => new AzureTranslatorClient(translator, telemetryService))
            .inSingletonScope()
    } else {
        container.bind<ITranslatorClient>(TOKENS.TranslatorClient).to(NullTranslatorClient).inSingletonScope()
    }

    const contentSafety = config.contentSafety
    if (contentSafety) {
        container
            .bind<IContentSafetyClient>(TOKENS.ContentSafetyClient)
            .toDynamicValue(() => new AzureContentSafetyClient(contentSafety, telemetryService))
            .inSingletonScope()
    } else {
        container.bind<IContentSafetyClient>(TOKENS.ContentSafetyClient).to(NullContentSafetyClient).inSingletonScope()
    }
}

async function resolveTelemetryClient(config: IPersistenceConfig, env: NodeJS.ProcessEnv): Promise<ITelemetryClient> {
    // Never load real Application Insights in test or memory mode
    if (env.NODE_ENV === 'test' || config.mode !== 'cosmos') {
        return new NullTelemetryClient()
    }
    // index.ts has already called setup() in cosmos mode
    const appInsightsModule = await import('applicationinsights')
    const client = appInsightsModule.default.defaultClient
    return client ?? new NullTelemetryClient()
}

/**
 * Setup the runtime container.
 * An incomplete cosmos configuration falls back to memory (unless PERSISTENCE_STRICT) and emits Persistence.Mode.Fallback.
 */
export const setupContainer = async (container: Container, env: NodeJS.ProcessEnv = process.env): Promise<Container> => {
    const requestedMode = resolvePersistenceMode(env)
    const config = await loadPersistenceConfigAsync(env)
    container.bind<IPersistenceConfig>(TOKENS.PersistenceConfig).toConstantValue(config)

    container.bind<ITelemetryClient>(TOKENS.TelemetryClient).toConstantValue(await resolveTelemetryClient(config, env))
    // Consistency policy: concrete services use class-based injection only (no string token).
    container.bind<TelemetryService>(TelemetryService).toSelf().inSingletonScope()
    const telemetryService = container.get(TelemetryService)

    if (requestedMode !== config.mode) {
        telemetryService.trackGameEventStrict('Persistence.Mode.Fallback', { requested: requestedMode, applied: config.mode })
    }

    const servicesConfig = await loadServicesConfigAsync(env, telemetryService)
    container.bind<ServicesConfig>(TOKENS.ServicesConfig).toConstantValue(servicesConfig)

    bindExternalClients(container, servicesConfig, telemetryService)
    bindDomainServices(container)
    bindHandlers(container)

    if (config.mode === 'cosmos') {
        bindCosmosPersistence(container, config)
    } else {
        bindMemoryPersistence(container)
    }

    return container
}
