/**
 * Centralized Inversify tokens (string identifiers).
 *
 * Keeping them in one place reduces drift and typos across container configs
 * and @inject decorators.
 */
export const TOKENS = {
    // Core
    PersistenceConfig: 'PersistenceConfig',
    ServicesConfig: 'ServicesConfig',
    TelemetryClient: 'ITelemetryClient',

    // Cosmos SQL
    CosmosDbSqlConfig: 'CosmosDbSqlConfig',
    CosmosDbSqlClient: 'CosmosDbSqlClient',
    CosmosContainerPlayers: 'CosmosContainer:Players',
    CosmosContainerPrompts: 'CosmosContainer:Prompts',

    // Repositories
    PlayerRepository: 'IPlayerRepository',
    PromptRepository: 'IPromptRepository',

    // External services
    TranslatorClient: 'ITranslatorClient',
    ContentSafetyClient: 'IContentSafetyClient',
    PasswordHasher: 'IPasswordHasher'
} as const
