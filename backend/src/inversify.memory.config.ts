import { Container } from 'inversify'
import { TOKENS } from './di/tokens.js'
import type { IPlayerRepository } from './repos/playerRepository.js'
import { InMemoryPlayerRepository } from './repos/playerRepository.memory.js'
import type { IPromptRepository } from './repos/promptRepository.js'
import { InMemoryPromptRepository } from './repos/promptRepository.memory.js'

/**
 * In-memory persistence bindings for local dev and tests.
 *
 * Note: common bindings (telemetry, handlers, services) are registered by the runtime selector.
 */
export function bindMemoryPersistence(container: Container): void {
    container.bind<IPlayerRepository>(TOKENS.PlayerRepository).to(InMemoryPlayerRepository).inSingletonScope()
    container.bind<IPromptRepository>(TOKENS.PromptRepository).to(InMemoryPromptRepository).inSingletonScope()
}
