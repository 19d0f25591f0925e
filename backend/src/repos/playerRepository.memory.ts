import { ConcurrencyException, NotFoundException, type PlayerDoc } from '@quiplash/shared'
import { injectable } from 'inversify'
import type { IPlayerRepository } from './playerRepository.js'

/**
 * In-memory implementation of IPlayerRepository.
 * Used for memory mode and integration tests. Documents are copied in and out
 * so callers never hold a reference into the store.
 */
@injectable()
export class InMemoryPlayerRepository implements IPlayerRepository {
    private players = new Map<string, PlayerDoc>()

    async findByUsername(username: string): Promise<PlayerDoc | null> {
        for (const p of this.players.values()) {
            if (p.username === username) return { ...p }
        }
        return null
    }

    async create(player: PlayerDoc): Promise<PlayerDoc> {
        if (this.players.has(player.id)) {
            throw new ConcurrencyException(`player.Create: id ${player.id} already exists`, player.id)
        }
        this.players.set(player.id, { ...player })
        return { ...player }
    }

    async update(player: PlayerDoc): Promise<PlayerDoc> {
        if (!this.players.has(player.id)) {
            throw new NotFoundException(`player.Replace: id ${player.id} not found`, player.id)
        }
        this.players.set(player.id, { ...player })
        return { ...player }
    }

    async listAll(): Promise<PlayerDoc[]> {
        return [...this.players.values()].map((p) => ({ ...p }))
    }

    /** Test helper */
    clear(): void {
        this.players.clear()
    }
}
