import type { PlayerDoc } from '@quiplash/shared'

/**
 * Player persistence contract. Container `player`, partition key `/id`.
 * Username lookups are cross-partition.
 */
export interface IPlayerRepository {
    findByUsername(username: string): Promise<PlayerDoc | null>
    /** Insert a new player; throws ConcurrencyException when the id already exists */
    create(player: PlayerDoc): Promise<PlayerDoc>
    /** Replace an existing player document */
    update(player: PlayerDoc): Promise<PlayerDoc>
    listAll(): Promise<PlayerDoc[]>
}
