import { ConcurrencyException, NotFoundException, type PromptDoc } from '@quiplash/shared'
import { injectable } from 'inversify'
import type { IPromptRepository } from './promptRepository.js'

/**
 * In-memory implementation of IPromptRepository.
 * Used for memory mode and integration tests.
 */
@injectable()
export class InMemoryPromptRepository implements IPromptRepository {
    /** username (partition) → id → prompt, mirroring the Cosmos (id, partition key) pair */
    private partitions = new Map<string, Map<string, PromptDoc>>()

    private partition(username: string): Map<string, PromptDoc> {
        let prompts = this.partitions.get(username)
        if (!prompts) {
            prompts = new Map()
            this.partitions.set(username, prompts)
        }
        return prompts
    }

    async get(id: string, username: string): Promise<PromptDoc | null> {
        const doc = this.partitions.get(username)?.get(id)
        return doc ? structuredClone(doc) : null
    }

    async create(prompt: PromptDoc): Promise<PromptDoc> {
        const prompts = this.partition(prompt.username)
        if (prompts.has(prompt.id)) {
            throw new ConcurrencyException(`prompt.Create: id ${prompt.id} already exists`, prompt.id)
        }
        prompts.set(prompt.id, structuredClone(prompt))
        return structuredClone(prompt)
    }

    async update(prompt: PromptDoc): Promise<PromptDoc> {
        const prompts = this.partitions.get(prompt.username)
        if (!prompts?.has(prompt.id)) {
            throw new NotFoundException(`prompt.Replace: id ${prompt.id} not found`, prompt.id)
        }
        prompts.set(prompt.id, structuredClone(prompt))
        return structuredClone(prompt)
    }

    async delete(id: string, username: string): Promise<boolean> {
        return this.partitions.get(username)?.delete(id) ?? false
    }

    async listAll(): Promise<PromptDoc[]> {
        return [...this.partitions.values()].flatMap((prompts) => [...prompts.values()].map((p) => structuredClone(p)))
    }

    /** Test helper */
    clear(): void {
        this.partitions.clear()
    }
}
