import type { PromptDoc } from '@quiplash/shared'

/**
 * Prompt persistence contract. Container `prompt`, partition key `/username`,
 * so every point operation takes the author's username.
 */
export interface IPromptRepository {
    get(id: string, username: string): Promise<PromptDoc | null>
    create(prompt: PromptDoc): Promise<PromptDoc>
    update(prompt: PromptDoc): Promise<PromptDoc>
    /** @returns false when no such prompt exists */
    delete(id: string, username: string): Promise<boolean>
    listAll(): Promise<PromptDoc[]>
}
