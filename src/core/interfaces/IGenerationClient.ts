import type { ContextEntry } from '../entities/Context.js';

/**
 * Interface for the reply-generation collaborator
 */
export interface IGenerationClient {
  generate(context: ContextEntry[], model: string): Promise<string>;
}
