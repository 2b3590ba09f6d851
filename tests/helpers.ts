import { DatabaseConnection, IN_MEMORY } from '../src/infrastructure/database/DatabaseConnection.js';
import { MessageRepository } from '../src/infrastructure/database/repositories/MessageRepository.js';
import type { IGenerationClient } from '../src/core/interfaces/IGenerationClient.js';
import type { IClassifierClient } from '../src/core/interfaces/IClassifierClient.js';
import type { ContextEntry } from '../src/core/entities/Context.js';

export const DIALOG_1 = '0b8f7c1e-2d3a-4b5c-8d6e-7f8091a2b3c4';
export const DIALOG_2 = '1c9a8d2f-3e4b-4c6d-9e7f-8091a2b3c4d5';
export const MESSAGE_1 = '2dab9e30-4f5c-4d7e-8f80-91a2b3c4d5e6';
export const MESSAGE_2 = '3ebcaf41-5a6d-4e8f-9a91-a2b3c4d5e6f7';

export function createTestStore() {
  const connection = new DatabaseConnection(IN_MEMORY);
  const messageRepo = new MessageRepository(connection.getDatabase());
  return { connection, messageRepo };
}

/**
 * Generation stand-in that records every context it receives
 */
export class FakeGenerationClient implements IGenerationClient {
  readonly calls: Array<{ context: ContextEntry[]; model: string }> = [];

  constructor(private reply: string = 'Generated reply') {}

  async generate(context: ContextEntry[], model: string): Promise<string> {
    this.calls.push({ context, model });
    return this.reply;
  }
}

export class FakeClassifierClient implements IClassifierClient {
  readonly inputs: string[] = [];

  constructor(private probability: number = 0.25) {}

  async classify(text: string): Promise<number> {
    this.inputs.push(text);
    return this.probability;
  }
}
