import { randomUUID } from 'crypto';
import type { IMessageRepository } from '../../core/interfaces/IMessageRepository.js';
import type { IGenerationClient } from '../../core/interfaces/IGenerationClient.js';
import type { ContextEntry } from '../../core/entities/Context.js';
import { BOT_PARTICIPANT, HUMAN_PARTICIPANT } from '../../core/entities/Message.js';
import { ContextAssembler } from './ContextAssembler.js';

export const FALLBACK_REPLY = 'Hello, I have been started, but no language model is connected yet';

export interface ReplyRequest {
  dialog_id: string;
  last_msg_text: string;
  last_message_id?: string;
}

export interface ReplyResponse {
  new_msg_text: string;
  dialog_id: string;
}

export type ReplyFlowState =
  | 'Received'
  | 'UserStored'
  | 'ContextBuilt'
  | 'ReplyObtained'
  | 'BotStored'
  | 'Completed';

/**
 * Where the reply text came from. The fallback is an expected configuration
 * state, not a failure.
 */
export type ReplyOutcome =
  | { source: 'model'; text: string }
  | { source: 'fallback'; text: string };

export interface GenerationSettings {
  client: IGenerationClient | null;
  model: string;
  systemPrompt?: string;
}

/**
 * Reply flow: store the user message, assemble history, obtain a reply, store it.
 * Nothing is rolled back: a later failure leaves the user message in the log.
 */
export class DialogReplyService {
  private contextAssembler: ContextAssembler;

  constructor(
    private messageRepo: IMessageRepository,
    private generation: GenerationSettings,
    private onStateChange?: (state: ReplyFlowState, dialogId: string) => void
  ) {
    this.contextAssembler = new ContextAssembler(messageRepo);
  }

  isGenerationConfigured(): boolean {
    return this.generation.client !== null;
  }

  async reply(request: ReplyRequest): Promise<ReplyResponse> {
    const { dialog_id: dialogId, last_msg_text: text } = request;
    this.transition('Received', dialogId);

    const userMessageId = request.last_message_id ?? randomUUID();
    this.messageRepo.insert(userMessageId, dialogId, text, HUMAN_PARTICIPANT);
    this.transition('UserStored', dialogId);

    const context = this.contextAssembler.buildContext(dialogId);
    this.transition('ContextBuilt', dialogId);

    const outcome = await this.obtainReply(context);
    this.transition('ReplyObtained', dialogId);

    this.messageRepo.insert(randomUUID(), dialogId, outcome.text, BOT_PARTICIPANT);
    this.transition('BotStored', dialogId);

    this.transition('Completed', dialogId);
    return {
      new_msg_text: outcome.text,
      dialog_id: dialogId,
    };
  }

  private async obtainReply(context: ContextEntry[]): Promise<ReplyOutcome> {
    const { client, model, systemPrompt } = this.generation;
    if (!client) {
      return { source: 'fallback', text: FALLBACK_REPLY };
    }

    const payload: ContextEntry[] = systemPrompt
      ? [{ role: 'system', content: systemPrompt }, ...context]
      : context;

    return { source: 'model', text: await client.generate(payload, model) };
  }

  private transition(state: ReplyFlowState, dialogId: string): void {
    this.onStateChange?.(state, dialogId);
  }
}
