import { randomUUID } from 'crypto';
import type { IMessageRepository } from '../../core/interfaces/IMessageRepository.js';
import type { IClassifierClient } from '../../core/interfaces/IClassifierClient.js';
import { createPrediction, type Prediction } from '../../core/entities/Prediction.js';
import { ContextAssembler } from './ContextAssembler.js';

export interface PredictionRequest {
  id: string;
  dialog_id: string;
  text: string;
  participant_index: number;
}

export interface PredictOptions {
  /** Classify what is already stored without appending the triggering message */
  skipInsert?: boolean;
}

/**
 * Classification flow: store the message, classify the whole dialog, return a Prediction
 */
export class PredictionService {
  private contextAssembler: ContextAssembler;

  constructor(
    private messageRepo: IMessageRepository,
    private classifier: IClassifierClient
  ) {
    this.contextAssembler = new ContextAssembler(messageRepo);
  }

  async predict(request: PredictionRequest, options: PredictOptions = {}): Promise<Prediction> {
    if (!options.skipInsert) {
      this.messageRepo.insert(request.id, request.dialog_id, request.text, request.participant_index);
    }

    const conversationText = this.contextAssembler.buildClassificationText(request.dialog_id);
    const isBotProbability = await this.classifier.classify(conversationText);

    return createPrediction({
      id: randomUUID(),
      message_id: request.id,
      dialog_id: request.dialog_id,
      participant_index: request.participant_index,
      is_bot_probability: isBotProbability,
    });
  }
}
