import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DialogReplyService } from '../../application/services/DialogReplyService.js';
import type { PredictionService } from '../../application/services/PredictionService.js';
import type { IMessageRepository } from '../../core/interfaces/IMessageRepository.js';
import { toRole } from '../../application/services/ContextAssembler.js';
import { errorMessage } from '../../core/errors.js';
import { UuidSchema } from '../../core/entities/Identifiers.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface DialogToolDeps {
  replyService: DialogReplyService;
  predictionService: PredictionService;
  messageRepo: IMessageRepository;
}

function text(value: string, isError = false): ToolResult {
  return isError
    ? { content: [{ type: 'text', text: value }], isError: true }
    : { content: [{ type: 'text', text: value }] };
}

async function guarded(fn: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await fn();
  } catch (error) {
    return text(`Error: ${errorMessage(error)}`, true);
  }
}

export function replyToMessage(
  deps: DialogToolDeps,
  args: { dialog_id: string; text: string; message_id?: string }
): Promise<ToolResult> {
  return guarded(async () => {
    const response = await deps.replyService.reply({
      dialog_id: args.dialog_id,
      last_msg_text: args.text,
      last_message_id: args.message_id,
    });
    return text(response.new_msg_text);
  });
}

export function predictBot(
  deps: DialogToolDeps,
  args: { id: string; dialog_id: string; text: string; participant_index: number }
): Promise<ToolResult> {
  return guarded(async () => {
    const prediction = await deps.predictionService.predict(args);
    return text(JSON.stringify(prediction, null, 2));
  });
}

export function viewDialog(deps: DialogToolDeps, args: { dialog_id: string }): Promise<ToolResult> {
  return guarded(async () => {
    const dialog = deps.messageRepo.getDialog(args.dialog_id);
    if (!dialog) {
      return text(`No messages found for dialog ${args.dialog_id}`);
    }

    const lines = dialog.messages.map((msg) => `**${toRole(msg.participant_index)}**: ${msg.text}`);
    return text(`# Dialog ${dialog.dialog_id} (${dialog.message_count} messages)\n\n${lines.join('\n\n')}`);
  });
}

export const replyToMessageShape = {
  dialog_id: UuidSchema.describe('Dialog UUID (v4)'),
  text: z.string().min(1).describe('The user message'),
  message_id: UuidSchema.optional().describe('Optional UUID (v4) for the user message'),
};

export const predictBotShape = {
  id: UuidSchema.describe('Message UUID (v4)'),
  dialog_id: UuidSchema.describe('Dialog UUID (v4)'),
  text: z.string().min(1).describe('Message text'),
  participant_index: z.number().int().describe('0 for the human participant, 1 for the bot'),
};

export const viewDialogShape = {
  dialog_id: UuidSchema.describe('Dialog UUID (v4)'),
};

/**
 * Register the dialog tools on an MCP server
 */
export function registerDialogTools(server: McpServer, deps: DialogToolDeps): void {
  server.tool(
    'reply-to-message',
    'Store a user message in a dialog and return the generated reply',
    replyToMessageShape,
    (args) => replyToMessage(deps, args)
  );

  server.tool(
    'predict-bot',
    'Store a message and estimate the probability that a bot takes part in the dialog',
    predictBotShape,
    (args) => predictBot(deps, args)
  );

  server.tool('view-dialog', 'Show the stored history of a dialog', viewDialogShape, (args) =>
    viewDialog(deps, args)
  );
}
