#!/usr/bin/env node

/**
 * Dialog service entry point
 */

import { getConfig, isGenerationConfigured, printConfigInfo } from './config.js';
import { waitForDatabase } from './infrastructure/database/waitForDatabase.js';
import { closeDatabase } from './infrastructure/database/DatabaseConnection.js';
import { MessageRepository } from './infrastructure/database/repositories/MessageRepository.js';
import { OpenAiApiClient } from './infrastructure/http/OpenAiApiClient.js';
import { ZeroShotClassifierClient } from './infrastructure/http/ZeroShotClassifierClient.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { DialogReplyService } from './application/services/DialogReplyService.js';
import { PredictionService } from './application/services/PredictionService.js';
import { DialogMcpServer } from './presentation/DialogMcpServer.js';
import { CircuitBreaker, type RetryConfig } from './utils/retry.js';
import { createLogger } from './utils/logger.js';

async function main() {
  const config = getConfig();
  printConfigInfo(config);

  const logger = createLogger('Main', config.server.debug);
  let webServer: WebServer | null = null;
  let mcpServer: DialogMcpServer | null = null;

  try {
    const connection = await waitForDatabase(
      config.database.path,
      { attempts: config.database.readyAttempts, delayMs: config.database.readyDelayMs },
      logger
    );
    logger.info(`Database ready at ${connection.getDatabasePath()}`);
    const messageRepo = new MessageRepository(connection.getDatabase());

    const retryConfig: RetryConfig = {
      maxAttempts: config.retry.maxAttempts,
      initialDelayMs: config.retry.initialDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      multiplier: 2,
      timeoutMs: 60000,
    };

    const generationClient = isGenerationConfigured(config)
      ? new OpenAiApiClient(
          config.generation.baseUrl,
          config.generation.apiKey,
          new CircuitBreaker(5, 60000),
          retryConfig
        )
      : null;

    const classifierClient = new ZeroShotClassifierClient(
      config.classifier.url,
      { bot: config.classifier.botLabel, human: config.classifier.humanLabel },
      new CircuitBreaker(5, 60000),
      retryConfig
    );

    const flowLogger = createLogger('ReplyFlow', config.server.debug);
    const replyService = new DialogReplyService(
      messageRepo,
      {
        client: generationClient,
        model: config.generation.model,
        systemPrompt: config.generation.systemPrompt,
      },
      (state, dialogId) => flowLogger.debug(`${dialogId} -> ${state}`)
    );
    const predictionService = new PredictionService(messageRepo, classifierClient);

    webServer = new WebServer(
      replyService,
      predictionService,
      messageRepo,
      config.http.port,
      createLogger('WebServer', config.server.debug)
    );
    await webServer.start();

    if (config.mcp.enabled) {
      mcpServer = new DialogMcpServer(
        config,
        { replyService, predictionService, messageRepo },
        createLogger('McpServer', config.server.debug)
      );
      await mcpServer.start();
    }
  } catch (error) {
    logger.error('Fatal error during startup:', error);
    if (webServer) {
      await webServer.stop();
    }
    closeDatabase();
    process.exit(1);
  }

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    try {
      if (mcpServer) {
        await mcpServer.shutdown();
      }
      if (webServer) {
        await webServer.stop();
      }
    } finally {
      closeDatabase();
    }
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

main().catch((error) => {
  console.error('Fatal error in main():', error);
  process.exit(1);
});
