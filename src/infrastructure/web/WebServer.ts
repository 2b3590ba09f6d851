import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Server as HttpServer } from 'http';
import cors from 'cors';
import type { IMessageRepository } from '../../core/interfaces/IMessageRepository.js';
import { DialogServiceError, NotFoundError, ValidationError } from '../../core/errors.js';
import type { DialogReplyService } from '../../application/services/DialogReplyService.js';
import type { PredictionService } from '../../application/services/PredictionService.js';
import { createLogger, logFailure, type Logger } from '../../utils/logger.js';
import { DialogIdSchema, PredictionRequestSchema, ReplyRequestSchema, parseRequest } from './schemas.js';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Wrap an async route so rejections reach the error middleware
 */
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function isJsonSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;

  constructor(
    private replyService: DialogReplyService,
    private predictionService: PredictionService,
    private messageRepo: IMessageRepository,
    private port: number = 8000,
    private logger: Logger = createLogger('WebServer')
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    // Generate a reply for the last user message
    this.app.post(
      '/get_message',
      route(async (req, res) => {
        const body = parseRequest(ReplyRequestSchema, req.body);
        res.json(await this.replyService.reply(body));
      })
    );

    // Store a message and estimate whether a bot takes part in the dialog
    this.app.post(
      '/predict',
      route(async (req, res) => {
        const body = parseRequest(PredictionRequestSchema, req.body);
        res.json(await this.predictionService.predict(body));
      })
    );

    this.app.get(
      '/dialogs/:dialogId/messages',
      route(async (req, res) => {
        const dialogId = parseRequest(DialogIdSchema, req.params.dialogId);
        const dialog = this.messageRepo.getDialog(dialogId);
        if (!dialog) {
          throw new NotFoundError(`No messages found for dialog ${dialogId}`);
        }
        res.json({ dialog_id: dialog.dialog_id, messages: dialog.messages });
      })
    );

    this.app.get(
      '/health',
      route(async (_req, res) => {
        res.json({
          status: 'ok',
          messages: this.messageRepo.countMessages(),
          dialogs: this.messageRepo.countDialogs(),
          generation: this.replyService.isGenerationConfigured() ? 'configured' : 'fallback',
        });
      })
    );
  }

  private setupErrorHandler(): void {
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof ValidationError) {
        res.status(422).json({ error: 'Validation failed', details: error.issues });
        return;
      }
      if (isJsonSyntaxError(error)) {
        res.status(422).json({ error: 'Validation failed', details: ['body: malformed JSON'] });
        return;
      }
      if (error instanceof NotFoundError) {
        res.status(404).json({ error: error.message });
        return;
      }

      logFailure(this.logger, `${req.method} ${req.path}`, error);
      res.status(500).json({
        error: error instanceof DialogServiceError ? error.message : 'Internal server error',
      });
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        this.logger.info(`HTTP API available at http://localhost:${this.port}`);
        resolve();
      });

      server.on('error', (error) => {
        this.logger.error('Server error:', error);
        reject(error);
      });

      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.httpServer) {
        resolve();
        return;
      }

      this.httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('HTTP server closed');
        this.httpServer = null;
        resolve();
      });
    });
  }
}
