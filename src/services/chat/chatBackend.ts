import { ChatBackendError, ChatTransport } from './transport';
import { RETRY_SCHEDULE, AttemptStep, runRetryMachine } from './retryMachine';
import { LogContext, errorMessage, logger } from '../../utils/logger';

export const BACKEND_APOLOGY = "Sorry, I couldn't get a response right now. Please try again in a moment.";

export interface ChatBackendOptions {
  transport: ChatTransport;
  /** Backend user identity; one per lead. */
  userId: string;
  password: string;
  /** Login name when it differs from the user id. */
  username?: string;
  schedule?: readonly AttemptStep[];
}

export interface SendOutcome {
  text: string;
  delivered: boolean;
  attempts: number;
}

/**
 * Owns one backend session for one user session. Authentication and session
 * binding are lazy and cached; `ask` never throws.
 */
export class ChatBackendClient {
  private readonly transport: ChatTransport;
  private readonly userId: string;
  private readonly username: string;
  private readonly password: string;
  private readonly schedule: readonly AttemptStep[];
  private token: string | null = null;
  private sessionId: string | null = null;

  constructor(options: ChatBackendOptions) {
    this.transport = options.transport;
    this.userId = options.userId;
    this.username = options.username ?? options.userId;
    this.password = options.password;
    this.schedule = options.schedule ?? RETRY_SCHEDULE;
  }

  get boundSessionId(): string | null {
    return this.sessionId;
  }

  async ask(prompt: string, ctx: LogContext = {}): Promise<SendOutcome> {
    const outcome = await runRetryMachine(
      {
        send: () => this.sendOnce(prompt, ctx),
        recreate: async () => {
          await this.bindSession(true, ctx);
        },
      },
      ctx,
      this.schedule,
    );

    if (outcome.phase === 'delivered') {
      logger.info('Backend reply received', ctx, { attempts: outcome.attempts, length: outcome.text.length });
      return { text: outcome.text, delivered: true, attempts: outcome.attempts };
    }

    logger.error('Backend produced no reply', ctx, { attempts: outcome.attempts });
    return { text: BACKEND_APOLOGY, delivered: false, attempts: outcome.attempts };
  }

  /**
   * Returns the bound backend session, requesting one if needed. A forced
   * request closes the currently bound session first.
   */
  async bindSession(forceNew = false, ctx: LogContext = {}): Promise<string> {
    if (this.sessionId && !forceNew) {
      return this.sessionId;
    }

    const token = await this.authenticate();
    if (this.sessionId && forceNew) {
      await this.closeBound(token, ctx);
    }
    this.sessionId = await this.transport.getSession(token, this.userId, forceNew);
    logger.debug('Backend session bound', ctx, { backendSession: this.sessionId, forceNew });
    return this.sessionId;
  }

  async close(ctx: LogContext = {}): Promise<void> {
    if (this.token && this.sessionId) {
      await this.closeBound(this.token, ctx);
    }
  }

  private async authenticate(): Promise<string> {
    if (!this.token) {
      this.token = await this.transport.authenticate(this.username, this.password);
    }
    return this.token;
  }

  private async closeBound(token: string, ctx: LogContext): Promise<void> {
    const previous = this.sessionId;
    this.sessionId = null;
    if (!previous) {
      return;
    }
    try {
      await this.transport.closeSession(token, this.userId, previous);
    } catch (err) {
      logger.warn('Closing backend session failed', ctx, { backendSession: previous, error: errorMessage(err) });
    }
  }

  private wireShapes(sessionId: string, prompt: string): Array<Record<string, unknown>> {
    return [
      { user_id: this.userId, session_id: sessionId, message: prompt },
      {
        action: 'create',
        message: prompt,
        user_id: this.userId,
        session_id: sessionId,
        car: {
          vin: '',
          year: -1,
          make: '',
          model: '',
          trim: '',
          mileage: -1,
          condition: 0,
          color: 'blue',
          region: 'WC',
        },
      },
    ];
  }

  /** One logical send: every wire shape in order until one yields text. */
  private async sendOnce(prompt: string, ctx: LogContext): Promise<string> {
    let token: string;
    let sessionId: string;
    try {
      sessionId = await this.bindSession(false, ctx);
      token = await this.authenticate();
    } catch (err) {
      this.forget(err);
      logger.warn('Backend setup failed', ctx, { error: errorMessage(err) });
      return '';
    }

    for (const [index, payload] of this.wireShapes(sessionId, prompt).entries()) {
      try {
        const reply = await this.transport.stream(token, payload);
        if (!reply.rejected && reply.text) {
          return reply.text;
        }
        logger.debug('Backend shape produced nothing', ctx, { shape: index, rejected: reply.rejected });
      } catch (err) {
        this.forget(err);
        logger.warn('Backend stream failed', ctx, { shape: index, error: errorMessage(err) });
        if (err instanceof ChatBackendError && err.kind === 'unauthorized') {
          return '';
        }
      }
    }
    return '';
  }

  private forget(err: unknown): void {
    if (err instanceof ChatBackendError && err.kind === 'unauthorized') {
      this.token = null;
    }
  }
}
