import twilio from 'twilio';

export interface Notifier {
  send(to: string, body: string): Promise<{ sid: string }>;
}

export interface TwilioSettings {
  accountSid?: string;
  authToken?: string;
  fromNumber?: string;
}

export class SmsConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SmsConfigError';
  }
}

/** Sends SMS through Twilio. The client is created on first use. */
export class TwilioNotifier implements Notifier {
  private client: ReturnType<typeof twilio> | null = null;

  constructor(private readonly settings: TwilioSettings) {}

  async send(to: string, body: string): Promise<{ sid: string }> {
    const { fromNumber } = this.settings;
    if (!fromNumber) {
      throw new SmsConfigError('TWILIO_PHONE_NUMBER is not configured');
    }
    const message = await this.getClient().messages.create({ from: fromNumber, to, body });
    return { sid: message.sid };
  }

  private getClient(): ReturnType<typeof twilio> {
    if (!this.client) {
      const { accountSid, authToken } = this.settings;
      if (!accountSid || !authToken) {
        throw new SmsConfigError('Twilio credentials are not configured');
      }
      this.client = twilio(accountSid, authToken);
    }
    return this.client;
  }
}
