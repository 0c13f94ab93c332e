// services/LineMessagingTransport.ts

import { Client } from '@line/bot-sdk';
import { DispatchResult } from '../types/attendance';
import { Logger, createSilentLogger } from '../utils/logger';

/** Outbound side of the chat channel. */
export interface MessagingTransport {
  send(recipientId: string, text: string): Promise<DispatchResult>;
}

export class LineMessagingTransport implements MessagingTransport {
  private readonly client: Client;

  constructor(
    channelAccessToken: string,
    private readonly logger: Logger = createSilentLogger('LineMessagingTransport'),
  ) {
    this.client = new Client({ channelAccessToken });
  }

  async send(recipientId: string, text: string): Promise<DispatchResult> {
    try {
      await this.client.pushMessage(recipientId, { type: 'text', text });
      this.logger.debug('LINE message pushed', { recipientId });
      return { success: true };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }
}
