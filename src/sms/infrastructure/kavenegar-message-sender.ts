import { Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import { ConfigService } from '../../database/config.service';
import { MessageSender, SendResult } from '../domain/message-sender';

interface LookupResponse {
  return?: {
    status?: number;
    message?: string;
  };
}

/**
 * Sends template (verify/lookup) messages through the Kavenegar HTTP API.
 */
@Injectable()
export class KavenegarMessageSender implements MessageSender {
  private readonly logger = new Logger(KavenegarMessageSender.name);

  constructor(private readonly configService: ConfigService) {}

  async send(phoneNumber: string, template: string, token: string): Promise<SendResult> {
    const apiKey = this.configService.smsApiKey;

    if (!apiKey) {
      return { ok: false, reason: 'SMS_API_KEY is not configured' };
    }
    if (!template) {
      return { ok: false, reason: 'SMS template is not configured' };
    }

    const url = `${this.configService.smsApiUrl}/${apiKey}/verify/lookup.json`;
    const body = new URLSearchParams({ template, receptor: phoneNumber, token });

    try {
      const response = await axios.post<LookupResponse>(url, body.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        timeout: this.configService.smsTimeoutMs,
        validateStatus: () => true,
      });

      const status = response.data?.return?.status;
      const message = response.data?.return?.message || 'Unknown error';

      if (response.status !== 200) {
        return {
          ok: false,
          reason: `SMS API error (status ${status ?? response.status}): ${message}`,
        };
      }
      if (status !== 200) {
        return { ok: false, reason: `SMS API error: ${message}` };
      }

      this.logger.log(`Message sent to ${phoneNumber} with template ${template}`);
      return { ok: true };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { ok: false, reason: `SMS request failed: ${reason}` };
    }
  }
}
