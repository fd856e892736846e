export type SendResult = { ok: true } | { ok: false; reason: string };

/**
 * Outbound template message to a phone number. Implementations must bound
 * each call with a timeout and never retry on their own.
 */
export interface MessageSender {
  send(phoneNumber: string, template: string, token: string): Promise<SendResult>;
}

export const MESSAGE_SENDER = 'MESSAGE_SENDER';
